import { ConfigService } from '@nestjs/config';
import { publicChannelUrl } from '../config/env.validation';

export const RELAY_CONFIG = 'RELAY_CONFIG';

export interface RelayConfig {
  /** Source chat for forwards; numeric ids are sent as numbers. */
  privateChannelId: number | string;
  /** As configured, shown to users in reply texts. */
  publicChannel: string;
  /** Always a full URL, used for the "Join Channel" button. */
  publicChannelUrl: string;
}

export function relayConfigFrom(cfg: ConfigService): RelayConfig {
  const privateChannel = cfg.getOrThrow<string>('PRIVATE_CHANNEL_ID');
  const publicChannel = cfg.getOrThrow<string>('PUBLIC_CHANNEL');

  return {
    privateChannelId: /^-?\d+$/.test(privateChannel)
      ? Number(privateChannel)
      : privateChannel,
    publicChannel,
    publicChannelUrl: publicChannelUrl(publicChannel),
  };
}
