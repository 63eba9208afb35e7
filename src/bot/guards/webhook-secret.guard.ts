import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import type { Request } from 'express';

export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

/**
 * Rejects webhook calls that lack the secret_token registered with
 * setWebhook. Disabled when WEBHOOK_SECRET is unset.
 */
@Injectable()
export class WebhookSecretGuard implements CanActivate {
  private readonly log = new Logger(WebhookSecretGuard.name);
  private readonly secret: Buffer | null;

  constructor(cfg: ConfigService) {
    const secret = cfg.get<string>('WEBHOOK_SECRET');
    this.secret = secret ? Buffer.from(secret) : null;
    if (!this.secret) {
      this.log.warn('WEBHOOK_SECRET is not set, webhook verification disabled');
    }
  }

  canActivate(ctx: ExecutionContext): boolean {
    if (!this.secret) return true;

    const req = ctx.switchToHttp().getRequest<Request>();
    const header = req.headers[SECRET_HEADER];
    const provided = Buffer.from(typeof header === 'string' ? header : '');

    if (provided.length !== this.secret.length || !timingSafeEqual(provided, this.secret)) {
      this.log.warn('Webhook call with invalid secret token');
      throw new UnauthorizedException('Invalid webhook secret');
    }

    return true;
  }
}
