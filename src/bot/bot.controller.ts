import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpException,
  InternalServerErrorException,
  Logger,
  Post,
  ServiceUnavailableException,
  UseGuards,
} from '@nestjs/common';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { BotService } from './bot.service';
import { WebhookSecretGuard } from './guards/webhook-secret.guard';

function isJsonContentType(contentType: string | undefined): boolean {
  return contentType?.split(';')[0].trim().toLowerCase() === 'application/json';
}

@Controller()
export class BotController {
  private readonly log = new Logger(BotController.name);

  constructor(
    private readonly bot: BotService,
    private readonly tg: TelegramAdapter,
  ) {}

  /**
   * Telegram POSTs every update here. Any non-2xx answer makes Telegram
   * redeliver the update later.
   */
  @Post('webhook')
  @HttpCode(200)
  @UseGuards(WebhookSecretGuard)
  async telegram(
    @Body() body: unknown,
    @Headers('content-type') contentType?: string,
  ): Promise<{ ok: true }> {
    if (!this.bot.isReady()) {
      throw new ServiceUnavailableException('Bot not ready');
    }

    // Express leaves an empty object for bodies it did not parse as JSON
    if (!isJsonContentType(contentType) || !this.tg.isUpdateBody(body)) {
      throw new BadRequestException('Invalid JSON');
    }

    const update = this.tg.fromIncoming(body);
    if (!update) {
      this.log.debug('Update without processable payload');
      return { ok: true };
    }

    try {
      await this.bot.handle(update);
      return { ok: true };
    } catch (err) {
      if (err instanceof HttpException) throw err;
      this.log.error(
        `Error processing update ${update.updateId}`,
        err instanceof Error ? err.stack : String(err),
      );
      throw new InternalServerErrorException('Error processing Telegram update');
    }
  }
}
