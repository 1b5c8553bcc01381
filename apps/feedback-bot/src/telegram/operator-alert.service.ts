import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { telegramConfig } from '@app/shared/config/configuration';
import { describeError } from '@app/shared/errors/feedback.errors';
import { TelegramService } from './telegram.service';
import { escapeHtml } from '@app/shared/utils/html.utils';

/**
 * Mirrors loop-level failures into the operator chat (ERROR_CHAT_ID).
 * Never throws; a failed alert is only logged.
 */
@Injectable()
export class OperatorAlertService {
  private readonly logger = new Logger(OperatorAlertService.name);

  constructor(
    private readonly telegramService: TelegramService,
    @Inject(telegramConfig.KEY)
    private readonly telegramCfg: ConfigType<typeof telegramConfig>,
  ) {}

  async notify(context: string, err: unknown): Promise<void> {
    const chatId = this.telegramCfg.errorChatId;
    if (!chatId) return;

    try {
      await this.telegramService.sendMessage(chatId, {
        text: `⚠️ <b>${escapeHtml(context)}</b>\n${escapeHtml(describeError(err))}`,
      });
    } catch (alertErr) {
      this.logger.error(`Operator alert failed (${context}): ${describeError(alertErr)}`);
    }
  }
}
