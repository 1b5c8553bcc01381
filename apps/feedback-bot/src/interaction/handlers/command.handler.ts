import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { telegramConfig } from '@app/shared/config/configuration';
import { TextMessageEvent } from '@app/shared/types/telegram.types';
import { TelegramService } from '../../telegram/telegram.service';

const CHAT_ID_COMMAND = '/chat_id';

/** Diagnostic text commands. Any other text is ignored. */
@Injectable()
export class CommandHandler {
  private readonly logger = new Logger(CommandHandler.name);

  constructor(
    private readonly telegramService: TelegramService,
    @Inject(telegramConfig.KEY)
    private readonly telegramCfg: ConfigType<typeof telegramConfig>,
  ) {}

  /** Returns true when the message was a command this bot answered. */
  async handle(event: TextMessageEvent): Promise<boolean> {
    if (!this.isChatIdCommand(event.text)) {
      return false;
    }

    await this.telegramService.sendMessage(event.chatId, { text: `Chat ID: ${event.chatId}` });
    this.logger.log(`Chat id reported: chat=${event.chatId}`);
    return true;
  }

  private isChatIdCommand(text: string): boolean {
    const [command, target] = text.trim().split('@', 2);
    if (command !== CHAT_ID_COMMAND) return false;
    if (target === undefined) return true;

    const username = this.telegramCfg.botUsername;
    return username !== undefined && target.toLowerCase() === username.toLowerCase();
  }
}
