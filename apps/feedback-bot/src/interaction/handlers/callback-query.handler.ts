import { Injectable, Logger } from '@nestjs/common';
import { CallbackQueryEvent } from '@app/shared/types/telegram.types';
import { StaleActionError, describeError } from '@app/shared/errors/feedback.errors';
import { parseAction } from '@app/shared/utils/action-parser.utils';
import { TelegramService } from '../../telegram/telegram.service';
import { QuestionnaireService } from '../../questionnaire/questionnaire.service';

@Injectable()
export class CallbackQueryHandler {
  private readonly logger = new Logger(CallbackQueryHandler.name);

  constructor(
    private readonly telegramService: TelegramService,
    private readonly questionnaireService: QuestionnaireService,
  ) {}

  async handle(event: CallbackQueryEvent): Promise<void> {
    await this.acknowledge(event.callbackQueryId);

    const action = parseAction(event.data);
    if (!action) {
      throw new StaleActionError(`Unrecognised callback payload: ${event.data}`);
    }
    if (action.chatId !== event.chatId) {
      throw new StaleActionError(
        `Payload chat ${action.chatId} does not match chat ${event.chatId}`,
      );
    }

    if (action.action === 'start') {
      this.logger.debug(`Start pressed: chat=${event.chatId} meeting="${action.meetingName}"`);
      await this.questionnaireService.start(event.chatId, event.messageId);
      return;
    }

    await this.questionnaireService.answer(
      event.chatId,
      action.meetingId,
      action.questionIndex,
      action.score,
      event.messageId,
    );
  }

  private async acknowledge(callbackQueryId: string): Promise<void> {
    try {
      await this.telegramService.answerCallbackQuery(callbackQueryId);
    } catch (err) {
      this.logger.warn(`Callback query ${callbackQueryId} not acknowledged: ${describeError(err)}`);
    }
  }
}
