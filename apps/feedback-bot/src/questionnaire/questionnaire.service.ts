import { Injectable, Logger } from '@nestjs/common';
import { QuestionnaireRepository } from '../store/questionnaire.repository';
import { TelegramService } from '../telegram/telegram.service';
import { OperatorAlertService } from '../telegram/operator-alert.service';
import { NotionService } from '../notion/notion.service';
import { Meeting } from '@app/shared/types/meeting.types';
import { Questionnaire, QuestionnaireKey } from '@app/shared/types/questionnaire.types';
import {
  StaleActionError,
  WriteBackFailure,
  describeError,
} from '@app/shared/errors/feedback.errors';
import { answerQuestion, collectScores, startQuestionnaire } from './questionnaire-state';
import {
  buildClosingMessage,
  buildInitialPrompt,
  buildQuestionPrompt,
} from './formatters/prompt-message.formatter';

export type EnqueueResult = 'sent' | 'already_started' | 'superseded';

@Injectable()
export class QuestionnaireService {
  private readonly logger = new Logger(QuestionnaireService.name);

  constructor(
    private readonly repository: QuestionnaireRepository,
    private readonly telegramService: TelegramService,
    private readonly notionService: NotionService,
    private readonly alertService: OperatorAlertService,
  ) {}

  /**
   * Create the questionnaire for a newly completed meeting and send its
   * initial prompt. A row left behind by an interrupted run is resumed:
   * its old prompt is replaced, or, if the user already started, the
   * meeting is only marked processed.
   */
  async enqueue(meeting: Meeting): Promise<EnqueueResult> {
    const { questionnaire, created } = this.repository.insertOrGet({
      chatId: meeting.chatId,
      meetingId: meeting.id,
      meetingName: meeting.title,
      subjectId: meeting.subjectId,
    });

    if (!created) {
      this.logger.log(
        `Resuming questionnaire: meeting=${meeting.id.slice(0, 8)} status=${questionnaire.status}`,
      );
    }

    if (questionnaire.status !== 'pending') {
      this.repository.markProcessed(meeting.id);
      return 'already_started';
    }

    const sent = await this.reissuePrompt(questionnaire, meeting.counterpartName, true);
    return sent ? 'sent' : 'superseded';
  }

  /**
   * Replace the initial prompt of a pending questionnaire: the previous
   * prompt is deleted before the new one is sent. `questionnaire` may be an
   * older read of the row; nothing is touched unless the row is still
   * pending on the same prompt. Returns false when the row moved on.
   */
  async reissuePrompt(
    questionnaire: Questionnaire,
    counterpartName: string,
    markProcessed = false,
  ): Promise<boolean> {
    const { chatId, meetingId, outstandingMessageId } = questionnaire;

    const current = this.repository.get(toKey(questionnaire));
    if (
      !current ||
      current.status !== 'pending' ||
      current.outstandingMessageId !== outstandingMessageId
    ) {
      this.logger.debug(
        `Prompt not reissued: meeting=${meetingId.slice(0, 8)} status=${current?.status ?? 'missing'}`,
      );
      if (markProcessed) {
        this.repository.markProcessed(meetingId);
      }
      return false;
    }

    if (outstandingMessageId !== null) {
      await this.deleteQuietly(chatId, outstandingMessageId);
    }

    const messageId = await this.telegramService.sendMessage(
      chatId,
      buildInitialPrompt(chatId, questionnaire.meetingName, counterpartName),
    );

    const swapped = this.repository.replacePrompt(
      toKey(questionnaire),
      outstandingMessageId,
      messageId,
      markProcessed,
    );
    if (swapped) {
      this.logger.log(
        `Initial prompt sent: meeting=${meetingId.slice(0, 8)} chat=${chatId} message=${messageId}`,
      );
      return true;
    }

    await this.reconcileSupersededPrompt(questionnaire, messageId);
    return false;
  }

  /** Handle a press on the start button of `messageId`. */
  async start(chatId: string, messageId: number): Promise<Questionnaire> {
    const pending = this.repository.findPendingByMessage(chatId, messageId);
    if (!pending) {
      throw new StaleActionError(`No pending questionnaire behind message ${messageId}`);
    }

    const { next } = this.repository.applyTransition(toKey(pending), (current) =>
      startQuestionnaire(current, messageId),
    );

    await this.showCurrentQuestion(next, messageId);
    this.logger.log(`Questionnaire started: meeting=${next.meetingId.slice(0, 8)}`);
    return next;
  }

  /** Record a score for the current question and advance, or finish. */
  async answer(
    chatId: string,
    meetingId: string,
    questionIndex: number,
    score: number,
    messageId: number,
  ): Promise<Questionnaire> {
    const { next } = this.repository.applyTransition({ chatId, meetingId }, (current) =>
      answerQuestion(current, questionIndex, score, messageId),
    );

    if (next.status !== 'completed') {
      await this.showCurrentQuestion(next, messageId);
      return next;
    }

    this.logger.log(`Questionnaire completed: meeting=${meetingId.slice(0, 8)}`);
    await this.finish(next, messageId);
    return next;
  }

  /**
   * Edit the live message to the current question. If the edit fails the
   * question goes out as a new message, which becomes the live prompt.
   */
  private async showCurrentQuestion(questionnaire: Questionnaire, messageId: number): Promise<void> {
    const { chatId, meetingId } = questionnaire;
    const prompt = buildQuestionPrompt(chatId, meetingId, questionnaire.currentQuestion);

    try {
      await this.telegramService.editMessage(chatId, messageId, prompt);
      return;
    } catch (err) {
      this.logger.warn(
        `Question edit failed, sending it anew: meeting=${meetingId.slice(0, 8)} error=${describeError(err)}`,
      );
    }

    const freshMessageId = await this.telegramService.sendMessage(chatId, prompt);
    const adopted = this.repository.swapOutstandingMessage(
      toKey(questionnaire),
      'in_progress',
      messageId,
      freshMessageId,
    );
    if (adopted) {
      await this.deleteQuietly(chatId, messageId);
      return;
    }
    await this.deleteQuietly(chatId, freshMessageId);
  }

  private async finish(questionnaire: Questionnaire, messageId: number): Promise<void> {
    const { chatId, meetingId } = questionnaire;

    let summary: string | null = null;
    try {
      summary = await this.notionService.getMeetingSummary(meetingId);
    } catch (err) {
      this.logger.warn(`Summary unavailable: meeting=${meetingId.slice(0, 8)} error=${describeError(err)}`);
    }

    try {
      await this.telegramService.editMessage(chatId, messageId, buildClosingMessage(summary));
    } catch (err) {
      this.logger.error(`Closing message failed: meeting=${meetingId.slice(0, 8)} error=${describeError(err)}`);
    }

    await this.writeBack(questionnaire);
  }

  private async writeBack(questionnaire: Questionnaire): Promise<void> {
    try {
      await this.notionService.createFeedbackRecord({
        meetingId: questionnaire.meetingId,
        meetingName: questionnaire.meetingName,
        subjectId: questionnaire.subjectId,
        chatId: questionnaire.chatId,
        scores: collectScores(questionnaire),
        filledAt: new Date().toISOString(),
      });
      await this.notionService.markFeedbackReceived(questionnaire.meetingId);
    } catch (err) {
      const failure = new WriteBackFailure(questionnaire.meetingId, err);
      this.logger.error(failure.message);
      await this.alertService.notify('Feedback write-back', failure);
    }
  }

  /**
   * The row changed while a fresh prompt was being sent. If the user had
   * started on the prompt that was just deleted, the live question moves to
   * the fresh message; otherwise the fresh message is withdrawn.
   */
  private async reconcileSupersededPrompt(
    questionnaire: Questionnaire,
    freshMessageId: number,
  ): Promise<void> {
    const { chatId, meetingId, outstandingMessageId } = questionnaire;
    const current = this.repository.get(toKey(questionnaire));

    if (
      current &&
      current.status === 'in_progress' &&
      outstandingMessageId !== null &&
      current.outstandingMessageId === outstandingMessageId &&
      this.repository.swapOutstandingMessage(
        toKey(current),
        'in_progress',
        outstandingMessageId,
        freshMessageId,
      )
    ) {
      this.logger.warn(
        `Prompt replaced mid-questionnaire, moving question ${current.currentQuestion} to message ${freshMessageId}`,
      );
      await this.telegramService.editMessage(
        chatId,
        freshMessageId,
        buildQuestionPrompt(chatId, meetingId, current.currentQuestion),
      );
      return;
    }

    this.logger.warn(`Prompt superseded: meeting=${meetingId.slice(0, 8)} message=${freshMessageId}`);
    await this.deleteQuietly(chatId, freshMessageId);
  }

  private async deleteQuietly(chatId: string, messageId: number): Promise<void> {
    try {
      await this.telegramService.deleteMessage(chatId, messageId);
    } catch (err) {
      this.logger.warn(`Could not delete message ${messageId} in chat ${chatId}: ${describeError(err)}`);
    }
  }
}

function toKey(questionnaire: QuestionnaireKey): QuestionnaireKey {
  return { chatId: questionnaire.chatId, meetingId: questionnaire.meetingId };
}
