import { Injectable } from '@nestjs/common';
import { Statement } from 'better-sqlite3';
import { z } from 'zod';
import { DatabaseService } from './database.service';
import {
  Answers,
  NewQuestionnaire,
  Questionnaire,
  QuestionnaireKey,
  QuestionnaireStatus,
} from '@app/shared/types/questionnaire.types';
import {
  DataShapeError,
  StaleActionError,
  describeError,
} from '@app/shared/errors/feedback.errors';

interface QuestionnaireRow {
  chat_id: string;
  meeting_id: string;
  meeting_name: string;
  subject_id: string;
  status: QuestionnaireStatus;
  current_question: number;
  answers: string;
  outstanding_message_id: number | null;
  created_at: string;
  updated_at: string;
}

interface KeyParams {
  chatId: string;
  meetingId: string;
}

const answersSchema = z.record(z.string().regex(/^\d+$/), z.number().int());

/**
 * Persistence for questionnaires and the processed-meeting set.
 * Every public method is exactly one transaction.
 */
@Injectable()
export class QuestionnaireRepository {
  private readonly selectOne: Statement<[KeyParams], QuestionnaireRow>;
  private readonly selectPending: Statement<[], QuestionnaireRow>;
  private readonly selectPendingByMessage: Statement<
    [{ chatId: string; messageId: number }],
    QuestionnaireRow
  >;
  private readonly insertRow: Statement<
    [KeyParams & { meetingName: string; subjectId: string; now: string }]
  >;
  private readonly updateState: Statement<
    [
      KeyParams & {
        status: QuestionnaireStatus;
        currentQuestion: number;
        answers: string;
        outstandingMessageId: number | null;
        now: string;
      },
    ]
  >;
  private readonly updateOutstanding: Statement<
    [KeyParams & { messageId: number | null; now: string }]
  >;
  private readonly selectProcessed: Statement<[string], { found: number }>;
  private readonly insertProcessed: Statement<[{ meetingId: string; now: string }]>;

  constructor(private readonly database: DatabaseService) {
    const db = this.database.db;

    this.selectOne = db.prepare<[KeyParams], QuestionnaireRow>(
      'SELECT * FROM questionnaires WHERE chat_id = @chatId AND meeting_id = @meetingId',
    );
    this.selectPending = db.prepare<[], QuestionnaireRow>(
      `SELECT * FROM questionnaires WHERE status = 'pending' ORDER BY created_at ASC`,
    );
    this.selectPendingByMessage = db.prepare<
      [{ chatId: string; messageId: number }],
      QuestionnaireRow
    >(
      `SELECT * FROM questionnaires
        WHERE chat_id = @chatId
          AND status = 'pending'
          AND outstanding_message_id = @messageId`,
    );
    this.insertRow = db.prepare<
      [KeyParams & { meetingName: string; subjectId: string; now: string }]
    >(`
      INSERT INTO questionnaires (
        chat_id, meeting_id, meeting_name, subject_id,
        status, current_question, answers, outstanding_message_id,
        created_at, updated_at
      ) VALUES (
        @chatId, @meetingId, @meetingName, @subjectId,
        'pending', 0, '{}', NULL,
        @now, @now
      )
    `);
    this.updateState = db.prepare<
      [
        KeyParams & {
          status: QuestionnaireStatus;
          currentQuestion: number;
          answers: string;
          outstandingMessageId: number | null;
          now: string;
        },
      ]
    >(`
      UPDATE questionnaires
         SET status = @status,
             current_question = @currentQuestion,
             answers = @answers,
             outstanding_message_id = @outstandingMessageId,
             updated_at = @now
       WHERE chat_id = @chatId AND meeting_id = @meetingId
    `);
    this.updateOutstanding = db.prepare<
      [KeyParams & { messageId: number | null; now: string }]
    >(`
      UPDATE questionnaires
         SET outstanding_message_id = @messageId,
             updated_at = @now
       WHERE chat_id = @chatId AND meeting_id = @meetingId
    `);
    this.selectProcessed = db.prepare<[string], { found: number }>(
      'SELECT 1 AS found FROM processed_meetings WHERE meeting_id = ?',
    );
    this.insertProcessed = db.prepare<[{ meetingId: string; now: string }]>(
      'INSERT OR IGNORE INTO processed_meetings (meeting_id, processed_at) VALUES (@meetingId, @now)',
    );
  }

  isProcessed(meetingId: string): boolean {
    return this.database.transaction(() => this.selectProcessed.get(meetingId) !== undefined);
  }

  markProcessed(meetingId: string): void {
    this.database.transaction(() => {
      this.insertProcessed.run({ meetingId, now: new Date().toISOString() });
    });
  }

  /**
   * Create the pending row, or return the row left behind by an earlier,
   * interrupted discovery of the same meeting.
   */
  insertOrGet(input: NewQuestionnaire): { questionnaire: Questionnaire; created: boolean } {
    return this.database.transaction(() => {
      const key = { chatId: input.chatId, meetingId: input.meetingId };
      const existing = this.selectOne.get(key);
      if (existing) {
        return { questionnaire: toQuestionnaire(existing), created: false };
      }

      this.insertRow.run({
        ...key,
        meetingName: input.meetingName,
        subjectId: input.subjectId,
        now: new Date().toISOString(),
      });
      return { questionnaire: this.getOrThrow(key), created: true };
    });
  }

  get(key: QuestionnaireKey): Questionnaire | null {
    return this.database.transaction(() => {
      const row = this.selectOne.get(toKeyParams(key));
      return row ? toQuestionnaire(row) : null;
    });
  }

  findPendingByMessage(chatId: string, messageId: number): Questionnaire | null {
    return this.database.transaction(() => {
      const row = this.selectPendingByMessage.get({ chatId, messageId });
      return row ? toQuestionnaire(row) : null;
    });
  }

  listPending(): Questionnaire[] {
    return this.database.transaction(() => this.selectPending.all().map(toQuestionnaire));
  }

  /**
   * Point a pending row at a freshly sent initial prompt, provided it still
   * points at `expectedMessageId`. With `markProcessed` the meeting joins the
   * processed set in the same transaction, whether or not the swap happened.
   */
  replacePrompt(
    key: QuestionnaireKey,
    expectedMessageId: number | null,
    nextMessageId: number,
    markProcessed: boolean,
  ): boolean {
    return this.database.transaction(() => {
      const now = new Date().toISOString();
      const swapped = this.compareAndSetOutstanding(key, 'pending', expectedMessageId, nextMessageId, now);
      if (markProcessed) {
        this.insertProcessed.run({ meetingId: key.meetingId, now });
      }
      return swapped;
    });
  }

  /**
   * Compare-and-set of the outstanding message reference. Succeeds only when
   * the row still has `expectedStatus` and still points at `expectedMessageId`.
   */
  swapOutstandingMessage(
    key: QuestionnaireKey,
    expectedStatus: QuestionnaireStatus,
    expectedMessageId: number | null,
    nextMessageId: number | null,
  ): boolean {
    return this.database.transaction(() =>
      this.compareAndSetOutstanding(
        key,
        expectedStatus,
        expectedMessageId,
        nextMessageId,
        new Date().toISOString(),
      ),
    );
  }

  /**
   * Read, transform and write one row atomically. A `StaleActionError`
   * thrown by `transform` rolls the transaction back untouched.
   */
  applyTransition(
    key: QuestionnaireKey,
    transform: (current: Questionnaire) => Questionnaire,
  ): { previous: Questionnaire; next: Questionnaire } {
    return this.database.transaction(() => {
      const row = this.selectOne.get(toKeyParams(key));
      if (!row) {
        throw new StaleActionError(
          `No questionnaire for chat=${key.chatId} meeting=${key.meetingId}`,
        );
      }

      const previous = toQuestionnaire(row);
      const next = transform(previous);
      const now = new Date().toISOString();
      this.updateState.run({
        ...toKeyParams(key),
        status: next.status,
        currentQuestion: next.currentQuestion,
        answers: JSON.stringify(next.answers),
        outstandingMessageId: next.outstandingMessageId,
        now,
      });
      return { previous, next: { ...next, updatedAt: now } };
    });
  }

  private compareAndSetOutstanding(
    key: QuestionnaireKey,
    expectedStatus: QuestionnaireStatus,
    expectedMessageId: number | null,
    nextMessageId: number | null,
    now: string,
  ): boolean {
    const row = this.selectOne.get(toKeyParams(key));
    if (
      !row ||
      row.status !== expectedStatus ||
      row.outstanding_message_id !== expectedMessageId
    ) {
      return false;
    }
    this.updateOutstanding.run({ ...toKeyParams(key), messageId: nextMessageId, now });
    return true;
  }

  private getOrThrow(key: QuestionnaireKey): Questionnaire {
    const row = this.selectOne.get(toKeyParams(key));
    if (!row) {
      throw new StaleActionError(
        `No questionnaire for chat=${key.chatId} meeting=${key.meetingId}`,
      );
    }
    return toQuestionnaire(row);
  }
}

function toKeyParams(key: QuestionnaireKey): KeyParams {
  return { chatId: key.chatId, meetingId: key.meetingId };
}

function toQuestionnaire(row: QuestionnaireRow): Questionnaire {
  return {
    chatId: row.chat_id,
    meetingId: row.meeting_id,
    meetingName: row.meeting_name,
    subjectId: row.subject_id,
    status: row.status,
    currentQuestion: row.current_question,
    answers: parseAnswers(row.answers),
    outstandingMessageId: row.outstanding_message_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function parseAnswers(raw: string): Answers {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new DataShapeError('questionnaire answers', [describeError(err)]);
  }

  const result = answersSchema.safeParse(json);
  if (!result.success) {
    throw new DataShapeError(
      'questionnaire answers',
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }

  const answers: Answers = {};
  for (const [question, score] of Object.entries(result.data)) {
    answers[Number(question)] = score;
  }
  return answers;
}
