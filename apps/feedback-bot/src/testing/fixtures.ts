import { ConfigType } from '@nestjs/config';
import {
  notionConfig,
  pollingConfig,
  storageConfig,
  telegramConfig,
} from '@app/shared/config/configuration';
import { Meeting } from '@app/shared/types/meeting.types';
import { DatabaseService } from '../store/database.service';
import { QuestionnaireRepository } from '../store/questionnaire.repository';
import { TelegramService } from '../telegram/telegram.service';
import { OperatorAlertService } from '../telegram/operator-alert.service';
import { NotionService } from '../notion/notion.service';
import {
  CreateProperties,
  NotionGateway,
  QueryFilter,
  UpdateProperties,
} from '../notion/notion.gateway';

export const telegramCfg: ConfigType<typeof telegramConfig> = {
  botToken: '123456:test-token',
  botUsername: 'feedback_test_bot',
  apiBase: 'https://telegram.test',
  longPollTimeoutSec: 30,
  errorChatId: undefined,
};

export const notionCfg: ConfigType<typeof notionConfig> = {
  apiKey: 'test-secret',
  meetingsDbId: 'meetings-db',
  feedbackDbId: 'feedback-db',
};

export const pollingCfg: ConfigType<typeof pollingConfig> = {
  discoveryIntervalMs: 28800000,
  discoveryWindowDays: 14,
  reminderIntervalMs: 9600000,
  errorBackoffMs: 5000,
};

export const memoryStorageCfg: ConfigType<typeof storageConfig> = {
  dbPath: ':memory:',
};

export function createRepository(): { database: DatabaseService; repository: QuestionnaireRepository } {
  const database = new DatabaseService(memoryStorageCfg);
  return { database, repository: new QuestionnaireRepository(database) };
}

/**
 * A TelegramService whose API methods are replaced by spies. Sent messages
 * receive increasing ids starting at `firstMessageId`.
 */
export function stubTelegram(firstMessageId = 100) {
  const service = new TelegramService(telegramCfg);
  let nextMessageId = firstMessageId;

  return {
    service,
    sendMessage: jest
      .spyOn(service, 'sendMessage')
      .mockImplementation(async () => nextMessageId++),
    editMessage: jest.spyOn(service, 'editMessage').mockResolvedValue(undefined),
    deleteMessage: jest.spyOn(service, 'deleteMessage').mockResolvedValue(undefined),
    answerCallbackQuery: jest
      .spyOn(service, 'answerCallbackQuery')
      .mockResolvedValue(undefined),
    getUpdates: jest.spyOn(service, 'getUpdates').mockResolvedValue([]),
  };
}

export type TelegramStub = ReturnType<typeof stubTelegram>;

export function createAlertService(telegram: TelegramService): OperatorAlertService {
  return new OperatorAlertService(telegram, telegramCfg);
}

/** In-memory stand-in for the Notion API. */
export class FakeNotionGateway implements NotionGateway {
  readonly pages = new Map<string, unknown>();
  queryResults: unknown[] = [];
  readonly queries: { databaseId: string; filter: QueryFilter }[] = [];
  readonly created: { databaseId: string; properties: CreateProperties }[] = [];
  readonly updated: { pageId: string; properties: UpdateProperties }[] = [];

  async queryDatabase(databaseId: string, filter: QueryFilter): Promise<unknown[]> {
    this.queries.push({ databaseId, filter });
    return this.queryResults;
  }

  async retrievePage(pageId: string): Promise<unknown> {
    const page = this.pages.get(pageId);
    if (page === undefined) {
      throw new Error(`Could not find page with ID: ${pageId}`);
    }
    return page;
  }

  async createPage(databaseId: string, properties: CreateProperties): Promise<unknown> {
    this.created.push({ databaseId, properties });
    return { id: `created-${this.created.length}` };
  }

  async updatePage(pageId: string, properties: UpdateProperties): Promise<unknown> {
    this.updated.push({ pageId, properties });
    return { id: pageId };
  }
}

export function createNotionService(gateway: NotionGateway = new FakeNotionGateway()): NotionService {
  return new NotionService(gateway, notionCfg, pollingCfg);
}

export function personPage(name: string): unknown {
  return {
    id: `person-${name}`,
    properties: { Name: { title: [{ plain_text: name }] } },
  };
}

export interface MeetingPageOptions {
  id: string;
  title: string;
  mentorId: string;
  studentId: string;
  chatId: number;
  date: string;
  summary?: string;
}

export function meetingPage(options: MeetingPageOptions): { id: string; properties: Record<string, unknown> } {
  return {
    id: options.id,
    properties: {
      Name: { title: [{ plain_text: options.title }] },
      'Mentor(s)': { relation: [{ id: options.mentorId }] },
      Student: { relation: [{ id: options.studentId }] },
      TG_CHAT_ID: { rollup: { array: [{ number: options.chatId }] } },
      Date: { date: { start: options.date } },
      Summary: {
        type: 'rich_text',
        rich_text: options.summary === undefined ? [] : [{ plain_text: options.summary }],
      },
    },
  };
}

export function meeting(overrides: Partial<Meeting> = {}): Meeting {
  return {
    id: 'meeting-1',
    title: 'Weekly sync',
    counterpartName: 'Alice Mentor',
    chatId: '-1001',
    subjectId: 'student-1',
    completedAt: '2026-10-10',
    ...overrides,
  };
}
