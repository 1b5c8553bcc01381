import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { APIResponseError } from '@notionhq/client';
import { notionConfig, pollingConfig } from '@app/shared/config/configuration';
import { FeedbackRecord, Meeting, MeetingPage } from '@app/shared/types/meeting.types';
import {
  DataShapeError,
  TransientUpstreamError,
  describeError,
} from '@app/shared/errors/feedback.errors';
import { QUESTIONS } from '@app/shared/constants/questions';
import { validateShape } from '@app/shared/utils/schema.utils';
import {
  NOTION_GATEWAY,
  NotionGateway,
  CreateProperties,
} from './notion.gateway';
import {
  FEEDBACK_PROPS,
  FILLER_NAME,
  MEETING_DONE_STATUS,
  MEETING_PROPS,
  PERSON_NAME_PROP,
} from './notion.constants';
import {
  meetingPropertiesSchema,
  mentorRefSchema,
  pageSchema,
  personPageSchema,
  plainText,
  summaryPageSchema,
} from './notion.schemas';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Record store backed by two Notion databases: meetings (read, flag update)
 * and feedback (create).
 */
@Injectable()
export class NotionService {
  private readonly logger = new Logger(NotionService.name);

  constructor(
    @Inject(NOTION_GATEWAY)
    private readonly gateway: NotionGateway,
    @Inject(notionConfig.KEY)
    private readonly notionCfg: ConfigType<typeof notionConfig>,
    @Inject(pollingConfig.KEY)
    private readonly pollingCfg: ConfigType<typeof pollingConfig>,
  ) {}

  /**
   * Meetings that are done, dated within the trailing discovery window and
   * still without collected feedback. Results that are not pages are skipped.
   */
  async queryCompletedMeetings(now: Date = new Date()): Promise<MeetingPage[]> {
    const since = new Date(now.getTime() - this.pollingCfg.discoveryWindowDays * DAY_MS);

    const results = await this.request('query meetings', () =>
      this.gateway.queryDatabase(this.notionCfg.meetingsDbId, {
        and: [
          { property: MEETING_PROPS.status, status: { equals: MEETING_DONE_STATUS } },
          { property: MEETING_PROPS.date, date: { on_or_after: since.toISOString() } },
          { property: MEETING_PROPS.date, date: { on_or_before: now.toISOString() } },
          { property: MEETING_PROPS.feedbackReceived, checkbox: { equals: false } },
        ],
      }),
    );

    const pages: MeetingPage[] = [];
    for (const result of results) {
      const parsed = pageSchema.safeParse(result);
      if (parsed.success) {
        pages.push(parsed.data);
      } else {
        this.logger.warn('Skipping meetings query result without page properties');
      }
    }
    return pages;
  }

  /**
   * Turn a meeting page into a Meeting snapshot, resolving the mentor's
   * display name. Throws DataShapeError when a required property is missing.
   */
  async toMeeting(page: MeetingPage): Promise<Meeting> {
    const props = validateShape(meetingPropertiesSchema, page.properties, `meeting ${page.id}`);
    const mentorId = props[MEETING_PROPS.mentors].relation[0].id;
    const counterpartName = await this.getPageName(mentorId);

    return {
      id: page.id,
      title: plainText(props[MEETING_PROPS.name].title),
      counterpartName,
      chatId: String(props[MEETING_PROPS.chatId].rollup.array[0].number),
      subjectId: props[MEETING_PROPS.student].relation[0].id,
      completedAt: props[MEETING_PROPS.date].date.start,
    };
  }

  /** Current display name of the meeting's (first) mentor. */
  async getCounterpartName(meetingId: string): Promise<string> {
    const page = await this.request('retrieve meeting', () =>
      this.gateway.retrievePage(meetingId),
    );
    const meeting = validateShape(mentorRefSchema, page, `meeting ${meetingId}`);
    return this.getPageName(meeting.properties[MEETING_PROPS.mentors].relation[0].id);
  }

  /** Free-text summary of the meeting, or null when there is none. */
  async getMeetingSummary(meetingId: string): Promise<string | null> {
    const page = await this.request('retrieve meeting summary', () =>
      this.gateway.retrievePage(meetingId),
    );
    const summary = validateShape(summaryPageSchema, page, `meeting ${meetingId}`)
      .properties[MEETING_PROPS.summary];

    if (!summary || summary.type !== 'rich_text' || !summary.rich_text) {
      return null;
    }
    const text = plainText(summary.rich_text);
    return text.length > 0 ? text : null;
  }

  async createFeedbackRecord(record: FeedbackRecord): Promise<void> {
    if (record.scores.length !== QUESTIONS.length) {
      throw new DataShapeError('feedback record', [
        `expected ${QUESTIONS.length} scores, got ${record.scores.length}`,
      ]);
    }

    const scores: Record<string, { number: number }> = {};
    QUESTIONS.forEach((question, i) => {
      scores[question.feedbackProperty] = { number: record.scores[i] };
    });

    const properties: CreateProperties = {
      [FEEDBACK_PROPS.meeting]: { relation: [{ id: record.meetingId }] },
      [FEEDBACK_PROPS.student]: { relation: [{ id: record.subjectId }] },
      [FEEDBACK_PROPS.fillerName]: { rich_text: [{ text: { content: FILLER_NAME } }] },
      [FEEDBACK_PROPS.date]: { date: { start: record.filledAt } },
      [FEEDBACK_PROPS.meetingName]: { title: [{ text: { content: record.meetingName } }] },
      [FEEDBACK_PROPS.chatId]: { rich_text: [{ text: { content: record.chatId } }] },
      ...scores,
    };

    await this.request('create feedback record', () =>
      this.gateway.createPage(this.notionCfg.feedbackDbId, properties),
    );
    this.logger.log(`Feedback record created: meeting=${record.meetingId.slice(0, 8)}`);
  }

  async markFeedbackReceived(meetingId: string): Promise<void> {
    await this.request('mark feedback received', () =>
      this.gateway.updatePage(meetingId, {
        [MEETING_PROPS.feedbackReceived]: { checkbox: true },
      }),
    );
    this.logger.log(`Meeting flagged as feedback received: ${meetingId.slice(0, 8)}`);
  }

  private async getPageName(pageId: string): Promise<string> {
    const page = await this.request('retrieve person', () =>
      this.gateway.retrievePage(pageId),
    );
    const person = validateShape(personPageSchema, page, `page ${pageId}`);
    return plainText(person.properties[PERSON_NAME_PROP].title);
  }

  private async request<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof DataShapeError || err instanceof TransientUpstreamError) {
        throw err;
      }
      const status = APIResponseError.isAPIResponseError(err) ? err.status : undefined;
      throw new TransientUpstreamError('notion', `${operation}: ${describeError(err)}`, status);
    }
  }
}
