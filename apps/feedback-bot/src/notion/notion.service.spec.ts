import { DataShapeError, TransientUpstreamError } from '@app/shared/errors/feedback.errors';
import { NotionService } from './notion.service';
import {
  FakeNotionGateway,
  createNotionService,
  meetingPage,
  personPage,
} from '../testing/fixtures';

describe('NotionService', () => {
  let gateway: FakeNotionGateway;
  let service: NotionService;

  const page = meetingPage({
    id: 'meeting-1',
    title: 'Weekly sync',
    mentorId: 'mentor-1',
    studentId: 'student-1',
    chatId: -1001,
    date: '2026-10-10',
    summary: 'Agreed on the next milestone',
  });

  beforeEach(() => {
    gateway = new FakeNotionGateway();
    gateway.pages.set('mentor-1', personPage('Alice Mentor'));
    gateway.pages.set('meeting-1', page);
    service = createNotionService(gateway);
  });

  describe('queryCompletedMeetings', () => {
    it('should keep only results that are pages', async () => {
      gateway.queryResults = [page, { object: 'database', id: 'db-1' }];

      const pages = await service.queryCompletedMeetings(new Date('2026-10-15T00:00:00.000Z'));

      expect(pages.map((p) => p.id)).toEqual(['meeting-1']);
    });

    it('should wrap client failures as TransientUpstreamError', async () => {
      jest.spyOn(gateway, 'queryDatabase').mockRejectedValue(new Error('socket hang up'));

      await expect(service.queryCompletedMeetings()).rejects.toThrow(
        new TransientUpstreamError('notion', 'query meetings: socket hang up'),
      );
    });
  });

  describe('toMeeting', () => {
    it('should build a meeting snapshot with the mentor name', async () => {
      await expect(service.toMeeting(page)).resolves.toEqual({
        id: 'meeting-1',
        title: 'Weekly sync',
        counterpartName: 'Alice Mentor',
        chatId: '-1001',
        subjectId: 'student-1',
        completedAt: '2026-10-10',
      });
    });

    it('should join multi-part titles', async () => {
      const split = meetingPage({
        id: 'meeting-2',
        title: 'Weekly',
        mentorId: 'mentor-1',
        studentId: 'student-1',
        chatId: 5,
        date: '2026-10-10',
      });
      split.properties.Name = { title: [{ plain_text: 'Weekly' }, { plain_text: ', sync' }] };

      expect((await service.toMeeting(split)).title).toBe('Weekly, sync');
    });

    it('should reject a meeting without a chat id', async () => {
      const noChat = { id: 'meeting-3', properties: { ...page.properties, TG_CHAT_ID: { rollup: { array: [] } } } };

      await expect(service.toMeeting(noChat)).rejects.toBeInstanceOf(DataShapeError);
    });

    it('should reject a meeting without a student', async () => {
      const noStudent = { id: 'meeting-4', properties: { ...page.properties, Student: { relation: [] } } };

      await expect(service.toMeeting(noStudent)).rejects.toThrow('Unexpected meeting meeting-4 shape');
    });
  });

  describe('getCounterpartName', () => {
    it('should resolve the first mentor of the meeting', async () => {
      await expect(service.getCounterpartName('meeting-1')).resolves.toBe('Alice Mentor');
    });

    it('should report a missing page as a transient failure', async () => {
      await expect(service.getCounterpartName('meeting-x')).rejects.toThrow(
        'notion: retrieve meeting: Could not find page with ID: meeting-x',
      );
    });
  });

  describe('getMeetingSummary', () => {
    it('should return the summary text', async () => {
      await expect(service.getMeetingSummary('meeting-1')).resolves.toBe(
        'Agreed on the next milestone',
      );
    });

    it('should return null for an empty or missing summary', async () => {
      gateway.pages.set('meeting-2', { properties: { Summary: { type: 'rich_text', rich_text: [] } } });
      gateway.pages.set('meeting-3', { properties: {} });
      gateway.pages.set('meeting-4', { properties: { Summary: { type: 'formula' } } });

      await expect(service.getMeetingSummary('meeting-2')).resolves.toBeNull();
      await expect(service.getMeetingSummary('meeting-3')).resolves.toBeNull();
      await expect(service.getMeetingSummary('meeting-4')).resolves.toBeNull();
    });
  });

  describe('createFeedbackRecord', () => {
    it('should create one page with all five scores', async () => {
      await service.createFeedbackRecord({
        meetingId: 'meeting-1',
        meetingName: 'Weekly sync',
        subjectId: 'student-1',
        chatId: '-1001',
        scores: [5, 4, 3, 2, 1],
        filledAt: '2026-10-11T09:30:00.000Z',
      });

      expect(gateway.created).toEqual([
        {
          databaseId: 'feedback-db',
          properties: {
            Meeting: { relation: [{ id: 'meeting-1' }] },
            Student: { relation: [{ id: 'student-1' }] },
            'Filler Name': { rich_text: [{ text: { content: 'BOT' } }] },
            Date: { date: { start: '2026-10-11T09:30:00.000Z' } },
            'Meeting Name': { title: [{ text: { content: 'Weekly sync' } }] },
            TG_CHAT_ID: { rich_text: [{ text: { content: '-1001' } }] },
            '[1] MEETING PRODUCTIVITY': { number: 5 },
            '[2] RESPONSE SPEED': { number: 4 },
            '[3] PLAN UNDERSTANDING': { number: 3 },
            '[4] EXPERTISE': { number: 2 },
            '[5] EFFECTIVENESS (TRACKER)': { number: 1 },
          },
        },
      ]);
    });

    it('should refuse an incomplete set of scores', async () => {
      await expect(
        service.createFeedbackRecord({
          meetingId: 'meeting-1',
          meetingName: 'Weekly sync',
          subjectId: 'student-1',
          chatId: '-1001',
          scores: [5, 4],
          filledAt: '2026-10-11T09:30:00.000Z',
        }),
      ).rejects.toBeInstanceOf(DataShapeError);
      expect(gateway.created).toHaveLength(0);
    });
  });

  describe('markFeedbackReceived', () => {
    it('should set the feedback flag on the meeting', async () => {
      await service.markFeedbackReceived('meeting-1');

      expect(gateway.updated).toEqual([
        { pageId: 'meeting-1', properties: { 'BOT Feedback Received': { checkbox: true } } },
      ]);
    });
  });
});
