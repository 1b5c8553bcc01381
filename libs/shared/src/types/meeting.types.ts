/** Snapshot of a completed meeting taken at discovery time. */
export interface Meeting {
  id: string;
  title: string;
  counterpartName: string;
  chatId: string;
  subjectId: string;
  completedAt: string;
}

/** Page returned by the meetings query, before its properties are parsed. */
export interface MeetingPage {
  id: string;
  properties: Record<string, unknown>;
}

export interface FeedbackRecord {
  meetingId: string;
  meetingName: string;
  subjectId: string;
  chatId: string;
  scores: number[];
  filledAt: string;
}
