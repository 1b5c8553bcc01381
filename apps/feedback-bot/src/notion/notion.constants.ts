/** Property names of the meetings database */
export const MEETING_PROPS = {
  name: 'Name',
  status: 'Status',
  date: 'Date',
  mentors: 'Mentor(s)',
  student: 'Student',
  chatId: 'TG_CHAT_ID',
  summary: 'Summary',
  feedbackReceived: 'BOT Feedback Received',
} as const;

export const MEETING_DONE_STATUS = 'Done';

/** Property names of the feedback database (scores come from QUESTIONS) */
export const FEEDBACK_PROPS = {
  meeting: 'Meeting',
  student: 'Student',
  fillerName: 'Filler Name',
  date: 'Date',
  meetingName: 'Meeting Name',
  chatId: 'TG_CHAT_ID',
} as const;

export const FILLER_NAME = 'BOT';

/** Property holding the display name of people pages (mentors) */
export const PERSON_NAME_PROP = 'Name';
