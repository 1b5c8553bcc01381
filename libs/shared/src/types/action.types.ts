export interface StartAction {
  action: 'start';
  chatId: string;
  meetingName: string;
}

export interface AnswerAction {
  action: 'answer';
  chatId: string;
  meetingId: string;
  questionIndex: number;
  score: number;
}

export type ParsedAction = StartAction | AnswerAction;
