export type QuestionnaireStatus = 'pending' | 'in_progress' | 'completed';

/** question index (1-based) → score */
export type Answers = Record<number, number>;

export interface QuestionnaireKey {
  chatId: string;
  meetingId: string;
}

export interface Questionnaire extends QuestionnaireKey {
  meetingName: string;
  subjectId: string;
  status: QuestionnaireStatus;
  currentQuestion: number;
  answers: Answers;
  outstandingMessageId: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewQuestionnaire extends QuestionnaireKey {
  meetingName: string;
  subjectId: string;
}
