export interface QuestionDefinition {
  text: string;
  /** Numeric property of the feedback record that receives the score */
  feedbackProperty: string;
}

export const QUESTIONS: readonly QuestionDefinition[] = [
  {
    text: 'How productive was the meeting on the mentor\'s side?',
    feedbackProperty: '[1] MEETING PRODUCTIVITY',
  },
  {
    text: 'How quickly does your mentor answer your questions?',
    feedbackProperty: '[2] RESPONSE SPEED',
  },
  {
    text: 'How clear is your action plan until the next meeting?',
    feedbackProperty: '[3] PLAN UNDERSTANDING',
  },
  {
    text: 'Rate the mentor\'s expertise in the main topic of the meeting.',
    feedbackProperty: '[4] EXPERTISE',
  },
  {
    text: 'How quickly and effectively does your coordinator help you?',
    feedbackProperty: '[5] EFFECTIVENESS (TRACKER)',
  },
];

export const TOTAL_QUESTIONS = QUESTIONS.length;

export const MIN_SCORE = 1;
export const MAX_SCORE = 5;

export function getQuestion(index: number): QuestionDefinition {
  const question = QUESTIONS[index - 1];
  if (!question) {
    throw new RangeError(`Question index out of range: ${index}`);
  }
  return question;
}
