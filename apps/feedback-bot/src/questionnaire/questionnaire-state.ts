import { Questionnaire } from '@app/shared/types/questionnaire.types';
import { DataShapeError, StaleActionError } from '@app/shared/errors/feedback.errors';
import { TOTAL_QUESTIONS, MIN_SCORE, MAX_SCORE } from '@app/shared/constants/questions';

/**
 * Pure transitions of the questionnaire lifecycle:
 * pending → in_progress → completed. Anything else is a StaleActionError.
 */

export function startQuestionnaire(current: Questionnaire, messageId: number): Questionnaire {
  if (current.status !== 'pending') {
    throw new StaleActionError(`Cannot start questionnaire in status ${current.status}`);
  }
  assertOutstanding(current, messageId);

  return {
    ...current,
    status: 'in_progress',
    currentQuestion: 1,
  };
}

export function answerQuestion(
  current: Questionnaire,
  questionIndex: number,
  score: number,
  messageId: number,
): Questionnaire {
  if (current.status !== 'in_progress') {
    throw new StaleActionError(`Cannot answer questionnaire in status ${current.status}`);
  }
  if (questionIndex !== current.currentQuestion) {
    throw new StaleActionError(
      `Answer for question ${questionIndex}, current is ${current.currentQuestion}`,
    );
  }
  if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) {
    throw new StaleActionError(`Score out of range: ${score}`);
  }
  assertOutstanding(current, messageId);

  const answers = { ...current.answers, [questionIndex]: score };

  if (questionIndex < TOTAL_QUESTIONS) {
    return {
      ...current,
      answers,
      currentQuestion: questionIndex + 1,
    };
  }

  return {
    ...current,
    answers,
    status: 'completed',
    outstandingMessageId: null,
  };
}

export function isComplete(questionnaire: Questionnaire): boolean {
  return questionnaire.status === 'completed';
}

/** Scores in question order; only meaningful once completed. */
export function collectScores(questionnaire: Questionnaire): number[] {
  const scores: number[] = [];
  for (let q = 1; q <= TOTAL_QUESTIONS; q++) {
    const score = questionnaire.answers[q];
    if (score === undefined) {
      throw new DataShapeError('questionnaire answers', [`missing answer for question ${q}`]);
    }
    scores.push(score);
  }
  return scores;
}

function assertOutstanding(current: Questionnaire, messageId: number): void {
  if (current.outstandingMessageId !== messageId) {
    throw new StaleActionError(
      `Message ${messageId} is not the live prompt (${current.outstandingMessageId ?? 'none'})`,
    );
  }
}
