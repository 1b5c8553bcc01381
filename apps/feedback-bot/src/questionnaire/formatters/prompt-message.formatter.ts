import { OutgoingMessage, InlineKeyboard, InlineButton } from '@app/shared/types/telegram.types';
import {
  encodeStartAction,
  encodeAnswerAction,
} from '@app/shared/utils/action-parser.utils';
import {
  getQuestion,
  TOTAL_QUESTIONS,
  MIN_SCORE,
  MAX_SCORE,
} from '@app/shared/constants/questions';
import { escapeHtml } from '@app/shared/utils/html.utils';

export function buildInitialPrompt(
  chatId: string,
  meetingName: string,
  counterpartName: string,
): OutgoingMessage {
  const text =
    `Please leave feedback on the meeting:\n` +
    `<b>${escapeHtml(meetingName)}</b> with mentor ${escapeHtml(counterpartName)}.`;

  return {
    text,
    keyboard: {
      inline_keyboard: [
        [{ text: 'Start', callback_data: encodeStartAction(chatId, meetingName) }],
      ],
    },
  };
}

export function buildQuestionPrompt(
  chatId: string,
  meetingId: string,
  questionIndex: number,
): OutgoingMessage {
  const question = getQuestion(questionIndex);
  return {
    text: `<i>${questionIndex}/${TOTAL_QUESTIONS}</i>\n${escapeHtml(question.text)}`,
    keyboard: buildScoreKeyboard(chatId, meetingId, questionIndex),
  };
}

export function buildClosingMessage(summary: string | null): OutgoingMessage {
  const thanks = 'Thank you for your feedback!';
  if (!summary) {
    return { text: thanks };
  }
  return { text: `${thanks}\nMeeting summary:\n${escapeHtml(summary)}` };
}

function buildScoreKeyboard(
  chatId: string,
  meetingId: string,
  questionIndex: number,
): InlineKeyboard {
  const row: InlineButton[] = [];
  for (let score = MIN_SCORE; score <= MAX_SCORE; score++) {
    row.push({
      text: `${score} ⭐️`,
      callback_data: encodeAnswerAction(chatId, meetingId, questionIndex, score),
    });
  }
  return { inline_keyboard: [row] };
}
