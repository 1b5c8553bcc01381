import { ParsedAction } from '../types/action.types';
import { TOTAL_QUESTIONS, MIN_SCORE, MAX_SCORE } from '../constants/questions';

/** Telegram rejects callback_data longer than 64 bytes */
export const MAX_CALLBACK_DATA_BYTES = 64;

const CHAT_ID_RE = /^-?\d+$/;
const MEETING_ID_RE = /^[a-zA-Z0-9\-]+$/;
const UINT_RE = /^\d+$/;

/**
 * Build the payload of the "Start" button: `start,{chatId},{meetingName}`.
 * The meeting name is the last field and is cut so the payload fits the
 * callback_data limit; it is informational only.
 */
export function encodeStartAction(chatId: string, meetingName: string): string {
  const prefix = `start,${chatId},`;
  const budget = MAX_CALLBACK_DATA_BYTES - Buffer.byteLength(prefix, 'utf8');
  return prefix + truncateUtf8(meetingName, budget);
}

/**
 * Build the payload of a score button:
 * `answer,{chatId},{meetingId},{questionIndex},{score}`.
 */
export function encodeAnswerAction(
  chatId: string,
  meetingId: string,
  questionIndex: number,
  score: number,
): string {
  return `answer,${chatId},${meetingId},${questionIndex},${score}`;
}

/**
 * Parse a button payload. Returns null when the field count, the action or
 * any field value is invalid.
 *
 * Everything after the second comma of a start payload is the meeting name,
 * so commas inside the name survive.
 */
export function parseAction(data: string): ParsedAction | null {
  const parts = data.split(',');
  const [action, chatId] = parts;
  if (!chatId || !CHAT_ID_RE.test(chatId)) return null;

  if (action === 'start') {
    if (parts.length < 3) return null;
    return {
      action: 'start',
      chatId,
      meetingName: parts.slice(2).join(','),
    };
  }

  if (action === 'answer') {
    if (parts.length !== 5) return null;
    const [, , meetingId, rawQuestion, rawScore] = parts;
    if (!MEETING_ID_RE.test(meetingId)) return null;

    const questionIndex = parseBoundedInt(rawQuestion, 1, TOTAL_QUESTIONS);
    const score = parseBoundedInt(rawScore, MIN_SCORE, MAX_SCORE);
    if (questionIndex === null || score === null) return null;

    return { action: 'answer', chatId, meetingId, questionIndex, score };
  }

  return null;
}

function parseBoundedInt(value: string, min: number, max: number): number | null {
  if (!UINT_RE.test(value)) return null;
  const parsed = parseInt(value, 10);
  return parsed >= min && parsed <= max ? parsed : null;
}

function truncateUtf8(value: string, maxBytes: number): string {
  if (maxBytes <= 0) return '';
  if (Buffer.byteLength(value, 'utf8') <= maxBytes) return value;

  let result = '';
  let used = 0;
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (used + size > maxBytes) break;
    result += char;
    used += size;
  }
  return result;
}
