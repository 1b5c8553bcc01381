import { registerAs } from '@nestjs/config';

function envInt(val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const telegramConfig = registerAs('telegram', () => ({
  botToken: process.env.TELEGRAM_BOT_TOKEN ?? '',
  botUsername: process.env.TELEGRAM_BOT_USERNAME || undefined,
  apiBase: process.env.TELEGRAM_API_BASE || 'https://api.telegram.org',
  longPollTimeoutSec: envInt(process.env.TELEGRAM_LONG_POLL_TIMEOUT_SEC, 30),
  errorChatId: process.env.ERROR_CHAT_ID || undefined,
}));

export const notionConfig = registerAs('notion', () => ({
  apiKey: process.env.NOTION_API_KEY ?? '',
  meetingsDbId: process.env.NOTION_MEETINGS_DB_ID ?? '',
  feedbackDbId: process.env.NOTION_FEEDBACK_DB_ID ?? '',
}));

export const pollingConfig = registerAs('polling', () => ({
  discoveryIntervalMs: envInt(process.env.DISCOVERY_INTERVAL_MS, 8 * 60 * 60 * 1000),
  discoveryWindowDays: envInt(process.env.DISCOVERY_WINDOW_DAYS, 14),
  reminderIntervalMs: envInt(process.env.REMINDER_INTERVAL_MS, 9600 * 1000),
  errorBackoffMs: envInt(process.env.POLL_ERROR_BACKOFF_MS, 5000),
}));

export const storageConfig = registerAs('storage', () => ({
  dbPath: process.env.DB_PATH || './data/feedback.db',
}));
