import * as Joi from 'joi';

export const validationSchema = Joi.object({
  // Required - Telegram
  TELEGRAM_BOT_TOKEN: Joi.string()
    .pattern(/^\d+:[\w-]+$/)
    .required()
    .messages({
      'any.required':
        'TELEGRAM_BOT_TOKEN is required. Create a bot with @BotFather to get one.',
      'string.pattern.base':
        'TELEGRAM_BOT_TOKEN must look like "<bot id>:<secret>"',
    }),

  // Optional - Telegram
  TELEGRAM_BOT_USERNAME: Joi.string().optional(),
  TELEGRAM_API_BASE: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .default('https://api.telegram.org'),
  TELEGRAM_LONG_POLL_TIMEOUT_SEC: Joi.number().integer().min(0).max(50).default(30),
  ERROR_CHAT_ID: Joi.string()
    .pattern(/^-?\d+$/)
    .optional()
    .messages({
      'string.pattern.base': 'ERROR_CHAT_ID must be a numeric Telegram chat id',
    }),

  // Required - Notion
  NOTION_API_KEY: Joi.string().required().messages({
    'any.required':
      'NOTION_API_KEY is required. Create an internal integration at https://www.notion.so/my-integrations',
  }),
  NOTION_MEETINGS_DB_ID: Joi.string().required().messages({
    'any.required': 'NOTION_MEETINGS_DB_ID is required (database holding meetings).',
  }),
  NOTION_FEEDBACK_DB_ID: Joi.string().required().messages({
    'any.required': 'NOTION_FEEDBACK_DB_ID is required (database receiving feedback).',
  }),

  // Optional - Polling
  DISCOVERY_INTERVAL_MS: Joi.number().integer().min(60000).max(2147483647).default(28800000),
  DISCOVERY_WINDOW_DAYS: Joi.number().integer().min(1).max(365).default(14),
  REMINDER_INTERVAL_MS: Joi.number().integer().min(60000).max(2147483647).default(9600000),
  POLL_ERROR_BACKOFF_MS: Joi.number().integer().min(100).max(600000).default(5000),

  // Optional - Storage
  DB_PATH: Joi.string().optional().default('./data/feedback.db'),

  // Optional - Logging
  LOG_LEVEL: Joi.string()
    .valid('debug', 'info', 'warn', 'error')
    .default('info'),
}).options({ allowUnknown: true });
