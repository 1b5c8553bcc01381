import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { z } from 'zod';
import { telegramConfig } from '@app/shared/config/configuration';
import { OutgoingMessage, RawUpdate } from '@app/shared/types/telegram.types';
import {
  TransientUpstreamError,
  describeError,
} from '@app/shared/errors/feedback.errors';
import {
  envelopeSchema,
  sentMessageSchema,
  updatesSchema,
} from './telegram.schemas';
import { validateShape } from '@app/shared/utils/schema.utils';

const NOT_MODIFIED = 'message is not modified';

/**
 * Telegram Bot API client. Every failure surfaces as TransientUpstreamError,
 * every unexpected response body as DataShapeError.
 */
@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);

  constructor(
    @Inject(telegramConfig.KEY)
    private readonly telegramCfg: ConfigType<typeof telegramConfig>,
  ) {}

  async sendMessage(chatId: string, message: OutgoingMessage): Promise<number> {
    const sent = await this.call(
      'sendMessage',
      {
        chat_id: chatId,
        text: message.text,
        parse_mode: 'HTML',
        reply_markup: message.keyboard,
      },
      sentMessageSchema,
    );
    return sent.message_id;
  }

  async editMessage(
    chatId: string,
    messageId: number,
    message: OutgoingMessage,
  ): Promise<void> {
    try {
      await this.call(
        'editMessageText',
        {
          chat_id: chatId,
          message_id: messageId,
          text: message.text,
          parse_mode: 'HTML',
          reply_markup: message.keyboard,
        },
        z.unknown(),
      );
    } catch (err) {
      // A replayed press re-renders the same content
      if (err instanceof TransientUpstreamError && err.message.includes(NOT_MODIFIED)) {
        this.logger.debug(`Edit skipped (not modified): chat=${chatId} message=${messageId}`);
        return;
      }
      throw err;
    }
  }

  async deleteMessage(chatId: string, messageId: number): Promise<void> {
    await this.call(
      'deleteMessage',
      { chat_id: chatId, message_id: messageId },
      z.unknown(),
    );
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    await this.call(
      'answerCallbackQuery',
      { callback_query_id: callbackQueryId },
      z.unknown(),
    );
  }

  /**
   * Long-poll for updates after `offset`. Resolves with an empty list when
   * `signal` aborts the request.
   */
  async getUpdates(offset: number, signal?: AbortSignal): Promise<RawUpdate[]> {
    try {
      return await this.call(
        'getUpdates',
        {
          offset,
          timeout: this.telegramCfg.longPollTimeoutSec,
          allowed_updates: ['message', 'callback_query'],
        },
        updatesSchema,
        signal,
      );
    } catch (err) {
      if (signal?.aborted) return [];
      throw err;
    }
  }

  private async call<T>(
    method: string,
    payload: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<T> {
    const url = `${this.telegramCfg.apiBase}/bot${this.telegramCfg.botToken}/${method}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (err) {
      throw new TransientUpstreamError('telegram', `${method} request failed: ${describeError(err)}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new TransientUpstreamError(
        'telegram',
        `${method} returned a non-JSON body (HTTP ${res.status}): ${describeError(err)}`,
        res.status,
      );
    }

    const envelope = validateShape(envelopeSchema, body, `telegram ${method} response`);
    if (!envelope.ok) {
      throw new TransientUpstreamError(
        'telegram',
        `${method} failed: ${envelope.description ?? 'unknown error'}`,
        envelope.error_code ?? res.status,
      );
    }

    return validateShape(schema, envelope.result, `telegram ${method} result`);
  }
}
