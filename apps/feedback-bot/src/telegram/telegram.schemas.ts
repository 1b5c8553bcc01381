import { z } from 'zod';
import { validateShape } from '@app/shared/utils/schema.utils';
import { InboundEvent, RawUpdate } from '@app/shared/types/telegram.types';

export const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export const sentMessageSchema = z.object({
  message_id: z.number().int(),
});

export const updatesSchema = z.array(
  z.object({
    update_id: z.number().int(),
    callback_query: z.unknown().optional(),
    message: z.unknown().optional(),
  }),
);

const chatMessageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({ id: z.number().int() }),
});

const callbackQuerySchema = z.object({
  id: z.string(),
  data: z.string().optional(),
  message: chatMessageSchema.optional(),
});

const textMessageSchema = chatMessageSchema.extend({
  text: z.string().optional(),
});

/**
 * Validate an update payload into an inbound event.
 * Returns null for update kinds the bot does not handle.
 */
export function parseInboundEvent(update: RawUpdate): InboundEvent | null {
  if (update.callback_query !== undefined) {
    const query = validateShape(callbackQuerySchema, update.callback_query, 'telegram callback_query');
    // Inline-mode presses carry no message; nothing to act on
    if (query.data === undefined || !query.message) return null;
    return {
      kind: 'callback_query',
      updateId: update.update_id,
      callbackQueryId: query.id,
      data: query.data,
      chatId: String(query.message.chat.id),
      messageId: query.message.message_id,
    };
  }

  if (update.message !== undefined) {
    const message = validateShape(textMessageSchema, update.message, 'telegram message');
    if (message.text === undefined) return null;
    return {
      kind: 'text_message',
      updateId: update.update_id,
      chatId: String(message.chat.id),
      messageId: message.message_id,
      text: message.text,
    };
  }

  return null;
}
