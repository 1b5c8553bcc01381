export interface InlineButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboard {
  inline_keyboard: InlineButton[][];
}

export interface OutgoingMessage {
  text: string;
  keyboard?: InlineKeyboard;
}

export interface CallbackQueryEvent {
  kind: 'callback_query';
  updateId: number;
  callbackQueryId: string;
  data: string;
  chatId: string;
  messageId: number;
}

export interface TextMessageEvent {
  kind: 'text_message';
  updateId: number;
  chatId: string;
  messageId: number;
  text: string;
}

export type InboundEvent = CallbackQueryEvent | TextMessageEvent;

/** Raw update as received; the payload is parsed per event. */
export interface RawUpdate {
  update_id: number;
  callback_query?: unknown;
  message?: unknown;
}
