import { DataShapeError, TransientUpstreamError } from '@app/shared/errors/feedback.errors';
import { TelegramService } from './telegram.service';
import { telegramCfg } from '../testing/fixtures';

const mockFetch = jest.fn();
global.fetch = mockFetch;

function reply(body: unknown, status = 200) {
  return { ok: status < 400, status, json: () => Promise.resolve(body) };
}

function sentBody(): unknown {
  const [, init] = mockFetch.mock.calls[mockFetch.mock.calls.length - 1];
  return JSON.parse(init.body);
}

describe('TelegramService', () => {
  let service: TelegramService;

  beforeEach(() => {
    mockFetch.mockReset();
    service = new TelegramService(telegramCfg);
  });

  describe('sendMessage', () => {
    it('should post HTML text with the inline keyboard and return the message id', async () => {
      mockFetch.mockResolvedValue(reply({ ok: true, result: { message_id: 321, chat: { id: -1001 } } }));
      const keyboard = { inline_keyboard: [[{ text: 'Start', callback_data: 'start,-1001,Sync' }]] };

      const messageId = await service.sendMessage('-1001', { text: '<b>Hi</b>', keyboard });

      expect(messageId).toBe(321);
      expect(mockFetch).toHaveBeenCalledWith(
        'https://telegram.test/bot123456:test-token/sendMessage',
        expect.objectContaining({
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
        }),
      );
      expect(sentBody()).toEqual({
        chat_id: '-1001',
        text: '<b>Hi</b>',
        parse_mode: 'HTML',
        reply_markup: keyboard,
      });
    });

    it('should raise TransientUpstreamError when the API answers ok=false', async () => {
      mockFetch.mockResolvedValue(
        reply({ ok: false, error_code: 403, description: 'Forbidden: bot was kicked' }, 403),
      );

      const err = await service.sendMessage('-1001', { text: 'x' }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransientUpstreamError);
      expect(err).toMatchObject({
        upstream: 'telegram',
        status: 403,
        message: 'telegram: sendMessage failed: Forbidden: bot was kicked',
      });
    });

    it('should raise TransientUpstreamError on network failure', async () => {
      mockFetch.mockRejectedValue(new Error('ECONNRESET'));

      await expect(service.sendMessage('-1001', { text: 'x' })).rejects.toThrow(
        'telegram: sendMessage request failed: ECONNRESET',
      );
    });

    it('should raise TransientUpstreamError on a non-JSON body', async () => {
      mockFetch.mockResolvedValue({
        ok: false,
        status: 502,
        json: () => Promise.reject(new SyntaxError('Unexpected token <')),
      });

      await expect(service.sendMessage('-1001', { text: 'x' })).rejects.toBeInstanceOf(
        TransientUpstreamError,
      );
    });

    it('should raise DataShapeError when the result has no message id', async () => {
      mockFetch.mockResolvedValue(reply({ ok: true, result: { chat: { id: -1001 } } }));

      await expect(service.sendMessage('-1001', { text: 'x' })).rejects.toBeInstanceOf(
        DataShapeError,
      );
    });
  });

  describe('editMessage', () => {
    it('should edit text and keyboard in place', async () => {
      mockFetch.mockResolvedValue(reply({ ok: true, result: true }));

      await service.editMessage('-1001', 42, { text: 'Thanks' });

      expect(mockFetch.mock.calls[0][0]).toBe('https://telegram.test/bot123456:test-token/editMessageText');
      expect(sentBody()).toEqual({
        chat_id: '-1001',
        message_id: 42,
        text: 'Thanks',
        parse_mode: 'HTML',
      });
    });

    it('should treat "message is not modified" as success', async () => {
      mockFetch.mockResolvedValue(
        reply({
          ok: false,
          error_code: 400,
          description: 'Bad Request: message is not modified: specified new message content is the same',
        }, 400),
      );

      await expect(service.editMessage('-1001', 42, { text: 'Same' })).resolves.toBeUndefined();
    });

    it('should propagate other edit failures', async () => {
      mockFetch.mockResolvedValue(
        reply({ ok: false, error_code: 400, description: 'Bad Request: message to edit not found' }, 400),
      );

      await expect(service.editMessage('-1001', 42, { text: 'x' })).rejects.toThrow(
        'message to edit not found',
      );
    });
  });

  describe('deleteMessage and answerCallbackQuery', () => {
    it('should call the matching API methods', async () => {
      mockFetch.mockResolvedValue(reply({ ok: true, result: true }));

      await service.deleteMessage('-1001', 42);
      expect(sentBody()).toEqual({ chat_id: '-1001', message_id: 42 });

      await service.answerCallbackQuery('cb-1');
      expect(sentBody()).toEqual({ callback_query_id: 'cb-1' });
      expect(mockFetch.mock.calls.map(([url]) => url)).toEqual([
        'https://telegram.test/bot123456:test-token/deleteMessage',
        'https://telegram.test/bot123456:test-token/answerCallbackQuery',
      ]);
    });
  });

  describe('getUpdates', () => {
    it('should long-poll with the configured timeout and return the updates', async () => {
      const updates = [
        { update_id: 10, message: { message_id: 1, chat: { id: 5 }, text: '/chat_id' } },
      ];
      mockFetch.mockResolvedValue(reply({ ok: true, result: updates }));

      await expect(service.getUpdates(10)).resolves.toEqual(updates);
      expect(sentBody()).toEqual({
        offset: 10,
        timeout: 30,
        allowed_updates: ['message', 'callback_query'],
      });
    });

    it('should pass the abort signal and return nothing once aborted', async () => {
      const controller = new AbortController();
      mockFetch.mockImplementation(() => {
        controller.abort();
        return Promise.reject(new Error('This operation was aborted'));
      });

      await expect(service.getUpdates(0, controller.signal)).resolves.toEqual([]);
      expect(mockFetch.mock.calls[0][1].signal).toBe(controller.signal);
    });

    it('should raise when the request fails without an abort', async () => {
      mockFetch.mockRejectedValue(new Error('ETIMEDOUT'));

      await expect(service.getUpdates(0)).rejects.toBeInstanceOf(TransientUpstreamError);
    });
  });
});
