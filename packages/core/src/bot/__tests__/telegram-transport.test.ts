import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '@menu-editor/shared';

import { createReplyChannel, toInboundUser } from '../telegram-transport';

const keyboard = { inline_keyboard: [[{ text: 'A', callback_data: 'a' }]] };

function surface(editError?: Error) {
  return {
    reply: vi.fn(async () => undefined),
    editMessageText: vi.fn(async () => {
      if (editError) {
        throw editError;
      }
      return true;
    }),
  };
}

describe('createReplyChannel', () => {
  it('should send replies as MarkdownV2 with the keyboard', async () => {
    const target = surface();
    await createReplyChannel(target, createLogger('test')).reply({ text: 'Hi\\!', keyboard });

    expect(target.reply).toHaveBeenCalledWith('Hi\\!', { parse_mode: 'MarkdownV2', reply_markup: keyboard });
  });

  it('should edit in place when possible', async () => {
    const target = surface();
    await createReplyChannel(target, createLogger('test')).editInPlace({ text: 'Page' });

    expect(target.editMessageText).toHaveBeenCalledWith('Page', { parse_mode: 'MarkdownV2', reply_markup: undefined });
    expect(target.reply).not.toHaveBeenCalled();
  });

  it('should fall back to a new message when the edit fails', async () => {
    const target = surface(new Error('message to edit not found'));
    await createReplyChannel(target, createLogger('test')).editInPlace({ text: 'Page' });

    expect(target.reply).toHaveBeenCalledTimes(1);
  });

  it('should not resend an unchanged message', async () => {
    const target = surface(new Error('400: Bad Request: message is not modified'));
    await createReplyChannel(target, createLogger('test')).editInPlace({ text: 'Page' });

    expect(target.reply).not.toHaveBeenCalled();
  });
});

describe('toInboundUser', () => {
  it('should map the Telegram profile fields', () => {
    expect(toInboundUser({ id: 5, is_bot: false, first_name: 'Ada', username: 'ada' })).toEqual({
      id: 5,
      username: 'ada',
      firstName: 'Ada',
      lastName: null,
    });
  });
});
