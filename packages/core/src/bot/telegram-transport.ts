import type { Context, Telegraf } from 'telegraf';
import { callbackQuery, message } from 'telegraf/filters';
import type { User } from 'telegraf/types';
import type { Logger } from '@menu-editor/shared';
import type { View } from '../render/view';
import { COMMANDS, type Dispatcher, type InboundUser, type ReplyChannel } from './dispatcher';

type ExtraReplyMessage = NonNullable<Parameters<Context['reply']>[1]>;
type ExtraEditMessageText = NonNullable<Parameters<Context['editMessageText']>[1]>;

/** The part of a Telegraf context a reply channel writes through */
export interface MessageSurface {
  reply(text: string, extra: ExtraReplyMessage): Promise<unknown>;
  editMessageText(text: string, extra: ExtraEditMessageText): Promise<unknown>;
}

export function toInboundUser(from: User): InboundUser {
  return {
    id: from.id,
    username: from.username ?? null,
    firstName: from.first_name,
    lastName: from.last_name ?? null,
  };
}

function isNotModified(error: unknown): boolean {
  return error instanceof Error && error.message.includes('message is not modified');
}

/**
 * Sends views as MarkdownV2. An edit that Telegram refuses falls back to a
 * new message, except when the content is unchanged.
 */
export function createReplyChannel(surface: MessageSurface, logger: Logger): ReplyChannel {
  const reply = async (view: View): Promise<void> => {
    await surface.reply(view.text, { parse_mode: 'MarkdownV2', reply_markup: view.keyboard });
  };

  return {
    reply,
    async editInPlace(view) {
      try {
        await surface.editMessageText(view.text, { parse_mode: 'MarkdownV2', reply_markup: view.keyboard });
      } catch (error) {
        if (isNotModified(error)) {
          return;
        }
        logger.warn({ error }, 'Failed to edit message, sending a new one');
        await reply(view);
      }
    },
  };
}

export function registerHandlers(bot: Telegraf<Context>, dispatcher: Dispatcher, logger: Logger): void {
  bot.use(async (ctx, next) => {
    const messageText = ctx.message && 'text' in ctx.message ? ctx.message.text : undefined;
    logger.debug(
      {
        userId: ctx.from?.id,
        chatId: ctx.chat?.id,
        updateType: ctx.updateType,
        isCommand: Boolean(messageText?.startsWith('/')),
        updateId: ctx.update.update_id,
      },
      'Update received'
    );
    await next();
  });

  for (const command of COMMANDS) {
    bot.command(command, async (ctx) => {
      if (!ctx.from) {
        return;
      }
      await dispatcher.handleCommand(toInboundUser(ctx.from), command, createReplyChannel(ctx, logger));
    });
  }

  bot.on(callbackQuery('data'), async (ctx) => {
    const { data: token, from } = ctx.callbackQuery;
    try {
      await ctx.answerCbQuery();
    } catch (error) {
      logger.warn({ userId: from.id, token, error }, 'Failed to answer callback query');
    }
    await dispatcher.handleCallback(toInboundUser(from), token, createReplyChannel(ctx, logger));
  });

  bot.on(message('text'), async (ctx) => {
    if (!ctx.from) {
      return;
    }
    if (ctx.message.text.startsWith('/')) {
      logger.debug({ userId: ctx.from.id, text: ctx.message.text }, 'Unknown command ignored');
      return;
    }
    await dispatcher.handleText(toInboundUser(ctx.from), ctx.message.text, createReplyChannel(ctx, logger));
  });

  bot.catch((error, ctx) => {
    logger.error({ error, updateId: ctx.update.update_id, updateType: ctx.updateType }, 'Unhandled bot error');
  });
}
