import type { Action, Page } from '@menu-editor/shared';
import { getPageKeyboard } from '../bot/keyboards';
import { escapeMarkdown, substituteTemplate } from './markdown';
import type { View } from './view';

export const DEFAULT_LINK_TEXT = 'Open link';

export function renderPage(page: Page, mainMenuPageId: string): View {
  const text = `**${escapeMarkdown(page.title)}**\n\n${escapeMarkdown(page.content)}`;
  return {
    text,
    keyboard: getPageKeyboard(page, page.id === mainMenuPageId),
  };
}

export interface MessageContext {
  userId: number;
  now: Date;
  params?: string;
}

/**
 * Substitutes template tokens, then escapes.
 */
export function renderMessageAction(action: Action, context: MessageContext): View {
  return { text: escapeMarkdown(substituteTemplate(action.content, context)) };
}

function escapeLinkTarget(url: string): string {
  return url.replace(/[)\\]/g, (char) => `\\${char}`);
}

export function renderUrlAction(action: Action, params?: string): View {
  const base = action.url ?? action.content;
  const target = params !== undefined ? `${base}${params}` : base;
  return { text: `🔗 [${escapeMarkdown(DEFAULT_LINK_TEXT)}](${escapeLinkTarget(target)})` };
}
