import type { InlineKeyboardMarkup } from 'telegraf/types';
import { escapeMarkdown } from './markdown';

/**
 * Text is always MarkdownV2, already escaped.
 */
export interface View {
  text: string;
  keyboard?: InlineKeyboardMarkup;
}

export function bold(text: string): string {
  return `*${escapeMarkdown(text)}*`;
}

export function plain(text: string): string {
  return escapeMarkdown(text);
}

export function code(text: string): string {
  return `\`${text.replace(/[`\\]/g, (char) => `\\${char}`)}\``;
}

/** Escapes a plain message and attaches an optional keyboard */
export function notice(text: string, keyboard?: InlineKeyboardMarkup): View {
  return keyboard ? { text: escapeMarkdown(text), keyboard } : { text: escapeMarkdown(text) };
}
