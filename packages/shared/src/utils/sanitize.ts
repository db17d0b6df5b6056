import { CONTENT_LIMITS } from '../constants/limits.js';

// Control characters below U+0020 except tab and newline, plus DEL.
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F]/g;

/**
 * Strips control characters and caps the length of free-text input.
 */
export function sanitizeInput(text: string | null | undefined, maxLength: number = CONTENT_LIMITS.MAX_INPUT_LENGTH): string {
  if (!text) {
    return '';
  }
  return text.replace(CONTROL_CHARS, '').slice(0, maxLength);
}
