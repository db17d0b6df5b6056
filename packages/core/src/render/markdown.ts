const RESERVED_CHARACTERS = new Set([
  '_', '*', '[', ']', '(', ')', '~', '`', '>', '#', '+', '-', '=', '|', '{', '}', '.', '!',
]);

/**
 * Escapes Telegram MarkdownV2 reserved characters.
 *
 * A backslash already followed by a reserved character (or another backslash)
 * is copied through as an escape pair, so escaping twice changes nothing.
 */
export function escapeMarkdown(text: string): string {
  let result = '';
  let index = 0;
  while (index < text.length) {
    const char = text[index];
    const next = text[index + 1];
    if (char === '\\') {
      if (next !== undefined && (next === '\\' || RESERVED_CHARACTERS.has(next))) {
        result += char + next;
        index += 2;
        continue;
      }
      result += '\\\\';
      index += 1;
      continue;
    }
    result += RESERVED_CHARACTERS.has(char) ? `\\${char}` : char;
    index += 1;
  }
  return result;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS` in the process time zone.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export interface TemplateValues {
  userId: number;
  now: Date;
  /** Only substituted into `{param}` when the callback carried a `:params` suffix */
  params?: string;
}

export function substituteTemplate(template: string, values: TemplateValues): string {
  let text = template;
  if (values.params !== undefined) {
    text = text.split('{param}').join(values.params);
  }
  text = text.split('{user_id}').join(String(values.userId));
  text = text.split('{timestamp}').join(formatTimestamp(values.now));
  return text;
}
