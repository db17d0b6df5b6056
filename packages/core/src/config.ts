import { z } from 'zod';
import { SESSION_DEFAULTS, UserIdSchema, getTelegramBotToken, type Logger } from '@menu-editor/shared';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

function parseAdminUserIds(raw: string | undefined): number[] {
  return (raw ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean)
    .map((value) => Number(value))
    .filter((value) => Number.isFinite(value));
}

const ConfigSchema = z.object({
  botToken: z.string().min(1).optional(),
  dataDir: z.string().min(1).default('data'),
  adminUserIds: z.array(UserIdSchema),
  sessionTimeoutMinutes: z.coerce.number().int().positive().default(SESSION_DEFAULTS.TIMEOUT_MINUTES),
  saveDebounceMs: z.coerce.number().int().nonnegative().default(SESSION_DEFAULTS.SAVE_DEBOUNCE_MS),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Reads settings from the environment. Blank values fall back to defaults;
 * malformed numbers throw ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): AppConfig {
  const result = ConfigSchema.safeParse({
    botToken: getTelegramBotToken(env, logger),
    dataDir: blankToUndefined(env.DATA_DIR),
    adminUserIds: parseAdminUserIds(env.ADMIN_USER_IDS),
    sessionTimeoutMinutes: blankToUndefined(env.SESSION_TIMEOUT_MINUTES),
    saveDebounceMs: blankToUndefined(env.SAVE_DEBOUNCE_MS),
    logLevel: blankToUndefined(env.LOG_LEVEL)?.toLowerCase(),
  });
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}
