import { z } from 'zod';
import { EntityIdSchema, SESSION_DEFAULTS } from '@menu-editor/shared';

export const SESSION_STATES = [
  'waiting',
  'creating_page',
  'editing_page',
  'creating_button',
  'editing_button',
  'creating_action',
  'editing_action',
  'editing_welcome',
  'adding_admin',
  'searching_user',
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

type EmptyContext = Record<string, never>;

export interface SessionContextMap {
  waiting: EmptyContext;
  creating_page: EmptyContext;
  editing_page: { pageId: string };
  creating_button: { pageId: string };
  editing_button: { buttonId: string };
  creating_action: EmptyContext;
  editing_action: { actionId: string };
  editing_welcome: EmptyContext;
  adding_admin: EmptyContext;
  searching_user: EmptyContext;
}

type ContextSchemas = {
  [S in SessionState]: z.ZodType<SessionContextMap[S], z.ZodTypeDef, unknown>;
};

const EmptyContextSchema = z.object({}).strict();

export const SESSION_CONTEXT_SCHEMAS: ContextSchemas = {
  waiting: EmptyContextSchema,
  creating_page: EmptyContextSchema,
  editing_page: z.object({ pageId: EntityIdSchema }).strict(),
  creating_button: z.object({ pageId: EntityIdSchema }).strict(),
  editing_button: z.object({ buttonId: z.string().min(1) }).strict(),
  creating_action: EmptyContextSchema,
  editing_action: z.object({ actionId: EntityIdSchema }).strict(),
  editing_welcome: EmptyContextSchema,
  adding_admin: EmptyContextSchema,
  searching_user: EmptyContextSchema,
};

export interface Session {
  state: SessionState;
  enteredAt: Date;
  contextData: Record<string, unknown>;
}

export interface SessionStoreOptions {
  clock?: () => Date;
}

/**
 * Volatile per-user editor flow state. Nothing here is persisted.
 */
export class SessionStore {
  private readonly sessions = new Map<number, Session>();
  private readonly clock: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  begin<S extends SessionState>(userId: number, state: S, context: SessionContextMap[S]): void {
    this.sessions.set(userId, {
      state,
      enteredAt: this.clock(),
      contextData: { ...context },
    });
  }

  current(userId: number): SessionState {
    return this.sessions.get(userId)?.state ?? 'waiting';
  }

  has(userId: number): boolean {
    return this.sessions.has(userId);
  }

  /**
   * True when the user has a session in `expectedState` whose context matches
   * that state's schema. A session with a malformed context is dropped.
   */
  isValid(userId: number, expectedState: SessionState): boolean {
    const session = this.sessions.get(userId);
    if (!session || session.state !== expectedState) {
      return false;
    }
    const result = SESSION_CONTEXT_SCHEMAS[expectedState].safeParse(session.contextData);
    if (!result.success) {
      this.sessions.delete(userId);
      return false;
    }
    return true;
  }

  contextFor<S extends SessionState>(userId: number, state: S): SessionContextMap[S] | undefined {
    const session = this.sessions.get(userId);
    if (!session || session.state !== state) {
      return undefined;
    }
    const result = SESSION_CONTEXT_SCHEMAS[state].safeParse(session.contextData);
    if (!result.success) {
      this.sessions.delete(userId);
      return undefined;
    }
    return result.data;
  }

  clear(userId: number): void {
    this.sessions.delete(userId);
  }

  /**
   * Drops sessions idle for longer than the timeout and returns their user ids.
   */
  sweepExpired(now: Date = this.clock(), timeoutMinutes: number = SESSION_DEFAULTS.TIMEOUT_MINUTES): number[] {
    const cutoff = now.getTime() - timeoutMinutes * 60_000;
    const expired: number[] = [];
    for (const [userId, session] of this.sessions) {
      if (session.enteredAt.getTime() < cutoff) {
        expired.push(userId);
      }
    }
    for (const userId of expired) {
      this.sessions.delete(userId);
    }
    return expired;
  }

  get size(): number {
    return this.sessions.size;
  }
}
