import type {
  AnalyticsDocument,
  GraphDocument,
  UsersDocument,
} from '@menu-editor/shared';
import type { InboundUser, ReplyChannel } from '../bot/dispatcher';
import type { LoadedDocument, PersistenceGateway, StoreName } from '../db/json-store';
import { createDefaultAnalytics, createDefaultGraph, createDefaultUsers } from '../db/defaults';
import type { View } from '../render/view';

export interface SentView {
  mode: 'reply' | 'edit';
  view: View;
}

export function recordingChannel(): { sent: SentView[]; channel: ReplyChannel } {
  const sent: SentView[] = [];
  return {
    sent,
    channel: {
      reply: async (view) => {
        sent.push({ mode: 'reply', view });
      },
      editInPlace: async (view) => {
        sent.push({ mode: 'edit', view });
      },
    },
  };
}

export function testUser(id: number, username?: string): InboundUser {
  return { id, username: username ?? null, firstName: `User${id}`, lastName: null };
}

/**
 * In-process persistence: documents are deep-copied in and out so callers
 * never share state with what was "written".
 */
export class MemoryStore implements PersistenceGateway {
  graph: GraphDocument;
  users: UsersDocument;
  analytics: AnalyticsDocument;
  readonly saves: string[] = [];
  /** Loads report these documents as recovered from a damaged file */
  readonly recovered = new Set<StoreName>();

  constructor(now: Date = new Date('2024-01-01T00:00:00.000Z')) {
    this.graph = createDefaultGraph(now);
    this.users = createDefaultUsers(now);
    this.analytics = createDefaultAnalytics(now);
  }

  async loadGraph(): Promise<LoadedDocument<GraphDocument>> {
    return { document: structuredClone(this.graph), recovered: this.recovered.has('graph') };
  }

  async saveGraph(document: GraphDocument): Promise<void> {
    this.graph = structuredClone(document);
    this.saves.push('graph');
  }

  async loadUsers(): Promise<LoadedDocument<UsersDocument>> {
    return { document: structuredClone(this.users), recovered: this.recovered.has('users') };
  }

  async saveUsers(document: UsersDocument): Promise<void> {
    this.users = structuredClone(document);
    this.saves.push('users');
  }

  async loadAnalytics(): Promise<LoadedDocument<AnalyticsDocument>> {
    return { document: structuredClone(this.analytics), recovered: this.recovered.has('analytics') };
  }

  async saveAnalytics(document: AnalyticsDocument): Promise<void> {
    this.analytics = structuredClone(document);
    this.saves.push('analytics');
  }
}
