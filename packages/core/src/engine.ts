import { createChildLogger, type Logger } from '@menu-editor/shared';
import { ActivityTracker } from './analytics/activity-tracker';
import { Dispatcher } from './bot/dispatcher';
import type { AppConfig } from './config';
import { JsonFileStore, type PersistenceGateway } from './db/json-store';
import { WriteCoalescer } from './db/write-coalescer';
import { ContentGraph } from './graph/content-graph';
import { SessionStore } from './session/session-store';
import { UserRegistry } from './users/user-registry';

export type EngineConfig = Pick<AppConfig, 'dataDir' | 'adminUserIds' | 'sessionTimeoutMinutes' | 'saveDebounceMs'>;

export interface CreateEngineOptions {
  config: EngineConfig;
  logger: Logger;
  store?: PersistenceGateway;
  clock?: () => Date;
}

export interface Engine {
  dispatcher: Dispatcher;
  graph: ContentGraph;
  users: UserRegistry;
  activity: ActivityTracker;
  sessions: SessionStore;
  coalescer: WriteCoalescer;
  /** Writes every pending store; call before exit */
  shutdown(): Promise<void>;
}

/**
 * Loads the three documents and wires the repositories, the write coalescer
 * and the dispatcher together.
 */
export async function createEngine(options: CreateEngineOptions): Promise<Engine> {
  const { config, logger } = options;
  const clock = options.clock ?? (() => new Date());
  const store =
    options.store ??
    new JsonFileStore({
      dataDir: config.dataDir,
      logger: createChildLogger(logger, { component: 'store' }),
      clock,
    });

  const [loadedGraph, loadedUsers, loadedAnalytics] = await Promise.all([
    store.loadGraph(),
    store.loadUsers(),
    store.loadAnalytics(),
  ]);
  if (loadedUsers.recovered) {
    logger.warn('Users file was damaged; first-user admin grant is disabled until an admin is configured');
  }

  const graph = new ContentGraph(loadedGraph.document, { clock, onChange: () => coalescer.schedule('graph') });
  const users = new UserRegistry(loadedUsers.document, {
    clock,
    onChange: () => coalescer.schedule('users'),
    allowBootstrap: !loadedUsers.recovered,
  });
  const activity = new ActivityTracker(users, loadedAnalytics.document, {
    clock,
    onChange: () => coalescer.schedule('analytics'),
    logger,
  });

  const coalescer = new WriteCoalescer(
    {
      graph: () => store.saveGraph(graph.toDocument()),
      users: () => store.saveUsers(users.toDocument()),
      analytics: () => store.saveAnalytics(activity.toDocument()),
    },
    { debounceMs: config.saveDebounceMs, logger: createChildLogger(logger, { component: 'coalescer' }) }
  );

  users.seedAdmins(config.adminUserIds);
  const sessions = new SessionStore({ clock });
  const dispatcher = new Dispatcher({
    graph,
    sessions,
    users,
    activity,
    logger: createChildLogger(logger, { component: 'dispatcher' }),
    clock,
    sessionTimeoutMinutes: config.sessionTimeoutMinutes,
  });

  logger.info(
    { ...graph.stats(), users: users.size, admins: users.adminIds().length, dataDir: config.dataDir },
    'Engine ready'
  );

  return {
    dispatcher,
    graph,
    users,
    activity,
    sessions,
    coalescer,
    shutdown: () => coalescer.flush(),
  };
}
