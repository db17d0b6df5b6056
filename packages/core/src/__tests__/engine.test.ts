import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger } from '@menu-editor/shared';

import { createEngine } from '../engine';
import { MemoryStore, recordingChannel, testUser } from '../test-utils/stand-ins';

const config = {
  dataDir: 'unused',
  adminUserIds: [500],
  sessionTimeoutMinutes: 30,
  saveDebounceMs: 1000,
};

describe('createEngine', () => {
  let store: MemoryStore;

  beforeEach(() => {
    vi.useFakeTimers();
    store = new MemoryStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should seed configured admins over the stored users', async () => {
    const engine = await createEngine({ config, logger: createLogger('test'), store });

    expect(engine.users.adminIds()).toEqual([500]);
    expect(engine.coalescer.pending).toEqual(['users']);
  });

  it('should not promote the first /start user when an admin is configured', async () => {
    const engine = await createEngine({ config, logger: createLogger('test'), store });
    const { channel } = recordingChannel();

    await engine.dispatcher.handleCommand(testUser(1, 'first'), 'start', channel);

    expect(engine.users.isAdmin(1)).toBe(false);
  });

  it('should keep the first-user admin grant closed after a damaged users file', async () => {
    store.recovered.add('users');
    const engine = await createEngine({
      config: { ...config, adminUserIds: [] },
      logger: createLogger('test'),
      store,
    });
    const { channel } = recordingChannel();

    await engine.dispatcher.handleCommand(testUser(1, 'first'), 'start', channel);

    expect(engine.users.isAdmin(1)).toBe(false);
  });

  it('should write pending changes on shutdown', async () => {
    const engine = await createEngine({ config, logger: createLogger('test'), store });
    const { channel } = recordingChannel();

    await engine.dispatcher.handleCommand(testUser(1, 'first'), 'start', channel);
    engine.graph.createPage('about', 'About', 'Us');
    await engine.shutdown();

    expect([...store.saves].sort()).toEqual(['analytics', 'graph', 'users']);
    expect(store.graph.pages.about?.title).toBe('About');
    expect(store.users.users['1']?.username).toBe('first');
    expect(store.analytics.pageViews).toEqual({ main: 1 });
  });

  it('should write each store once per debounce window', async () => {
    const engine = await createEngine({ config, logger: createLogger('test'), store });
    engine.graph.createPage('a', 'A', 'A');
    engine.graph.createPage('b', 'B', 'B');

    await vi.advanceTimersByTimeAsync(1000);
    await engine.coalescer.flush();

    expect(store.saves.filter((name) => name === 'graph')).toHaveLength(1);
    expect(Object.keys(store.graph.pages)).toEqual(['main', 'info', 'a', 'b']);
  });

  it('should reload what it wrote', async () => {
    const first = await createEngine({ config, logger: createLogger('test'), store });
    first.graph.addButton('main', 'Extra', 'extra');
    await first.shutdown();

    const second = await createEngine({ config, logger: createLogger('test'), store });

    expect(second.graph.getPage('main')?.buttons.map((button) => button.id)).toEqual([
      'btn_1',
      'btn_2',
      'btn_3',
      'btn_4',
    ]);
    expect(second.graph.addButton('info', 'More', 'more').id).toBe('btn_5');
  });
});

describe('createEngine with files on disk', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'menu-editor-engine-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should keep stored admins when one user record is broken', async () => {
    await writeFile(
      path.join(dataDir, 'users_database.json'),
      JSON.stringify({
        users: {
          '10': { role: 'admin', registeredAt: 'a', lastSeen: 'b' },
          '11': { role: 'admin', registeredAt: 'a', lastSeen: 'b' },
          '12': { role: 'user', lastSeen: 'b' },
        },
        roles: {
          user: { permissions: ['view_pages'] },
          staff: { permissions: ['view_pages', 'edit_content', 'view_analytics'] },
          admin: { permissions: ['all'] },
        },
      }),
      'utf-8'
    );
    const engine = await createEngine({
      config: { ...config, dataDir, adminUserIds: [] },
      logger: createLogger('test'),
    });
    const { channel } = recordingChannel();

    await engine.dispatcher.handleCommand(testUser(99, 'stranger'), 'start', channel);
    await engine.shutdown();

    const written: unknown = JSON.parse(await readFile(path.join(dataDir, 'users_database.json'), 'utf-8'));
    expect(engine.users.isAdmin(99)).toBe(false);
    expect(written).toMatchObject({
      users: { '10': { role: 'admin' }, '11': { role: 'admin' }, '99': { role: 'user' } },
    });
    expect(written).not.toHaveProperty(['users', '12']);
  });
});
