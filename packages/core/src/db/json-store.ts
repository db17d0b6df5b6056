import { copyFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';
import {
  ActionSchema,
  AnalyticsDocumentSchema,
  GraphDocumentSchema,
  PageSchema,
  UserRecordSchema,
  UsersDocumentSchema,
  type AnalyticsDocument,
  type GraphDocument,
  type Logger,
  type UsersDocument,
} from '@menu-editor/shared';
import { createDefaultAnalytics, createDefaultGraph, createDefaultUsers } from './defaults';

export const STORE_FILES = {
  graph: 'bot_database.json',
  users: 'users_database.json',
  analytics: 'analytics_database.json',
} as const;

export type StoreName = keyof typeof STORE_FILES;

export interface LoadedDocument<T> {
  document: T;
  /** The file existed but some or all of it could not be used */
  recovered: boolean;
}

/**
 * Load/save gateway for the three JSON documents.
 */
export interface PersistenceGateway {
  loadGraph(): Promise<LoadedDocument<GraphDocument>>;
  saveGraph(document: GraphDocument): Promise<void>;
  loadUsers(): Promise<LoadedDocument<UsersDocument>>;
  saveUsers(document: UsersDocument): Promise<void>;
  loadAnalytics(): Promise<LoadedDocument<AnalyticsDocument>>;
  saveAnalytics(document: AnalyticsDocument): Promise<void>;
}

/** A keyed collection inside a document whose entries are checked one by one */
export interface RecordCollection {
  field: string;
  schema: z.ZodTypeAny;
  keyPattern?: RegExp;
}

const GRAPH_COLLECTIONS: RecordCollection[] = [
  { field: 'pages', schema: PageSchema },
  { field: 'actions', schema: ActionSchema },
];

const USERS_COLLECTIONS: RecordCollection[] = [{ field: 'users', schema: UserRecordSchema, keyPattern: /^\d+$/ }];

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Drops entries that fail their schema so one bad record does not cost the
 * whole document. Returns the ids that were dropped, as `field.id`.
 */
export function dropInvalidRecords(
  document: unknown,
  collections: readonly RecordCollection[]
): { document: unknown; dropped: string[] } {
  if (!isPlainObject(document)) {
    return { document, dropped: [] };
  }
  const result: Record<string, unknown> = { ...document };
  const dropped: string[] = [];
  for (const { field, schema, keyPattern } of collections) {
    const entries = result[field];
    if (!isPlainObject(entries)) {
      continue;
    }
    const kept: Record<string, unknown> = {};
    for (const [id, entry] of Object.entries(entries)) {
      if ((keyPattern === undefined || keyPattern.test(id)) && schema.safeParse(entry).success) {
        kept[id] = entry;
      } else {
        dropped.push(`${field}.${id}`);
      }
    }
    result[field] = kept;
  }
  return { document: result, dropped };
}

export interface JsonFileStoreOptions {
  dataDir: string;
  logger: Logger;
  clock?: () => Date;
}

export class JsonFileStore implements PersistenceGateway {
  /** Stores whose unusable file could not be set aside; never overwritten */
  private readonly protectedStores = new Set<StoreName>();
  private readonly dataDir: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: JsonFileStoreOptions) {
    this.dataDir = options.dataDir;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  filePath(name: StoreName): string {
    return path.join(this.dataDir, STORE_FILES[name]);
  }

  /**
   * Missing file: defaults are written and returned. A file that cannot be
   * used as stored is copied or moved aside to `<file>.corrupt-<time>`
   * before anything is written over it; valid records are kept.
   */
  private async load<T>(
    name: StoreName,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    createDefault: (now: Date) => T,
    collections: readonly RecordCollection[] = []
  ): Promise<LoadedDocument<T>> {
    const filePath = this.filePath(name);
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        const document = createDefault(this.clock());
        this.logger.info({ store: name, filePath }, 'Store file missing, creating defaults');
        try {
          await this.save(name, document);
        } catch (saveError) {
          this.logger.error({ store: name, filePath, error: saveError }, 'Failed to write default store file');
        }
        return { document, recovered: false };
      }
      this.logger.error({ store: name, filePath, error }, 'Failed to read store file, using defaults');
      await this.setAside(name, 'move');
      return { document: createDefault(this.clock()), recovered: true };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.error({ store: name, filePath, error }, 'Store file is not valid JSON, using defaults');
      await this.setAside(name, 'move');
      return { document: createDefault(this.clock()), recovered: true };
    }

    const salvaged = dropInvalidRecords(parsed, collections);
    const result = schema.safeParse(salvaged.document);
    if (!result.success) {
      this.logger.error(
        { store: name, filePath, issues: result.error.issues },
        'Store file failed validation, using defaults'
      );
      await this.setAside(name, 'move');
      return { document: createDefault(this.clock()), recovered: true };
    }
    if (salvaged.dropped.length > 0) {
      this.logger.warn({ store: name, filePath, dropped: salvaged.dropped }, 'Skipped invalid records in store file');
      await this.setAside(name, 'copy');
      return { document: result.data, recovered: true };
    }
    this.logger.debug({ store: name, filePath }, 'Store loaded');
    return { document: result.data, recovered: false };
  }

  backupPath(name: StoreName): string {
    const stamp = this.clock().toISOString().replace(/[:.]/g, '-');
    return `${this.filePath(name)}.corrupt-${stamp}`;
  }

  private async setAside(name: StoreName, mode: 'move' | 'copy'): Promise<void> {
    const filePath = this.filePath(name);
    const backupPath = this.backupPath(name);
    try {
      if (mode === 'move') {
        await rename(filePath, backupPath);
      } else {
        await copyFile(filePath, backupPath);
      }
      this.logger.warn({ store: name, filePath, backupPath }, 'Original store file preserved');
    } catch (error) {
      this.protectedStores.add(name);
      this.logger.error({ store: name, filePath, error }, 'Could not preserve store file, writes to it are disabled');
    }
  }

  /** Writes to a temp file beside the target, then renames over it */
  private async save(name: StoreName, document: unknown): Promise<void> {
    const filePath = this.filePath(name);
    if (this.protectedStores.has(name)) {
      throw new Error(`Refusing to overwrite ${filePath}: the original could not be preserved`);
    }
    const tempPath = `${filePath}.tmp`;
    await mkdir(this.dataDir, { recursive: true });
    await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    await rename(tempPath, filePath);
    this.logger.debug({ store: name, filePath }, 'Store saved');
  }

  loadGraph(): Promise<LoadedDocument<GraphDocument>> {
    return this.load('graph', GraphDocumentSchema, createDefaultGraph, GRAPH_COLLECTIONS);
  }

  saveGraph(document: GraphDocument): Promise<void> {
    return this.save('graph', document);
  }

  loadUsers(): Promise<LoadedDocument<UsersDocument>> {
    return this.load('users', UsersDocumentSchema, createDefaultUsers, USERS_COLLECTIONS);
  }

  saveUsers(document: UsersDocument): Promise<void> {
    return this.save('users', document);
  }

  loadAnalytics(): Promise<LoadedDocument<AnalyticsDocument>> {
    return this.load('analytics', AnalyticsDocumentSchema, createDefaultAnalytics);
  }

  saveAnalytics(document: AnalyticsDocument): Promise<void> {
    return this.save('analytics', document);
  }
}
