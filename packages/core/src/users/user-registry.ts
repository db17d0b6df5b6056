import {
  ROLES,
  USER_LIMITS,
  type Permission,
  type Role,
  type RoleDefinition,
  type UserProfile,
  type UserRecord,
  type UsersDocument,
} from '@menu-editor/shared';
import { NotFoundError, ValidationError } from '../errors';

export const DEFAULT_ROLE_DEFINITIONS: Record<Role, RoleDefinition> = {
  user: { permissions: ['view_pages'] },
  staff: { permissions: ['view_pages', 'edit_content', 'view_analytics'] },
  admin: { permissions: ['all'] },
};

export interface RegisteredUser {
  id: number;
  record: UserRecord;
}

export interface UsersPage {
  users: RegisteredUser[];
  page: number;
  totalPages: number;
  hasPrevious: boolean;
  hasNext: boolean;
}

export interface UserRegistryOptions {
  clock?: () => Date;
  onChange?: () => void;
  /** False keeps the first-user admin grant closed, e.g. after a damaged users file */
  allowBootstrap?: boolean;
}

export function isRole(value: string): value is Role {
  return (ROLES as readonly string[]).includes(value);
}

/**
 * Display name for lists: "First Last", else the username, else "N/A".
 */
export function displayName(record: UserRecord): string {
  const fullName = [record.firstName, record.lastName].filter(Boolean).join(' ').trim();
  return fullName || record.username || 'N/A';
}

/**
 * Users, roles and the admin set derived from them.
 */
export class UserRegistry {
  private readonly users: Map<number, UserRecord>;
  private readonly roles: Record<Role, RoleDefinition>;
  private admins = new Set<number>();
  private bootstrapOpen: boolean;
  private readonly allowBootstrap: boolean;
  private readonly clock: () => Date;
  private readonly onChange: () => void;

  constructor(document: UsersDocument, options: UserRegistryOptions = {}) {
    this.users = new Map(
      Object.entries(document.users).map(([id, record]) => [Number(id), record])
    );
    this.roles = { ...DEFAULT_ROLE_DEFINITIONS, ...document.roles };
    this.clock = options.clock ?? (() => new Date());
    this.onChange = options.onChange ?? (() => undefined);
    this.allowBootstrap = options.allowBootstrap ?? true;
    this.recomputeAdmins();
    this.bootstrapOpen = this.allowBootstrap && this.admins.size === 0;
  }

  private recomputeAdmins(): void {
    const admins = new Set<number>();
    for (const [id, record] of this.users) {
      if (record.role === 'admin') {
        admins.add(id);
      }
    }
    this.admins = admins;
  }

  private timestamp(): string {
    return this.clock().toISOString();
  }

  private createRecord(profile: UserProfile, role: Role): UserRecord {
    const now = this.timestamp();
    return {
      username: profile.username ?? null,
      firstName: profile.firstName ?? null,
      lastName: profile.lastName ?? null,
      role,
      registeredAt: now,
      lastSeen: now,
      totalInteractions: 0,
      pagesVisited: [],
      buttonsClicked: [],
      commandsUsed: {},
    };
  }

  /**
   * Registers a user on first contact. For known users only the profile
   * fields are refreshed. Returns true when the user is new.
   */
  register(userId: number, profile: UserProfile = {}): boolean {
    const existing = this.users.get(userId);
    if (existing) {
      existing.username = profile.username ?? existing.username;
      existing.firstName = profile.firstName ?? existing.firstName;
      existing.lastName = profile.lastName ?? existing.lastName;
      return false;
    }
    this.users.set(userId, this.createRecord(profile, 'user'));
    this.onChange();
    return true;
  }

  get(userId: number): UserRecord | undefined {
    return this.users.get(userId);
  }

  getRole(userId: number): Role {
    return this.users.get(userId)?.role ?? 'user';
  }

  setRole(userId: number, role: string): UserRecord {
    const record = this.users.get(userId);
    if (!record) {
      throw new NotFoundError('user', String(userId));
    }
    if (!isRole(role)) {
      throw new ValidationError('InvalidRole', 'Invalid role.');
    }
    record.role = role;
    this.recomputeAdmins();
    this.onChange();
    return record;
  }

  hasPermission(userId: number, permission: Permission): boolean {
    const role = this.getRole(userId);
    if (role === 'admin') {
      return true;
    }
    const permissions = this.roles[role].permissions;
    return permissions.includes('all') || permissions.includes(permission);
  }

  isAdmin(userId: number): boolean {
    return this.admins.has(userId);
  }

  adminIds(): number[] {
    return [...this.admins];
  }

  /**
   * Start-up rule: configured ids become admins, creating bare records for
   * ids that have never talked to the bot.
   */
  seedAdmins(userIds: readonly number[]): void {
    let changed = false;
    for (const userId of userIds) {
      const record = this.users.get(userId);
      if (!record) {
        this.users.set(userId, this.createRecord({}, 'admin'));
        changed = true;
      } else if (record.role !== 'admin') {
        record.role = 'admin';
        changed = true;
      }
    }
    this.recomputeAdmins();
    this.bootstrapOpen = this.allowBootstrap && this.admins.size === 0;
    if (changed) {
      this.onChange();
    }
  }

  /**
   * Promotes the caller when no admin exists yet. Succeeds at most once per
   * process; returns whether the caller was promoted.
   */
  claimBootstrapAdmin(userId: number): boolean {
    if (!this.bootstrapOpen || this.admins.size > 0 || !this.users.has(userId)) {
      return false;
    }
    this.bootstrapOpen = false;
    this.setRole(userId, 'admin');
    return true;
  }

  /**
   * Exact lookup by numeric id or by username (leading "@" and case ignored).
   */
  findByIdOrUsername(query: string): RegisteredUser | undefined {
    const term = query.trim().replace(/^@/, '');
    if (/^\d+$/.test(term)) {
      const id = Number(term);
      const record = this.users.get(id);
      return record ? { id, record } : undefined;
    }
    const lowered = term.toLowerCase();
    for (const [id, record] of this.users) {
      if (record.username && record.username.toLowerCase() === lowered) {
        return { id, record };
      }
    }
    return undefined;
  }

  /**
   * Substring match on username, first, last and full name, or an exact id match.
   */
  search(term: string): RegisteredUser[] {
    const needle = term.trim().toLowerCase().replace(/^@/, '');
    if (!needle) {
      return [];
    }
    const results: RegisteredUser[] = [];
    for (const [id, record] of this.users) {
      const username = (record.username ?? '').toLowerCase();
      const firstName = (record.firstName ?? '').toLowerCase();
      const lastName = (record.lastName ?? '').toLowerCase();
      const fullName = `${firstName} ${lastName}`.trim();
      if (
        username.includes(needle) ||
        firstName.includes(needle) ||
        lastName.includes(needle) ||
        fullName.includes(needle) ||
        String(id) === needle
      ) {
        results.push({ id, record });
      }
    }
    return results;
  }

  list(page: number, pageSize: number = USER_LIMITS.USERS_PAGE_SIZE): UsersPage {
    const all = [...this.users].map(([id, record]) => ({ id, record }));
    const totalPages = Math.max(1, Math.ceil(all.length / pageSize));
    const current = Math.min(Math.max(0, page), totalPages - 1);
    const start = current * pageSize;
    return {
      users: all.slice(start, start + pageSize),
      page: current,
      totalPages,
      hasPrevious: current > 0,
      hasNext: start + pageSize < all.length,
    };
  }

  /** Most recently registered first */
  recent(limit: number): RegisteredUser[] {
    return [...this.users]
      .map(([id, record]) => ({ id, record }))
      .sort((a, b) => b.record.registeredAt.localeCompare(a.record.registeredAt))
      .slice(0, limit);
  }

  roleCounts(): Record<Role, number> {
    const counts: Record<Role, number> = { user: 0, staff: 0, admin: 0 };
    for (const record of this.users.values()) {
      counts[record.role] += 1;
    }
    return counts;
  }

  get size(): number {
    return this.users.size;
  }

  values(): IterableIterator<UserRecord> {
    return this.users.values();
  }

  /** Marks the registry dirty after an in-place change to a record */
  touch(): void {
    this.onChange();
  }

  toDocument(): UsersDocument {
    return {
      users: Object.fromEntries([...this.users].map(([id, record]) => [String(id), record])),
      roles: { ...this.roles },
      lastUpdated: this.timestamp(),
    };
  }
}
