import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { UsersDocument } from '@menu-editor/shared';

import { ValidationError } from '../../errors';
import { DEFAULT_ROLE_DEFINITIONS, UserRegistry, displayName } from '../user-registry';

function emptyDocument(): UsersDocument {
  return { users: {}, roles: DEFAULT_ROLE_DEFINITIONS };
}

describe('UserRegistry', () => {
  let tick: number;
  let registry: UserRegistry;
  let onChange: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    tick = 0;
    onChange = vi.fn();
    // Each clock read is one minute later, so registration order is visible in timestamps.
    registry = new UserRegistry(emptyDocument(), {
      clock: () => new Date(Date.UTC(2024, 0, 1, 0, tick++)),
      onChange,
    });
  });

  describe('register', () => {
    it('should create a user record once', () => {
      expect(registry.register(10, { username: 'ada', firstName: 'Ada' })).toBe(true);
      expect(registry.register(10, { username: 'ada_l' })).toBe(false);
      const record = registry.get(10);
      expect(record?.username).toBe('ada_l');
      expect(record?.firstName).toBe('Ada');
      expect(record?.role).toBe('user');
      expect(onChange).toHaveBeenCalledTimes(1);
    });
  });

  describe('roles and permissions', () => {
    beforeEach(() => {
      registry.register(1, { username: 'owner' });
      registry.register(2, { username: 'helper' });
    });

    it('should keep the admin set equal to role-admin users', () => {
      registry.setRole(1, 'admin');
      registry.setRole(2, 'admin');
      expect(registry.adminIds().sort()).toEqual([1, 2]);
      registry.setRole(1, 'staff');
      expect(registry.adminIds()).toEqual([2]);
      expect(registry.isAdmin(1)).toBe(false);
    });

    it('should reject unknown roles', () => {
      expect(() => registry.setRole(1, 'owner')).toThrow(ValidationError);
      expect(registry.getRole(1)).toBe('user');
    });

    it('should grant staff editing and analytics but not everything', () => {
      registry.setRole(2, 'staff');
      expect(registry.hasPermission(2, 'edit_content')).toBe(true);
      expect(registry.hasPermission(2, 'view_analytics')).toBe(true);
      expect(registry.hasPermission(2, 'all')).toBe(false);
      expect(registry.hasPermission(1, 'edit_content')).toBe(false);
      expect(registry.hasPermission(1, 'view_pages')).toBe(true);
    });

    it('should grant admins every permission', () => {
      registry.setRole(1, 'admin');
      expect(registry.hasPermission(1, 'edit_content')).toBe(true);
      expect(registry.hasPermission(1, 'all')).toBe(true);
    });
  });

  describe('seedAdmins', () => {
    it('should promote configured ids and create missing records', () => {
      registry.register(5, {});
      registry.seedAdmins([5, 99]);
      expect(registry.adminIds().sort((a, b) => a - b)).toEqual([5, 99]);
      expect(registry.get(99)?.role).toBe('admin');
    });

    it('should close the bootstrap once an admin is seeded', () => {
      registry.seedAdmins([99]);
      registry.register(5, {});
      expect(registry.claimBootstrapAdmin(5)).toBe(false);
    });
  });

  describe('claimBootstrapAdmin', () => {
    it('should promote the first registered user only', () => {
      registry.register(1, {});
      registry.register(2, {});
      expect(registry.claimBootstrapAdmin(1)).toBe(true);
      expect(registry.claimBootstrapAdmin(2)).toBe(false);
      expect(registry.adminIds()).toEqual([1]);
    });

    it('should ignore unregistered users', () => {
      expect(registry.claimBootstrapAdmin(1)).toBe(false);
    });

    it('should stay closed when bootstrap is not allowed', () => {
      const guarded = new UserRegistry(emptyDocument(), { allowBootstrap: false });
      guarded.register(1, {});
      guarded.seedAdmins([]);

      expect(guarded.claimBootstrapAdmin(1)).toBe(false);
      expect(guarded.adminIds()).toEqual([]);
    });
  });

  describe('lookup', () => {
    beforeEach(() => {
      registry.register(100, { username: 'Alice', firstName: 'Alice', lastName: 'Smith' });
      registry.register(200, { username: 'bob', firstName: 'Bob', lastName: 'Smithers' });
    });

    it('should find by id or by username ignoring case and @', () => {
      expect(registry.findByIdOrUsername('100')?.id).toBe(100);
      expect(registry.findByIdOrUsername('@alice')?.id).toBe(100);
      expect(registry.findByIdOrUsername('carol')).toBeUndefined();
    });

    it('should search by name fragments', () => {
      expect(registry.search('smith').map((user) => user.id)).toEqual([100, 200]);
      expect(registry.search('@BOB').map((user) => user.id)).toEqual([200]);
      expect(registry.search('alice smith').map((user) => user.id)).toEqual([100]);
      expect(registry.search('  ')).toEqual([]);
    });

    it('should list newest registrations first', () => {
      expect(registry.recent(1).map((user) => user.id)).toEqual([200]);
    });

    it('should count users per role', () => {
      registry.setRole(200, 'staff');
      expect(registry.roleCounts()).toEqual({ user: 1, staff: 1, admin: 0 });
    });
  });

  describe('list', () => {
    beforeEach(() => {
      for (let id = 1; id <= 23; id += 1) {
        registry.register(id, {});
      }
    });

    it('should page ten users at a time', () => {
      const first = registry.list(0);
      expect(first.users.map((user) => user.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(first).toMatchObject({ page: 0, totalPages: 3, hasPrevious: false, hasNext: true });

      const last = registry.list(2);
      expect(last.users.map((user) => user.id)).toEqual([21, 22, 23]);
      expect(last).toMatchObject({ hasPrevious: true, hasNext: false });
    });

    it('should clamp out-of-range pages', () => {
      expect(registry.list(9).page).toBe(2);
      expect(registry.list(-1).page).toBe(0);
    });
  });

  it('should restore from its own document', () => {
    registry.register(7, { username: 'x' });
    registry.setRole(7, 'admin');
    const restored = new UserRegistry(registry.toDocument());
    expect(restored.isAdmin(7)).toBe(true);
    expect(restored.claimBootstrapAdmin(7)).toBe(false);
  });
});

describe('displayName', () => {
  const base = {
    role: 'user' as const,
    registeredAt: '',
    lastSeen: '',
    totalInteractions: 0,
    pagesVisited: [],
    buttonsClicked: [],
    commandsUsed: {},
  };

  it('should prefer the full name, then the username', () => {
    expect(displayName({ ...base, username: 'u', firstName: 'A', lastName: 'B' })).toBe('A B');
    expect(displayName({ ...base, username: 'u', firstName: null, lastName: null })).toBe('u');
    expect(displayName({ ...base, username: null, firstName: null, lastName: null })).toBe('N/A');
  });
});
