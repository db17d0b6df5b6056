import { BACK_TO_MAIN, EDITOR_TOKEN_PREFIXES, PAGE_TOKEN_PREFIX } from '@menu-editor/shared';

export type Namespace = 'admin' | 'analytics' | 'users' | 'editor' | 'navigation';

export type AdminRoute =
  | 'editor'
  | 'analytics'
  | 'users_manage'
  | 'settings'
  | 'stats'
  | 'admins'
  | 'back';

export type AnalyticsRoute = 'detailed' | 'base';

export type UsersRoute = 'list' | 'search' | 'manage' | 'page_prev' | 'page_next';

export type EditorRoute =
  | { op: 'create_page' }
  | { op: 'pick_page_to_edit' }
  | { op: 'pick_page_for_buttons' }
  | { op: 'pick_main_menu' }
  | { op: 'actions_menu' }
  | { op: 'exit' }
  | { op: 'cancel' }
  | { op: 'create_action' }
  | { op: 'list_actions' }
  | { op: 'edit_welcome' }
  | { op: 'add_admin' }
  | { op: 'admin_back' }
  | { op: 'edit_page'; pageId: string }
  | { op: 'manage_buttons'; pageId: string }
  | { op: 'set_main'; pageId: string }
  | { op: 'add_button'; pageId: string }
  | { op: 'edit_button'; buttonId: string }
  | { op: 'delete_button'; buttonId: string }
  | { op: 'edit_action'; actionId: string }
  | { op: 'delete_action'; actionId: string }
  | { op: 'user_details'; userId: number }
  | { op: 'user_activity'; userId: number }
  | { op: 'change_role'; userId: number }
  | { op: 'set_role'; userId: number; role: string };

export type Route =
  | { kind: 'admin'; route: AdminRoute }
  | { kind: 'analytics'; route: AnalyticsRoute }
  | { kind: 'users'; route: UsersRoute }
  | { kind: 'editor'; route: EditorRoute }
  | { kind: 'navigate'; pageId: string | null }
  | { kind: 'action'; actionId: string; params?: string; token: string }
  | { kind: 'unrecognized'; namespace: Namespace; token: string };

interface NamespaceRule {
  namespace: Namespace;
  matches: (token: string) => boolean;
}

/**
 * Evaluated in order; the first match owns the token.
 */
const NAMESPACE_RULES: NamespaceRule[] = [
  { namespace: 'admin', matches: (token) => token.startsWith('admin_') },
  { namespace: 'analytics', matches: (token) => token.startsWith('analytics_') },
  { namespace: 'users', matches: (token) => token.startsWith('users_') },
  {
    namespace: 'editor',
    matches: (token) => token === 'admin_back' || EDITOR_TOKEN_PREFIXES.some((prefix) => token.startsWith(prefix)),
  },
  {
    namespace: 'navigation',
    matches: (token) => token.startsWith(PAGE_TOKEN_PREFIX) || token === BACK_TO_MAIN,
  },
];

const ADMIN_ROUTES: Record<string, AdminRoute> = {
  admin_editor: 'editor',
  admin_analytics: 'analytics',
  admin_users_manage: 'users_manage',
  admin_settings: 'settings',
  admin_stats: 'stats',
  admin_users: 'admins',
  admin_back: 'back',
};

const ANALYTICS_ROUTES: Record<string, AnalyticsRoute> = {
  analytics_detailed: 'detailed',
  analytics_base: 'base',
};

const USERS_ROUTES: Record<string, UsersRoute> = {
  users_list: 'list',
  users_search: 'search',
  users_manage: 'manage',
  users_page_prev: 'page_prev',
  users_page_next: 'page_next',
};

const EDITOR_EXACT_ROUTES: Record<string, EditorRoute> = {
  editor_create_page: { op: 'create_page' },
  editor_edit_page: { op: 'pick_page_to_edit' },
  editor_buttons: { op: 'pick_page_for_buttons' },
  editor_actions: { op: 'actions_menu' },
  editor_main_menu: { op: 'pick_main_menu' },
  editor_exit: { op: 'exit' },
  editor_cancel: { op: 'cancel' },
  create_action: { op: 'create_action' },
  list_actions: { op: 'list_actions' },
  edit_welcome: { op: 'edit_welcome' },
  add_admin: { op: 'add_admin' },
  admin_back: { op: 'admin_back' },
};

type PrefixDecoder = (rest: string) => EditorRoute | null;

function parseUserId(rest: string): number | null {
  return /^\d+$/.test(rest) ? Number(rest) : null;
}

function withUser(build: (userId: number) => EditorRoute): PrefixDecoder {
  return (rest) => {
    const userId = parseUserId(rest);
    return userId === null ? null : build(userId);
  };
}

function nonEmpty(build: (id: string) => EditorRoute): PrefixDecoder {
  return (rest) => (rest.length > 0 ? build(rest) : null);
}

const EDITOR_PREFIX_ROUTES: Array<[string, PrefixDecoder]> = [
  ['edit_page_', nonEmpty((pageId) => ({ op: 'edit_page', pageId }))],
  ['manage_buttons_', nonEmpty((pageId) => ({ op: 'manage_buttons', pageId }))],
  ['set_main_', nonEmpty((pageId) => ({ op: 'set_main', pageId }))],
  ['add_button_', nonEmpty((pageId) => ({ op: 'add_button', pageId }))],
  ['edit_button_', nonEmpty((buttonId) => ({ op: 'edit_button', buttonId }))],
  ['delete_button_', nonEmpty((buttonId) => ({ op: 'delete_button', buttonId }))],
  ['edit_action_', nonEmpty((actionId) => ({ op: 'edit_action', actionId }))],
  ['delete_action_', nonEmpty((actionId) => ({ op: 'delete_action', actionId }))],
  ['user_details_', withUser((userId) => ({ op: 'user_details', userId }))],
  ['user_activity_', withUser((userId) => ({ op: 'user_activity', userId }))],
  ['change_role_', withUser((userId) => ({ op: 'change_role', userId }))],
  [
    'set_role_',
    (rest) => {
      const separator = rest.indexOf('_');
      if (separator === -1) {
        return null;
      }
      const userId = parseUserId(rest.slice(0, separator));
      const role = rest.slice(separator + 1);
      return userId === null || !role ? null : { op: 'set_role', userId, role };
    },
  ],
];

function decodeEditor(token: string): EditorRoute | null {
  const exact = EDITOR_EXACT_ROUTES[token];
  if (exact) {
    return exact;
  }
  for (const [prefix, decode] of EDITOR_PREFIX_ROUTES) {
    if (token.startsWith(prefix)) {
      return decode(token.slice(prefix.length));
    }
  }
  return null;
}

function namespaceOf(token: string): Namespace | null {
  return NAMESPACE_RULES.find((rule) => rule.matches(token))?.namespace ?? null;
}

/**
 * Splits `<actionId>:<params>` at the first colon.
 */
export function parseActionReference(token: string): { actionId: string; params?: string } {
  const separator = token.indexOf(':');
  if (separator === -1) {
    return { actionId: token };
  }
  return { actionId: token.slice(0, separator), params: token.slice(separator + 1) };
}

export function decodeCallback(token: string): Route {
  const namespace = namespaceOf(token);
  const unrecognized = (owner: Namespace): Route => ({ kind: 'unrecognized', namespace: owner, token });

  switch (namespace) {
    case 'admin': {
      const route = ADMIN_ROUTES[token];
      return route ? { kind: 'admin', route } : unrecognized('admin');
    }
    case 'analytics': {
      const route = ANALYTICS_ROUTES[token];
      return route ? { kind: 'analytics', route } : unrecognized('analytics');
    }
    case 'users': {
      const route = USERS_ROUTES[token];
      return route ? { kind: 'users', route } : unrecognized('users');
    }
    case 'editor': {
      const route = decodeEditor(token);
      return route ? { kind: 'editor', route } : unrecognized('editor');
    }
    case 'navigation':
      return token === BACK_TO_MAIN
        ? { kind: 'navigate', pageId: null }
        : { kind: 'navigate', pageId: token.slice(PAGE_TOKEN_PREFIX.length) };
    case null:
      return { kind: 'action', token, ...parseActionReference(token) };
  }
}
