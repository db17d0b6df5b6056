/**
 * Content graph: pages reachable through inline buttons, plus reusable actions.
 */

export const ACTION_TYPES = ['message', 'page', 'url', 'command'] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

export interface Button {
  id: string;
  text: string;
  /** Bare action id, `page_<id>`, `back_to_main`, or `<actionId>:<params>` */
  action: string;
  createdAt: string;
  updatedAt?: string;
}

export interface Page {
  id: string;
  title: string;
  content: string;
  buttons: Button[];
  createdAt: string;
  updatedAt?: string;
}

export interface Action {
  id: string;
  type: ActionType;
  /** Message template, target page id, URL, or internal command name depending on `type` */
  content: string;
  url?: string;
  description?: string;
  createdAt: string;
  updatedAt?: string;
}

export interface Settings {
  welcomeMessage: string;
  mainMenuPageId: string;
}

export interface GraphDocument {
  pages: Record<string, Page>;
  /** Reserved, buttons live inside their pages */
  buttons: Record<string, unknown>;
  actions: Record<string, Action>;
  settings: Settings;
  lastUpdated?: string;
}

export const BACK_TO_MAIN = 'back_to_main';
export const PAGE_TOKEN_PREFIX = 'page_';

export const EDITOR_TOKEN_PREFIXES = [
  'editor_',
  'edit_',
  'manage_',
  'add_',
  'delete_',
  'create_',
  'list_',
  'set_',
  'user_',
  'change_',
] as const;

/** Callback tokens with these prefixes are owned by a built-in namespace */
export const RESERVED_TOKEN_PREFIXES = [
  'admin_',
  'analytics_',
  'users_',
  ...EDITOR_TOKEN_PREFIXES,
  PAGE_TOKEN_PREFIX,
] as const;

export function isReservedToken(token: string): boolean {
  return token === BACK_TO_MAIN || RESERVED_TOKEN_PREFIXES.some((prefix) => token.startsWith(prefix));
}

/**
 * Example of a valid graph document:
 * {
 *   "pages": {
 *     "main": {
 *       "id": "main",
 *       "title": "Main Menu",
 *       "content": "Choose an option below.",
 *       "buttons": [{ "id": "btn_1", "text": "Contacts", "action": "contacts", "createdAt": "..." }],
 *       "createdAt": "..."
 *     }
 *   },
 *   "buttons": {},
 *   "actions": {
 *     "contacts": { "id": "contacts", "type": "message", "content": "Write to us: {user_id}", "createdAt": "..." }
 *   },
 *   "settings": { "welcomeMessage": "Welcome!", "mainMenuPageId": "main" }
 * }
 */
