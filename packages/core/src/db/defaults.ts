import {
  AnalyticsDocumentSchema,
  GraphDocumentSchema,
  UsersDocumentSchema,
  type AnalyticsDocument,
  type GraphDocument,
  type UsersDocument,
} from '@menu-editor/shared';
import { DEFAULT_ROLE_DEFINITIONS } from '../users/user-registry';
import defaultContent from './default-content.json';

/**
 * Seed content for a fresh install: pages `main` and `info` and the actions
 * their buttons reference.
 */
export function createDefaultGraph(now: Date): GraphDocument {
  const createdAt = now.toISOString();
  let buttonNumber = 0;
  const pages = defaultContent.pages.map((page) => ({
    ...page,
    createdAt,
    buttons: page.buttons.map((button) => {
      buttonNumber += 1;
      return { id: `btn_${buttonNumber}`, ...button, createdAt };
    }),
  }));
  const actions = defaultContent.actions.map((action) => ({ ...action, createdAt }));

  return GraphDocumentSchema.parse({
    pages: Object.fromEntries(pages.map((page) => [page.id, page])),
    buttons: {},
    actions: Object.fromEntries(actions.map((action) => [action.id, action])),
    settings: defaultContent.settings,
    lastUpdated: createdAt,
  });
}

export function createDefaultUsers(now: Date): UsersDocument {
  return UsersDocumentSchema.parse({
    users: {},
    roles: DEFAULT_ROLE_DEFINITIONS,
    lastUpdated: now.toISOString(),
  });
}

export function createDefaultAnalytics(now: Date): AnalyticsDocument {
  return AnalyticsDocumentSchema.parse({
    pageViews: {},
    buttonClicks: {},
    lastUpdated: now.toISOString(),
  });
}
