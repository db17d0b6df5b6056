import {
  BACK_TO_MAIN,
  CONTENT_LIMITS,
  SESSION_DEFAULTS,
  sanitizeInput,
  type Action,
  type Logger,
  type Page,
  type Permission,
  type UserProfile,
} from '@menu-editor/shared';
import type { ActivityTracker } from '../analytics/activity-tracker';
import {
  EngineError,
  FormatError,
  InternalError,
  NotFoundError,
  PermissionDeniedError,
  UnroutableCallbackError,
  ValidationError,
} from '../errors';
import type { ContentGraph } from '../graph/content-graph';
import {
  renderActionsList,
  renderActionsMenu,
  renderAddAdminPrompt,
  renderAddButtonPrompt,
  renderAdminList,
  renderAdminPanel,
  renderAnalyticsSummary,
  renderCreateActionPrompt,
  renderCreatePagePrompt,
  renderDetailedAnalytics,
  renderEditActionPrompt,
  renderEditButtonPrompt,
  renderEditPagePrompt,
  renderEditWelcomePrompt,
  renderEditorMenu,
  renderHelp,
  renderPageButtons,
  renderPagePicker,
  renderRolePicker,
  renderSearchPrompt,
  renderSearchResults,
  renderSettings,
  renderStats,
  renderUserActivity,
  renderUserDetails,
  renderUsersList,
  renderUsersOverview,
} from '../render/admin-views';
import { renderMessageAction, renderPage, renderUrlAction } from '../render/page-renderer';
import { notice, type View } from '../render/view';
import type { SessionStore } from '../session/session-store';
import type { UserRegistry } from '../users/user-registry';
import { DispatchQueue } from './dispatch-queue';
import { getBackKeyboard, getCancelKeyboard, getPageButtonsKeyboard } from './keyboards';
import { decodeCallback, type AdminRoute, type EditorRoute, type UsersRoute } from './routes';

export const COMMANDS = ['start', 'help', 'admin', 'editor', 'analytics', 'users', 'cancel'] as const;
export type CommandName = (typeof COMMANDS)[number];

/** Outbound side of the transport for one inbound event */
export interface ReplyChannel {
  reply(view: View): Promise<void>;
  editInPlace(view: View): Promise<void>;
}

export interface InboundUser extends UserProfile {
  id: number;
}

export interface DispatcherDeps {
  graph: ContentGraph;
  sessions: SessionStore;
  users: UserRegistry;
  activity: ActivityTracker;
  logger: Logger;
  clock?: () => Date;
  sessionTimeoutMinutes?: number;
}

type Requirement = Permission | 'admin';

type Output = View | View[];

const DENIAL_MESSAGES: Record<Requirement, string> = {
  admin: "❌ You don't have permission to access the admin panel.",
  all: "❌ You don't have permission to do that.",
  edit_content: "❌ You don't have permission to use the editor.",
  view_analytics: "❌ You don't have permission to view analytics and users.",
  view_pages: "❌ You don't have permission to view pages.",
};

const DELIVERY_FAILED_MESSAGE = '⚠️ This content could not be displayed.';

const TOP_ENTRIES = 5;
const DETAILED_TOP_ENTRIES = 10;
const DAILY_ACTIVITY_DAYS = 7;

/**
 * Splits pipe-delimited input into exactly `arity` trimmed fields. The last
 * field keeps any further `|` characters.
 */
export function splitFields(text: string, arity: number, expected: string): string[] {
  const parts = text.split('|');
  if (parts.length < arity) {
    throw new FormatError(expected);
  }
  const head = parts.slice(0, arity - 1);
  const tail = parts.slice(arity - 1).join('|');
  return [...head, tail].map((field) => field.trim());
}

/**
 * Routes callbacks, free text and commands to the graph, session and user
 * repositories. Every event runs through one queue and one error boundary.
 */
export class Dispatcher {
  private readonly graph: ContentGraph;
  private readonly sessions: SessionStore;
  private readonly users: UserRegistry;
  private readonly activity: ActivityTracker;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly sessionTimeoutMinutes: number;
  private readonly queue: DispatchQueue;
  private readonly usersListPage = new Map<number, number>();

  constructor(deps: DispatcherDeps) {
    this.graph = deps.graph;
    this.sessions = deps.sessions;
    this.users = deps.users;
    this.activity = deps.activity;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
    this.sessionTimeoutMinutes = deps.sessionTimeoutMinutes ?? SESSION_DEFAULTS.TIMEOUT_MINUTES;
    this.queue = new DispatchQueue(deps.logger);
  }

  handleCallback(user: InboundUser, token: string, channel: ReplyChannel): Promise<void> {
    return this.queue.enqueue(`callback:${token}`, () =>
      this.runEvent(user.id, (view) => channel.editInPlace(view), () => this.onCallback(user, token), { token })
    );
  }

  handleText(user: InboundUser, text: string, channel: ReplyChannel): Promise<void> {
    return this.queue.enqueue('text', () =>
      this.runEvent(user.id, (view) => channel.reply(view), () => this.onText(user, text))
    );
  }

  handleCommand(user: InboundUser, command: CommandName, channel: ReplyChannel): Promise<void> {
    return this.queue.enqueue(`command:${command}`, () =>
      this.runEvent(user.id, (view) => channel.reply(view), () => this.onCommand(user, command), { command })
    );
  }

  // ---- error boundary ----

  private async runEvent(
    userId: number,
    send: (view: View) => Promise<void>,
    handler: () => Output,
    bindings: Record<string, unknown> = {}
  ): Promise<void> {
    let output: Output;
    try {
      output = handler();
    } catch (error) {
      output = this.viewForError(userId, error, bindings);
    }

    const views = Array.isArray(output) ? output : [output];
    let delivered = 0;
    for (const view of views) {
      try {
        await send(view);
        delivered += 1;
      } catch (error) {
        this.logger.error({ userId, ...bindings, error }, 'Failed to deliver reply');
      }
    }

    if (views.length > 0 && delivered === 0) {
      try {
        await send(notice(DELIVERY_FAILED_MESSAGE));
      } catch (error) {
        this.logger.error({ userId, ...bindings, error }, 'Failed to deliver fallback notice');
      }
    }
  }

  private viewForError(userId: number, error: unknown, bindings: Record<string, unknown>): View {
    if (error instanceof ValidationError || error instanceof FormatError) {
      this.logger.debug({ userId, ...bindings, code: error.code }, error.message);
      const keyboard = this.sessions.has(userId) ? getCancelKeyboard() : undefined;
      return notice(`❌ ${error.message}`, keyboard);
    }
    if (error instanceof NotFoundError) {
      this.logger.info({ userId, ...bindings, entity: error.entity, id: error.id }, 'Referenced entity not found');
      this.sessions.clear(userId);
      return notice(`❌ ${error.message}`);
    }
    if (error instanceof UnroutableCallbackError) {
      this.logger.warn({ userId, token: error.token }, 'Unroutable callback');
      return notice('❌ Action not found.');
    }
    if (error instanceof PermissionDeniedError) {
      this.logger.info({ userId, ...bindings, permission: error.permission }, 'Permission denied');
      this.sessions.clear(userId);
      return notice(error.message);
    }

    const failure = error instanceof EngineError ? error : new InternalError('Unexpected failure', { cause: error });
    this.logger.error({ userId, ...bindings, code: failure.code, error: failure }, 'Unhandled error while dispatching event');
    this.sessions.clear(userId);
    return notice('❌ Something went wrong. Please try again.');
  }

  // ---- permissions ----

  private allowed(userId: number, requirement: Requirement): boolean {
    return requirement === 'admin' ? this.users.isAdmin(userId) : this.users.hasPermission(userId, requirement);
  }

  private require(userId: number, requirement: Requirement): void {
    if (!this.allowed(userId, requirement)) {
      throw new PermissionDeniedError(requirement, DENIAL_MESSAGES[requirement]);
    }
  }

  // ---- navigation and actions ----

  private showPage(userId: number, pageId: string): View {
    const page = this.graph.resolvePage(pageId);
    this.activity.trackPageView(userId, page.id);
    return renderPage(page, this.graph.mainMenuPageId);
  }

  private executeAction(userId: number, action: Action, params?: string): View {
    switch (action.type) {
      case 'message':
        return {
          ...renderMessageAction(action, { userId, now: this.clock(), params }),
          keyboard: getBackKeyboard(BACK_TO_MAIN),
        };
      case 'page':
        return this.showPage(userId, params ?? action.content);
      case 'url':
        return { ...renderUrlAction(action, params), keyboard: getBackKeyboard(BACK_TO_MAIN) };
      case 'command':
        return this.runInternalCommand(userId, action.content);
    }
  }

  private runInternalCommand(userId: number, name: string): View {
    switch (name.trim()) {
      case 'show_analytics':
        this.require(userId, 'view_analytics');
        return this.analyticsSummary();
      case 'show_users':
        this.require(userId, 'view_analytics');
        return this.usersOverview();
      default:
        return notice(`Command: ${name}`);
    }
  }

  private onCallback(user: InboundUser, token: string): Output {
    const userId = user.id;
    this.logger.info({ userId, token }, 'Callback received');
    const route = decodeCallback(token);

    switch (route.kind) {
      case 'admin':
        return this.onAdminRoute(userId, route.route);
      case 'analytics':
        this.require(userId, 'view_analytics');
        return route.route === 'detailed' ? this.detailedAnalytics() : this.analyticsSummary();
      case 'users':
        return this.onUsersRoute(userId, route.route);
      case 'editor':
        return this.onEditorRoute(userId, route.route);
      case 'navigate': {
        this.activity.trackButtonClick(userId, this.graph.findButtonTextByAction(token));
        return this.showPage(userId, route.pageId ?? this.graph.mainMenuPageId);
      }
      case 'action': {
        const action =
          (route.params !== undefined ? this.graph.getAction(route.actionId) : undefined) ??
          this.graph.getAction(token);
        if (!action) {
          throw new UnroutableCallbackError(token);
        }
        this.activity.trackButtonClick(userId, this.graph.findButtonTextByAction(token));
        const params = action.id === token ? undefined : route.params;
        return this.executeAction(userId, action, params);
      }
      case 'unrecognized':
        this.logger.warn({ userId, token, namespace: route.namespace }, 'Unrecognized callback in namespace');
        return notice('❌ Unrecognized option. Use the menu buttons to navigate.');
    }
  }

  private onAdminRoute(userId: number, route: AdminRoute): View {
    switch (route) {
      case 'editor':
        this.require(userId, 'edit_content');
        return renderEditorMenu(this.users.isAdmin(userId));
      case 'analytics':
        this.require(userId, 'view_analytics');
        return this.analyticsSummary();
      case 'users_manage':
        this.require(userId, 'view_analytics');
        return this.usersOverview();
      case 'settings':
        this.require(userId, 'admin');
        return renderSettings(this.graph.settings, this.graph.stats());
      case 'stats':
        this.require(userId, 'admin');
        return renderStats(this.graph.stats(), this.users.adminIds().length, this.graph.lastUpdated);
      case 'admins':
        this.require(userId, 'admin');
        return renderAdminList(this.users.adminIds().map((id) => ({ id, record: this.users.get(id) })));
      case 'back':
        this.require(userId, 'admin');
        return renderAdminPanel();
    }
  }

  private onUsersRoute(userId: number, route: UsersRoute): View {
    this.require(userId, 'view_analytics');
    switch (route) {
      case 'manage':
        return this.usersOverview();
      case 'search':
        this.sessions.begin(userId, 'searching_user', {});
        return renderSearchPrompt();
      case 'list':
        return this.usersList(userId, 0);
      case 'page_prev':
        return this.usersList(userId, -1);
      case 'page_next':
        return this.usersList(userId, 1);
    }
  }

  private onEditorRoute(userId: number, route: EditorRoute): View {
    switch (route.op) {
      case 'exit':
        this.sessions.clear(userId);
        return notice('✅ Editor closed.');
      case 'cancel':
        this.sessions.clear(userId);
        return notice('❌ Operation cancelled.', getBackKeyboard('admin_editor', '🎨 Back to editor'));
      case 'edit_welcome':
        this.require(userId, 'admin');
        this.sessions.begin(userId, 'editing_welcome', {});
        return renderEditWelcomePrompt(this.graph.settings.welcomeMessage);
      case 'add_admin':
        this.require(userId, 'admin');
        this.sessions.begin(userId, 'adding_admin', {});
        return renderAddAdminPrompt();
      case 'admin_back':
        this.require(userId, 'admin');
        return renderAdminPanel();
      case 'user_details':
      case 'user_activity': {
        this.require(userId, 'view_analytics');
        const record = this.users.get(route.userId);
        if (!record) {
          throw new NotFoundError('user', String(route.userId));
        }
        return route.op === 'user_details'
          ? renderUserDetails(route.userId, record, this.users.isAdmin(userId))
          : renderUserActivity(route.userId, record, (pageId) => this.graph.getPage(pageId)?.title ?? pageId);
      }
      case 'change_role': {
        this.require(userId, 'admin');
        const record = this.users.get(route.userId);
        if (!record) {
          throw new NotFoundError('user', String(route.userId));
        }
        return renderRolePicker(route.userId, record);
      }
      case 'set_role': {
        this.require(userId, 'admin');
        const record = this.users.setRole(route.userId, route.role);
        this.logger.info({ userId, targetUserId: route.userId, role: record.role }, 'User role changed');
        return notice(
          `✅ Role of ${record.username ?? route.userId} changed to ${record.role}.`,
          getBackKeyboard(`user_details_${route.userId}`)
        );
      }
      default:
        this.require(userId, 'edit_content');
        return this.onContentRoute(userId, route);
    }
  }

  private onContentRoute(userId: number, route: EditorRoute): View {
    switch (route.op) {
      case 'create_page':
        this.sessions.begin(userId, 'creating_page', {});
        return renderCreatePagePrompt();
      case 'pick_page_to_edit':
        return renderPagePicker('✏️ Edit page', this.graph.listPages(), 'edit_page_');
      case 'pick_page_for_buttons':
        return renderPagePicker('🔘 Manage buttons', this.graph.listPages(), 'manage_buttons_');
      case 'pick_main_menu':
        return renderPagePicker('🏠 Choose the main menu page', this.graph.listPages(), 'set_main_');
      case 'actions_menu':
        return renderActionsMenu();
      case 'create_action':
        this.sessions.begin(userId, 'creating_action', {});
        return renderCreateActionPrompt();
      case 'list_actions':
        return renderActionsList(this.graph.listActions());
      case 'edit_page': {
        const page = this.requirePage(route.pageId);
        this.sessions.begin(userId, 'editing_page', { pageId: page.id });
        return renderEditPagePrompt(page);
      }
      case 'manage_buttons':
        return renderPageButtons(this.requirePage(route.pageId));
      case 'set_main': {
        const page = this.graph.setMainMenu(route.pageId);
        this.logger.info({ userId, pageId: page.id }, 'Main menu changed');
        return notice(`✅ "${page.title}" is now the main menu.`, getBackKeyboard('admin_editor', '🎨 Back to editor'));
      }
      case 'add_button': {
        const page = this.requirePage(route.pageId);
        this.sessions.begin(userId, 'creating_button', { pageId: page.id });
        return renderAddButtonPrompt(page);
      }
      case 'edit_button': {
        const located = this.graph.findButton(route.buttonId);
        if (!located) {
          throw new NotFoundError('button', route.buttonId);
        }
        this.sessions.begin(userId, 'editing_button', { buttonId: located.button.id });
        return renderEditButtonPrompt(located.button);
      }
      case 'delete_button': {
        const { page, button } = this.graph.deleteButton(route.buttonId);
        this.logger.info({ userId, buttonId: button.id, pageId: page.id }, 'Button deleted');
        return notice(`✅ Button "${button.text}" deleted.`, getPageButtonsKeyboard(page));
      }
      case 'edit_action': {
        const action = this.graph.getAction(route.actionId);
        if (!action) {
          throw new NotFoundError('action', route.actionId);
        }
        this.sessions.begin(userId, 'editing_action', { actionId: action.id });
        return renderEditActionPrompt(action);
      }
      case 'delete_action': {
        const action = this.graph.deleteAction(route.actionId);
        this.logger.info({ userId, actionId: action.id }, 'Action deleted');
        return notice(`✅ Action "${action.id}" deleted.`, getBackKeyboard('list_actions'));
      }
      default:
        return notice('❌ Unrecognized option. Use the menu buttons to navigate.');
    }
  }

  private requirePage(pageId: string): Page {
    const page = this.graph.getPage(pageId);
    if (!page) {
      throw new NotFoundError('page', pageId);
    }
    return page;
  }

  // ---- admin data views ----

  private analyticsSummary(): View {
    return renderAnalyticsSummary({
      totalUsers: this.users.size,
      activeUsers: this.activity.activeUsers(this.clock()),
      totalPageViews: this.activity.totalPageViews(),
      totalButtonClicks: this.activity.totalButtonClicks(),
      topButtons: this.activity.topButtons(TOP_ENTRIES),
      topPages: this.activity.topPages(TOP_ENTRIES).map((entry) => ({
        key: this.graph.getPage(entry.key)?.title ?? entry.key,
        count: entry.count,
      })),
    });
  }

  private detailedAnalytics(): View {
    return renderDetailedAnalytics({
      totalUsers: this.users.size,
      roleCounts: this.users.roleCounts(),
      dailyActivity: this.activity.dailyActivity(this.clock(), DAILY_ACTIVITY_DAYS),
      topButtons: this.activity.topButtons(DETAILED_TOP_ENTRIES),
    });
  }

  private usersOverview(): View {
    return renderUsersOverview(this.users.size, this.users.roleCounts(), this.users.recent(TOP_ENTRIES));
  }

  private usersList(userId: number, step: number): View {
    const requested = step === 0 ? 0 : (this.usersListPage.get(userId) ?? 0) + step;
    const page = this.users.list(requested);
    this.usersListPage.set(userId, page.page);
    return renderUsersList(page);
  }

  // ---- free text ----

  private onText(user: InboundUser, rawText: string): Output {
    const userId = user.id;
    const expired = this.sessions.sweepExpired(this.clock(), this.sessionTimeoutMinutes);
    if (expired.length > 0) {
      this.logger.info({ expiredUserIds: expired }, 'Expired editor sessions removed');
    }

    const state = this.sessions.current(userId);
    if (state === 'waiting') {
      return this.showPage(userId, this.graph.mainMenuPageId);
    }

    const text = sanitizeInput(rawText, CONTENT_LIMITS.MAX_INPUT_LENGTH);
    this.logger.debug({ userId, state }, 'Editor input received');

    switch (state) {
      case 'creating_page': {
        this.require(userId, 'edit_content');
        if (!this.sessions.isValid(userId, state)) {
          return this.invalidSession();
        }
        const [id, title, content] = splitFields(text, 3, 'PAGE_ID|Title|Content');
        const page = this.graph.createPage(id, title, content);
        this.sessions.clear(userId);
        this.logger.info({ userId, pageId: page.id }, 'Page created');
        return notice(`✅ Page "${page.title}" created.`, getPageButtonsKeyboard(page));
      }
      case 'editing_page': {
        this.require(userId, 'edit_content');
        const context = this.sessions.contextFor(userId, state);
        if (!context) {
          return this.invalidSession();
        }
        const [title, content] = splitFields(text, 2, 'NEW_TITLE|NEW_CONTENT');
        const page = this.graph.updatePage(context.pageId, title, content);
        this.sessions.clear(userId);
        this.logger.info({ userId, pageId: page.id }, 'Page updated');
        return notice(`✅ Page "${page.title}" updated.`, getBackKeyboard('admin_editor', '🎨 Back to editor'));
      }
      case 'creating_button': {
        this.require(userId, 'edit_content');
        const context = this.sessions.contextFor(userId, state);
        if (!context) {
          return this.invalidSession();
        }
        const [buttonText, action] = splitFields(text, 2, 'BUTTON_TEXT|ACTION');
        const button = this.graph.addButton(context.pageId, buttonText, action);
        this.sessions.clear(userId);
        this.logger.info({ userId, pageId: context.pageId, buttonId: button.id }, 'Button added');
        return notice(`✅ Button "${button.text}" added.`, getPageButtonsKeyboard(this.requirePage(context.pageId)));
      }
      case 'editing_button': {
        this.require(userId, 'edit_content');
        const context = this.sessions.contextFor(userId, state);
        if (!context) {
          return this.invalidSession();
        }
        const [buttonText, action] = splitFields(text, 2, 'NEW_TEXT|NEW_ACTION');
        const { page, button } = this.graph.updateButton(context.buttonId, buttonText, action);
        this.sessions.clear(userId);
        this.logger.info({ userId, buttonId: button.id }, 'Button updated');
        return notice(`✅ Button "${button.text}" updated.`, getPageButtonsKeyboard(page));
      }
      case 'creating_action': {
        this.require(userId, 'edit_content');
        if (!this.sessions.isValid(userId, state)) {
          return this.invalidSession();
        }
        const [id, type, content] = splitFields(text, 3, 'ACTION_ID|TYPE|CONTENT');
        const action = this.graph.createAction(id, type.toLowerCase(), content);
        this.sessions.clear(userId);
        this.logger.info({ userId, actionId: action.id, type: action.type }, 'Action created');
        return notice(`✅ Action "${action.id}" (${action.type}) created.`, getBackKeyboard('list_actions'));
      }
      case 'editing_action': {
        this.require(userId, 'edit_content');
        const context = this.sessions.contextFor(userId, state);
        if (!context) {
          return this.invalidSession();
        }
        const [type, content] = splitFields(text, 2, 'NEW_TYPE|NEW_CONTENT');
        const action = this.graph.updateAction(context.actionId, type.toLowerCase(), content);
        this.sessions.clear(userId);
        this.logger.info({ userId, actionId: action.id, type: action.type }, 'Action updated');
        return notice(`✅ Action "${action.id}" updated.`, getBackKeyboard('list_actions'));
      }
      case 'editing_welcome': {
        this.require(userId, 'admin');
        if (!this.sessions.isValid(userId, state)) {
          return this.invalidSession();
        }
        const message = this.graph.setWelcomeMessage(text.trim());
        this.sessions.clear(userId);
        this.logger.info({ userId }, 'Welcome message updated');
        return notice(`✅ Welcome message updated.\n\n${message}`, getBackKeyboard('admin_settings'));
      }
      case 'adding_admin': {
        this.require(userId, 'admin');
        if (!this.sessions.isValid(userId, state)) {
          return this.invalidSession();
        }
        return this.addAdmin(userId, text.trim());
      }
      case 'searching_user': {
        this.require(userId, 'view_analytics');
        this.sessions.clear(userId);
        return this.searchUsers(userId, text.trim());
      }
    }
  }

  private invalidSession(): View {
    return notice('❌ Invalid editor state. Use the editor buttons to start again.');
  }

  private addAdmin(userId: number, term: string): View {
    if (!term) {
      throw new ValidationError('InvalidContent', 'Input is empty.');
    }
    const found = this.users.findByIdOrUsername(term);
    if (!found) {
      throw new ValidationError('UserNotFound', `User "${term.replace(/^@/, '')}" not found.`);
    }
    const label = found.record.username ?? String(found.id);
    if (this.users.isAdmin(found.id)) {
      throw new ValidationError('AlreadyAdmin', `User ${label} is already an administrator.`);
    }
    this.users.setRole(found.id, 'admin');
    this.sessions.clear(userId);
    this.logger.info({ userId, targetUserId: found.id }, 'Administrator added');
    return notice(`✅ Administrator added: ${label} (ID: ${found.id}).`, getBackKeyboard('admin_users'));
  }

  private searchUsers(userId: number, term: string): View {
    if (!term) {
      return notice('❌ Invalid search term.', getBackKeyboard('users_manage'));
    }
    const results = this.users.search(term);
    if (results.length === 0) {
      return notice('❌ No users found.', getBackKeyboard('users_manage'));
    }
    const [first] = results;
    if (results.length === 1 && first) {
      return renderUserDetails(first.id, first.record, this.users.isAdmin(userId));
    }
    return renderSearchResults(term.toLowerCase().replace(/^@/, ''), results);
  }

  // ---- commands ----

  private onCommand(user: InboundUser, command: CommandName): Output {
    const userId = user.id;
    this.logger.info({ userId, command }, 'Command received');

    if (command === 'start') {
      return this.onStart(user);
    }
    this.activity.trackCommand(userId, command);

    switch (command) {
      case 'help':
        return renderHelp();
      case 'admin':
        this.require(userId, 'admin');
        return renderAdminPanel();
      case 'editor':
        this.require(userId, 'edit_content');
        return renderEditorMenu(this.users.isAdmin(userId));
      case 'analytics':
        this.require(userId, 'view_analytics');
        return this.analyticsSummary();
      case 'users':
        this.require(userId, 'view_analytics');
        return this.usersOverview();
      case 'cancel': {
        if (!this.sessions.has(userId)) {
          return notice('Nothing to cancel.');
        }
        this.sessions.clear(userId);
        return notice('❌ Operation cancelled.');
      }
    }
  }

  private onStart(user: InboundUser): Output {
    const { id: userId, ...profile } = user;
    const isNew = this.users.register(userId, profile);
    if (isNew) {
      this.logger.info({ userId, username: profile.username }, 'New user registered');
    }
    this.activity.trackCommand(userId, 'start');

    if (this.users.claimBootstrapAdmin(userId)) {
      this.logger.info({ userId }, 'First user promoted to administrator');
      return notice(
        '🎉 Welcome! You have been made the administrator of this bot.\n' +
          'Use /editor to configure it.\n' +
          'Use /analytics to see statistics.'
      );
    }

    const page = this.showPage(userId, this.graph.mainMenuPageId);
    return isNew ? [notice(this.graph.settings.welcomeMessage), page] : page;
  }
}
