import {
  CONTENT_LIMITS,
  USER_LIMITS,
  type Action,
  type Button,
  type Page,
  type Role,
  type Settings,
  type UserRecord,
} from '@menu-editor/shared';
import {
  getActionsListKeyboard,
  getActionsMenuKeyboard,
  getAdminPanelKeyboard,
  getAdminsKeyboard,
  getAnalyticsKeyboard,
  getBackKeyboard,
  getCancelKeyboard,
  getDetailedAnalyticsKeyboard,
  getEditorMenuKeyboard,
  getPageButtonsKeyboard,
  getPagePickerKeyboard,
  getRolePickerKeyboard,
  getSearchResultsKeyboard,
  getSettingsKeyboard,
  getUserDetailsKeyboard,
  getUsersListKeyboard,
  getUsersOverviewKeyboard,
} from '../bot/keyboards';
import type { RankedEntry } from '../analytics/activity-tracker';
import type { GraphStats } from '../graph/content-graph';
import { displayName, type RegisteredUser, type UsersPage } from '../users/user-registry';
import { bold, code, plain, type View } from './view';

const ACTIVITY_ITEMS_SHOWN = 10;

function lines(...parts: string[]): string {
  return parts.join('\n');
}

function bullet(label: string, value: string | number): string {
  return plain(`• ${label}: ${value}`);
}

function day(isoTimestamp: string): string {
  return isoTimestamp.slice(0, 10);
}

function percent(part: number, total: number): string {
  return total === 0 ? '0.0' : ((part / total) * 100).toFixed(1);
}

// ---- admin panel and editor ----

export function renderAdminPanel(): View {
  return {
    text: lines(bold('🔧 Admin panel'), '', plain('Choose an option:')),
    keyboard: getAdminPanelKeyboard(),
  };
}

export function renderEditorMenu(isAdmin: boolean): View {
  return {
    text: lines(bold('🎨 Content editor'), '', plain('What would you like to do?')),
    keyboard: getEditorMenuKeyboard(isAdmin),
  };
}

export function renderHelp(): View {
  return {
    text: lines(
      bold('🤖 Menu bot'),
      '',
      bold('Commands:'),
      plain('/start - Open the main menu'),
      plain('/help - Show this message'),
      plain('/admin - Admin panel'),
      plain('/editor - Content editor'),
      plain('/analytics - Usage statistics'),
      plain('/users - User management'),
      plain('/cancel - Abort the current editor step'),
      '',
      bold('Navigation:'),
      plain('Use the buttons under each message to move between pages.')
    ),
  };
}

export function renderCreatePagePrompt(): View {
  return {
    text: lines(
      bold('📄 Create page'),
      '',
      plain('Send the page in this format:'),
      code('PAGE_ID|Title|Content'),
      '',
      plain('Example:'),
      code('about|About us|We are a small team.'),
      '',
      plain(`The ID may contain letters, numbers, underscores and hyphens. Title max ${CONTENT_LIMITS.MAX_PAGE_TITLE_LENGTH} characters.`)
    ),
    keyboard: getCancelKeyboard(),
  };
}

export function renderPagePicker(heading: string, pages: Page[], prefix: string, backToken?: string): View {
  if (pages.length === 0) {
    return {
      text: plain('❌ No pages yet. Create one first.'),
      keyboard: getBackKeyboard(backToken ?? 'admin_editor'),
    };
  }
  return {
    text: lines(bold(heading), '', plain('Choose a page:')),
    keyboard: getPagePickerKeyboard(pages, prefix, backToken),
  };
}

export function renderEditPagePrompt(page: Page): View {
  return {
    text: lines(
      bold(`✏️ Edit page: ${page.title}`),
      '',
      bold('Current content:'),
      plain(page.content),
      '',
      plain('Send the new version in this format:'),
      code('NEW_TITLE|NEW_CONTENT')
    ),
    keyboard: getCancelKeyboard(),
  };
}

export function renderPageButtons(page: Page): View {
  const listing =
    page.buttons.length === 0
      ? [plain('No buttons on this page yet.')]
      : page.buttons.map((item) => plain(`• ${item.text} → ${item.action}`));
  return {
    text: lines(bold(`🔘 Buttons for: ${page.title}`), '', ...listing),
    keyboard: getPageButtonsKeyboard(page),
  };
}

export function renderAddButtonPrompt(page: Page): View {
  return {
    text: lines(
      bold(`➕ Add button to: ${page.title}`),
      '',
      plain('Send the button in this format:'),
      code('BUTTON_TEXT|ACTION'),
      '',
      plain('The action can be page_<id>, back_to_main, an action ID, or <actionId>:<params>.')
    ),
    keyboard: getCancelKeyboard(),
  };
}

export function renderEditButtonPrompt(item: Button): View {
  return {
    text: lines(
      bold(`✏️ Edit button: ${item.text}`),
      '',
      bullet('Current action', item.action),
      '',
      plain('Send the new version in this format:'),
      code('NEW_TEXT|NEW_ACTION')
    ),
    keyboard: getCancelKeyboard(),
  };
}

export function renderActionsMenu(): View {
  return {
    text: lines(bold('⚡ Actions'), '', plain('Actions can be attached to buttons by their ID.')),
    keyboard: getActionsMenuKeyboard(),
  };
}

export function renderActionsList(actions: Action[]): View {
  const listing =
    actions.length === 0
      ? [plain('No actions defined yet.')]
      : actions.map((action) => plain(`• ${action.id} (${action.type})`));
  return {
    text: lines(bold('📋 Actions'), '', ...listing),
    keyboard: getActionsListKeyboard(actions),
  };
}

export function renderCreateActionPrompt(): View {
  return {
    text: lines(
      bold('⚡ Create action'),
      '',
      plain('Send the action in this format:'),
      code('ACTION_ID|TYPE|CONTENT'),
      '',
      plain('Types: message, page, url, command.'),
      plain('Message actions may use {user_id}, {timestamp} and {param}.')
    ),
    keyboard: getCancelKeyboard(),
  };
}

export function renderEditActionPrompt(action: Action): View {
  return {
    text: lines(
      bold(`✏️ Edit action: ${action.id}`),
      '',
      bullet('Type', action.type),
      bullet('Content', action.content),
      '',
      plain('Send the new version in this format:'),
      code('NEW_TYPE|NEW_CONTENT')
    ),
    keyboard: getCancelKeyboard(),
  };
}

// ---- settings ----

export function renderSettings(settings: Readonly<Settings>, stats: GraphStats): View {
  return {
    text: lines(
      bold('⚙️ Bot settings'),
      '',
      bold('Welcome message:'),
      plain(settings.welcomeMessage),
      '',
      bold('Main menu:'),
      plain(settings.mainMenuPageId),
      '',
      bullet('Pages', stats.pages),
      bullet('Buttons', stats.buttons)
    ),
    keyboard: getSettingsKeyboard(),
  };
}

export function renderStats(stats: GraphStats, adminCount: number, lastUpdated?: string): View {
  return {
    text: lines(
      bold('📈 Bot statistics'),
      '',
      bullet('Pages', stats.pages),
      bullet('Buttons', stats.buttons),
      bullet('Actions', stats.actions),
      bullet('Administrators', adminCount),
      '',
      bullet('Last saved', lastUpdated ?? 'never')
    ),
    keyboard: getBackKeyboard('admin_back'),
  };
}

export interface AdminEntry {
  id: number;
  record?: UserRecord;
}

export function renderAdminList(admins: AdminEntry[]): View {
  const listing =
    admins.length === 0
      ? [plain('No administrators yet.')]
      : admins.map(({ id, record }) => {
          const info = record ? `${displayName(record)} (@${record.username ?? 'N/A'})` : 'N/A';
          return plain(`• ${id} - ${info}`);
        });
  return {
    text: lines(bold('👑 Administrators'), '', ...listing),
    keyboard: getAdminsKeyboard(),
  };
}

export function renderEditWelcomePrompt(current: string): View {
  return {
    text: lines(
      bold('✏️ Edit welcome message'),
      '',
      bold('Current message:'),
      plain(current),
      '',
      plain(`Send the new welcome message (max ${CONTENT_LIMITS.MAX_WELCOME_MESSAGE_LENGTH} characters).`)
    ),
    keyboard: getCancelKeyboard(),
  };
}

export function renderAddAdminPrompt(): View {
  return {
    text: lines(
      bold('➕ Add administrator'),
      '',
      plain('Send the user ID or username of the user to promote.'),
      '',
      bold('Examples:'),
      code('123456789'),
      code('@username')
    ),
    keyboard: getCancelKeyboard(),
  };
}

// ---- analytics ----

export interface AnalyticsSummary {
  totalUsers: number;
  activeUsers: number;
  totalPageViews: number;
  totalButtonClicks: number;
  topButtons: RankedEntry[];
  /** Page ids resolved to titles where the page still exists */
  topPages: RankedEntry[];
}

export function renderAnalyticsSummary(summary: AnalyticsSummary): View {
  const buttons = summary.topButtons.map((entry, index) => plain(`${index + 1}. ${entry.key}: ${entry.count} clicks`));
  const pages = summary.topPages.map((entry, index) => plain(`${index + 1}. ${entry.key}: ${entry.count} views`));
  return {
    text: lines(
      bold('📊 Analytics'),
      '',
      bold('👥 Users:'),
      bullet('Total', summary.totalUsers),
      bullet(`Active (${USER_LIMITS.ACTIVE_USER_WINDOW_DAYS} days)`, summary.activeUsers),
      '',
      bold('📈 Interactions:'),
      bullet('Page views', summary.totalPageViews),
      bullet('Button clicks', summary.totalButtonClicks),
      '',
      bold('🔥 Most clicked buttons:'),
      ...buttons,
      '',
      bold('📄 Most visited pages:'),
      ...pages
    ),
    keyboard: getAnalyticsKeyboard(),
  };
}

export interface DetailedAnalytics {
  totalUsers: number;
  roleCounts: Record<Role, number>;
  dailyActivity: RankedEntry[];
  topButtons: RankedEntry[];
}

export function renderDetailedAnalytics(report: DetailedAnalytics): View {
  const { roleCounts, totalUsers } = report;
  return {
    text: lines(
      bold('📊 Detailed analytics'),
      '',
      bold('👥 Users by role:'),
      plain(`• Users: ${roleCounts.user} (${percent(roleCounts.user, totalUsers)}%)`),
      plain(`• Staff: ${roleCounts.staff} (${percent(roleCounts.staff, totalUsers)}%)`),
      plain(`• Admins: ${roleCounts.admin} (${percent(roleCounts.admin, totalUsers)}%)`),
      '',
      bold(`📅 Activity, last ${report.dailyActivity.length} days:`),
      ...report.dailyActivity.map((entry) => plain(`• ${entry.key}: ${entry.count} active users`)),
      '',
      bold('🔥 Top buttons:'),
      ...report.topButtons.map((entry, index) => plain(`${index + 1}. ${entry.key}: ${entry.count} clicks`))
    ),
    keyboard: getDetailedAnalyticsKeyboard(),
  };
}

// ---- users ----

export function renderUsersOverview(total: number, roleCounts: Record<Role, number>, recent: RegisteredUser[]): View {
  return {
    text: lines(
      bold('👥 User management'),
      '',
      bold('📊 Statistics:'),
      bullet('Total users', total),
      bullet('Users', roleCounts.user),
      bullet('Staff', roleCounts.staff),
      bullet('Admins', roleCounts.admin),
      '',
      bold('🔍 Latest registrations:'),
      ...recent.map(({ record }) => plain(`• @${record.username ?? 'N/A'} (${record.role})`))
    ),
    keyboard: getUsersOverviewKeyboard(),
  };
}

export function renderUsersList(page: UsersPage): View {
  if (page.users.length === 0) {
    return { text: plain('❌ No registered users.'), keyboard: getBackKeyboard('users_manage') };
  }
  const entries = page.users.map(({ record }) =>
    lines(
      `• ${bold(displayName(record))} ${plain(`(@${record.username ?? 'N/A'})`)}`,
      plain(`  Role: ${record.role} | Interactions: ${record.totalInteractions}`),
      plain(`  Last seen: ${day(record.lastSeen)}`)
    )
  );
  return {
    text: lines(bold(`👥 Users (page ${page.page + 1} of ${page.totalPages})`), '', entries.join('\n\n')),
    keyboard: getUsersListKeyboard(page.users, page.hasPrevious, page.hasNext),
  };
}

export function renderSearchPrompt(): View {
  return {
    text: lines(
      bold('🔍 Search user'),
      '',
      plain('Send a username, a user ID or a name.'),
      plain('Examples: @username, 123456789, John')
    ),
    keyboard: getCancelKeyboard(),
  };
}

export function renderSearchResults(term: string, results: RegisteredUser[]): View {
  const shown = results.slice(0, USER_LIMITS.SEARCH_RESULTS_SHOWN);
  const listing = shown.map(
    ({ record }, index) =>
      `${index + 1}\\. ${bold(displayName(record))} ${plain(`(@${record.username ?? 'N/A'}) - ${record.role}`)}`
  );
  const extra = results.length - shown.length;
  if (extra > 0) {
    listing.push('', plain(`... and ${extra} more results`));
  }
  return {
    text: lines(bold(`🔍 Results for "${term}"`), '', ...listing),
    keyboard: getSearchResultsKeyboard(results.slice(0, USER_LIMITS.SEARCH_RESULT_BUTTONS)),
  };
}

export function renderUserDetails(userId: number, record: UserRecord, canChangeRole: boolean): View {
  return {
    text: lines(
      bold('👤 User details'),
      '',
      bold('📋 Profile:'),
      bullet('Name', displayName(record)),
      bullet('Username', `@${record.username ?? 'N/A'}`),
      bullet('ID', userId),
      bullet('Role', record.role),
      '',
      bold('📊 Activity:'),
      bullet('Registered', day(record.registeredAt)),
      bullet('Last seen', day(record.lastSeen)),
      bullet('Total interactions', record.totalInteractions),
      '',
      bullet('Pages visited', record.pagesVisited.length),
      bullet('Buttons clicked', record.buttonsClicked.length)
    ),
    keyboard: getUserDetailsKeyboard(userId, canChangeRole),
  };
}

export function renderUserActivity(
  userId: number,
  record: UserRecord,
  pageTitle: (pageId: string) => string
): View {
  const pages = record.pagesVisited.slice(0, ACTIVITY_ITEMS_SHOWN).map((pageId) => plain(`• ${pageTitle(pageId)}`));
  const morePages = record.pagesVisited.length - ACTIVITY_ITEMS_SHOWN;
  if (morePages > 0) {
    pages.push(plain(`... and ${morePages} more pages`));
  }
  const buttons = record.buttonsClicked.slice(0, ACTIVITY_ITEMS_SHOWN).map((text) => plain(`• ${text}`));
  const moreButtons = record.buttonsClicked.length - ACTIVITY_ITEMS_SHOWN;
  if (moreButtons > 0) {
    buttons.push(plain(`... and ${moreButtons} more buttons`));
  }
  const commands = Object.entries(record.commandsUsed).map(([name, count]) => plain(`• /${name}: ${count}`));
  return {
    text: lines(
      bold('📊 Detailed activity'),
      '',
      bullet('User', record.username ?? displayName(record)),
      bullet('Total interactions', record.totalInteractions),
      '',
      bold(`📄 Pages visited (${record.pagesVisited.length}):`),
      ...pages,
      '',
      bold(`🔘 Buttons clicked (${record.buttonsClicked.length}):`),
      ...buttons,
      '',
      bold('⌨️ Commands:'),
      ...commands
    ),
    keyboard: getBackKeyboard(`user_details_${userId}`),
  };
}

export function renderRolePicker(userId: number, record: UserRecord): View {
  return {
    text: lines(
      bold('🔄 Change role'),
      '',
      bullet('User', record.username ?? displayName(record)),
      bullet('Current role', record.role),
      '',
      plain('Choose the new role:')
    ),
    keyboard: getRolePickerKeyboard(userId, record.role),
  };
}
