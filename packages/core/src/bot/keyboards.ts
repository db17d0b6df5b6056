import type { InlineKeyboardButton, InlineKeyboardMarkup } from 'telegraf/types';
import { BACK_TO_MAIN, ROLES, type Action, type Page, type Role } from '@menu-editor/shared';
import type { RegisteredUser } from '../users/user-registry';
import { displayName } from '../users/user-registry';

type Row = InlineKeyboardButton[];

function button(text: string, callbackData: string): InlineKeyboardButton.CallbackButton {
  return { text, callback_data: callbackData };
}

function keyboard(rows: Row[]): InlineKeyboardMarkup {
  return { inline_keyboard: rows };
}

const ROLE_LABELS: Record<Role, string> = {
  user: '👤 User',
  staff: '👨‍💼 Staff',
  admin: '👑 Admin',
};

/**
 * One row per page button, plus a Back row outside the main menu
 */
export function getPageKeyboard(page: Page, isMainMenu: boolean): InlineKeyboardMarkup {
  const rows: Row[] = page.buttons.map((item) => [button(item.text, item.action)]);
  if (!isMainMenu) {
    rows.push([button('🔙 Back', BACK_TO_MAIN)]);
  }
  return keyboard(rows);
}

/**
 * Admin panel entry points
 */
export function getAdminPanelKeyboard(): InlineKeyboardMarkup {
  return keyboard([
    [button('📝 Page editor', 'admin_editor')],
    [button('📊 Analytics', 'admin_analytics')],
    [button('👥 Users', 'admin_users_manage')],
    [button('⚙️ Settings', 'admin_settings')],
    [button('📈 Statistics', 'admin_stats')],
  ]);
}

/**
 * Editor main menu. The admin panel link is only offered to admins.
 */
export function getEditorMenuKeyboard(isAdmin: boolean): InlineKeyboardMarkup {
  const rows: Row[] = [
    [button('📄 Create page', 'editor_create_page')],
    [button('✏️ Edit page', 'editor_edit_page')],
    [button('🔘 Manage buttons', 'editor_buttons')],
    [button('⚡ Manage actions', 'editor_actions')],
    [button('🏠 Main menu', 'editor_main_menu')],
  ];
  if (isAdmin) {
    rows.push([button('🔙 Admin panel', 'admin_back')]);
  }
  rows.push([button('❌ Exit editor', 'editor_exit')]);
  return keyboard(rows);
}

/**
 * One row per page, each carrying `<prefix><pageId>`
 */
export function getPagePickerKeyboard(pages: Page[], prefix: string, backToken = 'admin_editor'): InlineKeyboardMarkup {
  const rows: Row[] = pages.map((page) => [button(`📄 ${page.title}`, `${prefix}${page.id}`)]);
  rows.push([button('🔙 Back', backToken)]);
  return keyboard(rows);
}

export function getPageButtonsKeyboard(page: Page): InlineKeyboardMarkup {
  const rows: Row[] = page.buttons.map((item) => [
    button(`✏️ ${item.text}`, `edit_button_${item.id}`),
    button('🗑', `delete_button_${item.id}`),
  ]);
  rows.push([button('➕ Add button', `add_button_${page.id}`)]);
  rows.push([button('🔙 Back', 'editor_buttons')]);
  return keyboard(rows);
}

export function getActionsMenuKeyboard(): InlineKeyboardMarkup {
  return keyboard([
    [button('➕ Create action', 'create_action')],
    [button('📋 List actions', 'list_actions')],
    [button('🔙 Back', 'admin_editor')],
  ]);
}

export function getActionsListKeyboard(actions: Action[]): InlineKeyboardMarkup {
  const rows: Row[] = actions.map((action) => [
    button(`✏️ ${action.id}`, `edit_action_${action.id}`),
    button('🗑', `delete_action_${action.id}`),
  ]);
  rows.push([button('🔙 Back', 'editor_actions')]);
  return keyboard(rows);
}

/**
 * Cancel button shown under every editor prompt
 */
export function getCancelKeyboard(): InlineKeyboardMarkup {
  return keyboard([[button('❌ Cancel', 'editor_cancel')]]);
}

export function getBackKeyboard(callbackData: string, text = '🔙 Back'): InlineKeyboardMarkup {
  return keyboard([[button(text, callbackData)]]);
}

export function getAnalyticsKeyboard(): InlineKeyboardMarkup {
  return keyboard([
    [button('📊 Detailed report', 'analytics_detailed')],
    [button('👥 Users', 'users_manage')],
    [button('🔙 Back', 'admin_back')],
  ]);
}

export function getDetailedAnalyticsKeyboard(): InlineKeyboardMarkup {
  return keyboard([
    [button('📊 Summary', 'analytics_base')],
    [button('👥 Users', 'users_manage')],
    [button('🔙 Back', 'admin_back')],
  ]);
}

export function getUsersOverviewKeyboard(): InlineKeyboardMarkup {
  return keyboard([
    [button('👥 Full list', 'users_list')],
    [button('🔍 Search user', 'users_search')],
    [button('📊 Analytics', 'analytics_detailed')],
    [button('🔙 Back', 'admin_back')],
  ]);
}

export function getUsersListKeyboard(
  users: RegisteredUser[],
  hasPrevious: boolean,
  hasNext: boolean
): InlineKeyboardMarkup {
  const rows: Row[] = users.map(({ id, record }) => [button(`👤 ${displayName(record)}`, `user_details_${id}`)]);
  if (hasPrevious) {
    rows.push([button('⬅️ Previous page', 'users_page_prev')]);
  }
  if (hasNext) {
    rows.push([button('➡️ Next page', 'users_page_next')]);
  }
  rows.push([button('🔍 Search user', 'users_search')]);
  rows.push([button('🔙 Back', 'users_manage')]);
  return keyboard(rows);
}

export function getSearchResultsKeyboard(users: RegisteredUser[]): InlineKeyboardMarkup {
  const rows: Row[] = users.map(({ id, record }) => [
    button(`👤 ${record.username ?? displayName(record)}`, `user_details_${id}`),
  ]);
  rows.push([button('🔙 Back', 'users_manage')]);
  return keyboard(rows);
}

export function getUserDetailsKeyboard(userId: number, canChangeRole: boolean): InlineKeyboardMarkup {
  const rows: Row[] = [];
  if (canChangeRole) {
    rows.push([button('🔄 Change role', `change_role_${userId}`)]);
  }
  rows.push([button('📊 Detailed activity', `user_activity_${userId}`)]);
  rows.push([button('🔙 Back', 'users_list')]);
  return keyboard(rows);
}

export function getRolePickerKeyboard(userId: number, currentRole: Role): InlineKeyboardMarkup {
  const rows: Row[] = ROLES.map((role) => [
    button(role === currentRole ? `${ROLE_LABELS[role]} ✅` : ROLE_LABELS[role], `set_role_${userId}_${role}`),
  ]);
  rows.push([button('🔙 Back', `user_details_${userId}`)]);
  return keyboard(rows);
}

export function getSettingsKeyboard(): InlineKeyboardMarkup {
  return keyboard([
    [button('✏️ Edit welcome message', 'edit_welcome')],
    [button('👑 Administrators', 'admin_users')],
    [button('🔙 Back', 'admin_back')],
  ]);
}

export function getAdminsKeyboard(): InlineKeyboardMarkup {
  return keyboard([
    [button('➕ Add admin', 'add_admin')],
    [button('🔙 Back', 'admin_back')],
  ]);
}
