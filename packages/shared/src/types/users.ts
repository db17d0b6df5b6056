export const ROLES = ['user', 'staff', 'admin'] as const;
export type Role = (typeof ROLES)[number];

export type Permission = 'view_pages' | 'edit_content' | 'view_analytics' | 'all';

export interface RoleDefinition {
  permissions: Permission[];
}

export interface UserRecord {
  username: string | null;
  firstName: string | null;
  lastName: string | null;
  role: Role;
  registeredAt: string;
  lastSeen: string;
  totalInteractions: number;
  pagesVisited: string[];
  buttonsClicked: string[];
  commandsUsed: Record<string, number>;
}

export interface UsersDocument {
  users: Record<string, UserRecord>;
  roles: Record<Role, RoleDefinition>;
  lastUpdated?: string;
}

export interface AnalyticsDocument {
  pageViews: Record<string, number>;
  buttonClicks: Record<string, number>;
  lastUpdated?: string;
}

export interface UserProfile {
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
}
