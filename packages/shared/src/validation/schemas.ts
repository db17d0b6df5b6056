import { z } from 'zod';
import { ACTION_TYPES, type Action, type Button, type GraphDocument, type Page } from '../types/content.js';
import { ROLES, type AnalyticsDocument, type UserRecord, type UsersDocument } from '../types/users.js';

export const ENTITY_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export const EntityIdSchema = z.string().regex(ENTITY_ID_PATTERN);

export const ActionTypeSchema = z.enum(ACTION_TYPES);

export const RoleSchema = z.enum(ROLES);

export const PermissionSchema = z.enum(['view_pages', 'edit_content', 'view_analytics', 'all']);

export const ButtonSchema: z.ZodType<Button, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  text: z.string(),
  action: z.string(),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
});

export const PageSchema: z.ZodType<Page, z.ZodTypeDef, unknown> = z.object({
  id: EntityIdSchema,
  title: z.string(),
  content: z.string(),
  buttons: z.array(ButtonSchema).default([]),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
});

export const ActionSchema: z.ZodType<Action, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  type: ActionTypeSchema,
  content: z.string(),
  url: z.string().optional(),
  description: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
});

export const SettingsSchema = z.object({
  welcomeMessage: z.string(),
  mainMenuPageId: z.string(),
});

export const GraphDocumentSchema: z.ZodType<GraphDocument, z.ZodTypeDef, unknown> = z.object({
  pages: z.record(PageSchema).default({}),
  buttons: z.record(z.unknown()).default({}),
  actions: z.record(ActionSchema).default({}),
  settings: SettingsSchema,
  lastUpdated: z.string().optional(),
});

export const UserRecordSchema: z.ZodType<UserRecord, z.ZodTypeDef, unknown> = z.object({
  username: z.string().nullable().default(null),
  firstName: z.string().nullable().default(null),
  lastName: z.string().nullable().default(null),
  role: RoleSchema.catch('user'),
  registeredAt: z.string(),
  lastSeen: z.string(),
  totalInteractions: z.number().int().nonnegative().default(0),
  pagesVisited: z.array(z.string()).default([]),
  buttonsClicked: z.array(z.string()).default([]),
  commandsUsed: z.record(z.number().int().nonnegative()).default({}),
});

const RoleDefinitionSchema = z.object({
  permissions: z.array(PermissionSchema),
});

export const UsersDocumentSchema: z.ZodType<UsersDocument, z.ZodTypeDef, unknown> = z.object({
  users: z.record(z.string().regex(/^\d+$/), UserRecordSchema).default({}),
  roles: z.object({
    user: RoleDefinitionSchema,
    staff: RoleDefinitionSchema,
    admin: RoleDefinitionSchema,
  }),
  lastUpdated: z.string().optional(),
});

export const AnalyticsDocumentSchema: z.ZodType<AnalyticsDocument, z.ZodTypeDef, unknown> = z.object({
  pageViews: z.record(z.number().int().nonnegative()).default({}),
  buttonClicks: z.record(z.number().int().nonnegative()).default({}),
  lastUpdated: z.string().optional(),
});

export const UserIdSchema = z.number().int().positive();
