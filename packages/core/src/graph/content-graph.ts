import {
  ACTION_TYPES,
  CONTENT_LIMITS,
  ENTITY_ID_PATTERN,
  isReservedToken,
  type Action,
  type ActionType,
  type Button,
  type GraphDocument,
  type Page,
  type Settings,
} from '@menu-editor/shared';
import { NotFoundError, ValidationError } from '../errors';

export const DEFAULT_MAIN_PAGE_TITLE = 'Main Menu';
export const DEFAULT_MAIN_PAGE_CONTENT = 'Welcome! Use /editor to configure the bot.';

const BUTTON_ID_PREFIX = 'btn_';

export type Clock = () => Date;

export interface ContentGraphOptions {
  clock?: Clock;
  /** Called after every successful mutation, including the self-healing default page */
  onChange?: () => void;
}

export interface LocatedButton {
  page: Page;
  button: Button;
}

export interface GraphStats {
  pages: number;
  buttons: number;
  actions: number;
}

function isActionType(value: string): value is ActionType {
  return (ACTION_TYPES as readonly string[]).includes(value);
}

function assertEntityId(id: string, label: string): void {
  if (!id || !ENTITY_ID_PATTERN.test(id)) {
    throw new ValidationError(
      'InvalidId',
      `Invalid ${label} ID. Use only letters, numbers, underscores and hyphens.`
    );
  }
}

function assertActionId(id: string): void {
  assertEntityId(id, 'action');
  if (isReservedToken(id)) {
    throw new ValidationError('InvalidId', 'This action ID is reserved for built-in buttons. Choose another ID.');
  }
}

function assertContent(value: string, label: string, maxLength: number): void {
  if (value.trim().length === 0) {
    throw new ValidationError('InvalidContent', `${label} is empty.`);
  }
  if (value.length > maxLength) {
    throw new ValidationError('InvalidContent', `${label} is too long (max ${maxLength} characters).`);
  }
}

function assertButtonText(text: string): void {
  if (text.trim().length === 0) {
    throw new ValidationError('InvalidText', 'Button text is empty.');
  }
  if (text.length > CONTENT_LIMITS.MAX_BUTTON_TEXT_LENGTH) {
    throw new ValidationError(
      'InvalidText',
      `Button text is too long (max ${CONTENT_LIMITS.MAX_BUTTON_TEXT_LENGTH} characters).`
    );
  }
}

function assertButtonAction(action: string): void {
  if (action.trim().length === 0) {
    throw new ValidationError('InvalidAction', 'Button action is empty.');
  }
  if (action.length > CONTENT_LIMITS.MAX_BUTTON_ACTION_LENGTH) {
    throw new ValidationError(
      'InvalidAction',
      `Button action is too long (max ${CONTENT_LIMITS.MAX_BUTTON_ACTION_LENGTH} characters).`
    );
  }
}

function assertActionType(type: string): asserts type is ActionType {
  if (!isActionType(type)) {
    throw new ValidationError('InvalidType', `Invalid type. Use: ${ACTION_TYPES.join(', ')}`);
  }
}

/**
 * Numeric suffix of a `btn_<N>` id, or null for ids in any other shape.
 */
export function parseButtonSuffix(buttonId: string): number | null {
  if (!buttonId.startsWith(BUTTON_ID_PREFIX)) {
    return null;
  }
  const suffix = buttonId.slice(BUTTON_ID_PREFIX.length);
  if (!/^\d+$/.test(suffix)) {
    return null;
  }
  return Number(suffix);
}

/**
 * In-memory owner of pages, buttons, actions and settings.
 *
 * All mutators validate first and throw ValidationError / NotFoundError
 * without touching state when the input is rejected.
 */
export class ContentGraph {
  private readonly pages: Map<string, Page>;
  private readonly actions: Map<string, Action>;
  private currentSettings: Settings;
  private nextButtonNumber: number;
  private readonly clock: Clock;
  private readonly onChange: () => void;
  private lastChangedAt: string | undefined;

  constructor(document: GraphDocument, options: ContentGraphOptions = {}) {
    this.pages = new Map(Object.values(document.pages).map((page) => [page.id, page]));
    this.actions = new Map(Object.values(document.actions).map((action) => [action.id, action]));
    this.currentSettings = { ...document.settings };
    this.clock = options.clock ?? (() => new Date());
    this.onChange = options.onChange ?? (() => undefined);
    this.nextButtonNumber = this.computeNextButtonNumber();
    this.lastChangedAt = document.lastUpdated;
  }

  private computeNextButtonNumber(): number {
    let max = 0;
    for (const page of this.pages.values()) {
      for (const button of page.buttons) {
        const suffix = parseButtonSuffix(button.id);
        if (suffix !== null && suffix > max) {
          max = suffix;
        }
      }
    }
    return max + 1;
  }

  private timestamp(): string {
    return this.clock().toISOString();
  }

  private markChanged(): void {
    this.lastChangedAt = this.timestamp();
    this.onChange();
  }

  private generateButtonId(): string {
    const id = `${BUTTON_ID_PREFIX}${this.nextButtonNumber}`;
    this.nextButtonNumber += 1;
    return id;
  }

  private requirePage(pageId: string): Page {
    const page = this.pages.get(pageId);
    if (!page) {
      throw new NotFoundError('page', pageId);
    }
    return page;
  }

  private requireAction(actionId: string): Action {
    const action = this.actions.get(actionId);
    if (!action) {
      throw new NotFoundError('action', actionId);
    }
    return action;
  }

  // ---- pages ----

  getPage(pageId: string): Page | undefined {
    return this.pages.get(pageId);
  }

  listPages(): Page[] {
    return [...this.pages.values()];
  }

  createPage(id: string, title: string, content: string): Page {
    assertEntityId(id, 'page');
    assertContent(title, 'Title', CONTENT_LIMITS.MAX_PAGE_TITLE_LENGTH);
    assertContent(content, 'Content', CONTENT_LIMITS.MAX_CONTENT_LENGTH);
    if (this.pages.has(id)) {
      throw new ValidationError('DuplicateId', 'A page with this ID already exists.');
    }

    const page: Page = {
      id,
      title,
      content,
      buttons: [],
      createdAt: this.timestamp(),
    };
    this.pages.set(id, page);
    this.markChanged();
    return page;
  }

  updatePage(id: string, title: string, content: string): Page {
    const page = this.requirePage(id);
    assertContent(title, 'Title', CONTENT_LIMITS.MAX_PAGE_TITLE_LENGTH);
    assertContent(content, 'Content', CONTENT_LIMITS.MAX_CONTENT_LENGTH);

    page.title = title;
    page.content = content;
    page.updatedAt = this.timestamp();
    this.markChanged();
    return page;
  }

  /**
   * The requested page, else the main menu page, else a freshly created default
   * main page stored under the main menu id. An unusable main menu id is
   * repointed at `main`, reusing that page when it exists.
   */
  resolvePage(pageId: string): Page {
    const requested = this.pages.get(pageId);
    if (requested) {
      return requested;
    }

    const mainMenuId = this.currentSettings.mainMenuPageId;
    const mainMenu = this.pages.get(mainMenuId);
    if (mainMenu) {
      return mainMenu;
    }

    const fallbackId = ENTITY_ID_PATTERN.test(mainMenuId) ? mainMenuId : 'main';
    const existing = this.pages.get(fallbackId);
    if (existing) {
      this.currentSettings = { ...this.currentSettings, mainMenuPageId: fallbackId };
      this.markChanged();
      return existing;
    }

    const defaultPage: Page = {
      id: fallbackId,
      title: DEFAULT_MAIN_PAGE_TITLE,
      content: DEFAULT_MAIN_PAGE_CONTENT,
      buttons: [],
      createdAt: this.timestamp(),
    };
    this.pages.set(fallbackId, defaultPage);
    this.currentSettings = { ...this.currentSettings, mainMenuPageId: fallbackId };
    this.markChanged();
    return defaultPage;
  }

  // ---- buttons ----

  findButton(buttonId: string): LocatedButton | undefined {
    for (const page of this.pages.values()) {
      const button = page.buttons.find((candidate) => candidate.id === buttonId);
      if (button) {
        return { page, button };
      }
    }
    return undefined;
  }

  findButtonTextByAction(action: string): string {
    for (const page of this.pages.values()) {
      const button = page.buttons.find((candidate) => candidate.action === action);
      if (button) {
        return button.text;
      }
    }
    return 'Unknown';
  }

  addButton(pageId: string, text: string, action: string): Button {
    const page = this.requirePage(pageId);
    assertButtonText(text);
    assertButtonAction(action);
    if (page.buttons.some((existing) => existing.text.trim() === text.trim())) {
      throw new ValidationError('DuplicateButtonText', 'A button with this text already exists on this page.');
    }

    const button: Button = {
      id: this.generateButtonId(),
      text,
      action,
      createdAt: this.timestamp(),
    };
    page.buttons.push(button);
    this.markChanged();
    return button;
  }

  updateButton(buttonId: string, text: string, action: string): LocatedButton {
    const located = this.findButton(buttonId);
    if (!located) {
      throw new NotFoundError('button', buttonId);
    }
    assertButtonText(text);
    assertButtonAction(action);
    const clash = located.page.buttons.some(
      (existing) => existing.id !== buttonId && existing.text.trim() === text.trim()
    );
    if (clash) {
      throw new ValidationError('DuplicateButtonText', 'A button with this text already exists on this page.');
    }

    located.button.text = text;
    located.button.action = action;
    located.button.updatedAt = this.timestamp();
    this.markChanged();
    return located;
  }

  deleteButton(buttonId: string): LocatedButton {
    const located = this.findButton(buttonId);
    if (!located) {
      throw new NotFoundError('button', buttonId);
    }
    located.page.buttons = located.page.buttons.filter((button) => button.id !== buttonId);
    this.markChanged();
    return located;
  }

  // ---- actions ----

  getAction(actionId: string): Action | undefined {
    return this.actions.get(actionId);
  }

  listActions(): Action[] {
    return [...this.actions.values()];
  }

  createAction(id: string, type: string, content: string): Action {
    assertActionId(id);
    assertActionType(type);
    assertContent(content, 'Content', CONTENT_LIMITS.MAX_CONTENT_LENGTH);
    if (this.actions.has(id)) {
      throw new ValidationError('DuplicateId', 'An action with this ID already exists.');
    }

    const action: Action = {
      id,
      type,
      content,
      createdAt: this.timestamp(),
    };
    if (type === 'url') {
      action.url = content;
    }
    this.actions.set(id, action);
    this.markChanged();
    return action;
  }

  updateAction(id: string, type: string, content: string): Action {
    const action = this.requireAction(id);
    assertActionType(type);
    assertContent(content, 'Content', CONTENT_LIMITS.MAX_CONTENT_LENGTH);

    action.type = type;
    action.content = content;
    if (type === 'url') {
      action.url = content;
    } else {
      delete action.url;
    }
    action.updatedAt = this.timestamp();
    this.markChanged();
    return action;
  }

  deleteAction(id: string): Action {
    const action = this.requireAction(id);
    this.actions.delete(id);
    this.markChanged();
    return action;
  }

  // ---- settings ----

  get settings(): Readonly<Settings> {
    return this.currentSettings;
  }

  get mainMenuPageId(): string {
    return this.currentSettings.mainMenuPageId;
  }

  setMainMenu(pageId: string): Page {
    const page = this.requirePage(pageId);
    this.currentSettings = { ...this.currentSettings, mainMenuPageId: pageId };
    this.markChanged();
    return page;
  }

  setWelcomeMessage(text: string): string {
    assertContent(text, 'Message', CONTENT_LIMITS.MAX_WELCOME_MESSAGE_LENGTH);
    this.currentSettings = { ...this.currentSettings, welcomeMessage: text };
    this.markChanged();
    return text;
  }

  /** Time of the last mutation, or of the loaded document when unchanged */
  get lastUpdated(): string | undefined {
    return this.lastChangedAt;
  }

  stats(): GraphStats {
    let buttons = 0;
    for (const page of this.pages.values()) {
      buttons += page.buttons.length;
    }
    return { pages: this.pages.size, buttons, actions: this.actions.size };
  }

  toDocument(): GraphDocument {
    return {
      pages: Object.fromEntries(this.pages),
      buttons: {},
      actions: Object.fromEntries(this.actions),
      settings: { ...this.currentSettings },
      lastUpdated: this.lastChangedAt ?? this.timestamp(),
    };
  }
}
