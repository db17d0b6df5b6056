import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { GraphDocument } from '@menu-editor/shared';

import { NotFoundError, ValidationError } from '../../errors';
import { ContentGraph, DEFAULT_MAIN_PAGE_TITLE, parseButtonSuffix } from '../content-graph';

const NOW = new Date('2024-05-01T10:00:00.000Z');

function emptyDocument(): GraphDocument {
  return {
    pages: {},
    buttons: {},
    actions: {},
    settings: { welcomeMessage: 'Hi', mainMenuPageId: 'main' },
  };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError || error instanceof NotFoundError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe('ContentGraph', () => {
  let graph: ContentGraph;
  let onChange: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    onChange = vi.fn();
    graph = new ContentGraph(emptyDocument(), { clock: () => NOW, onChange });
  });

  describe('pages', () => {
    it('should create a page once and reject the same id again', () => {
      const page = graph.createPage('about', 'Chi Siamo', 'Testo');
      expect(page).toEqual({
        id: 'about',
        title: 'Chi Siamo',
        content: 'Testo',
        buttons: [],
        createdAt: NOW.toISOString(),
      });
      expect(codeOf(() => graph.createPage('about', 'Other', 'Other'))).toBe('DuplicateId');
      expect(graph.getPage('about')?.title).toBe('Chi Siamo');
      expect(onChange).toHaveBeenCalledTimes(1);
    });

    it('should validate ids and lengths', () => {
      expect(codeOf(() => graph.createPage('bad id', 'T', 'C'))).toBe('InvalidId');
      expect(codeOf(() => graph.createPage('', 'T', 'C'))).toBe('InvalidId');
      expect(codeOf(() => graph.createPage('p', '  ', 'C'))).toBe('InvalidContent');
      expect(codeOf(() => graph.createPage('p', 'x'.repeat(101), 'C'))).toBe('InvalidContent');
      expect(codeOf(() => graph.createPage('p', 'T', 'x'.repeat(4097)))).toBe('InvalidContent');
      expect(graph.listPages()).toHaveLength(0);
      expect(onChange).not.toHaveBeenCalled();
    });

    it('should update title and content', () => {
      graph.createPage('about', 'A', 'B');
      const updated = graph.updatePage('about', 'New', 'Body');
      expect(updated.title).toBe('New');
      expect(updated.content).toBe('Body');
      expect(updated.updatedAt).toBe(NOW.toISOString());
    });

    it('should fail to update a missing page', () => {
      expect(codeOf(() => graph.updatePage('ghost', 'A', 'B'))).toBe('NotFound');
    });
  });

  describe('resolvePage', () => {
    it('should fall back to the main menu page', () => {
      graph.createPage('main', 'Home', 'Welcome');
      expect(graph.resolvePage('missing').id).toBe('main');
    });

    it('should create a default main page when none exists', () => {
      const page = graph.resolvePage('missing');
      expect(page.id).toBe('main');
      expect(page.title).toBe(DEFAULT_MAIN_PAGE_TITLE);
      expect(graph.getPage('main')).toBe(page);
      expect(onChange).toHaveBeenCalledTimes(1);
    });

    it('should repoint an unusable main menu id at the existing main page', () => {
      const document = emptyDocument();
      document.settings.mainMenuPageId = '';
      document.pages.main = {
        id: 'main',
        title: 'Home',
        content: 'Welcome',
        createdAt: NOW.toISOString(),
        buttons: [{ id: 'btn_1', text: 'Info', action: 'info', createdAt: NOW.toISOString() }],
      };
      const restored = new ContentGraph(document, { clock: () => NOW, onChange });

      const page = restored.resolvePage('nope');

      expect(page.title).toBe('Home');
      expect(page.buttons.map((button) => button.id)).toEqual(['btn_1']);
      expect(restored.mainMenuPageId).toBe('main');
      expect(onChange).toHaveBeenCalledTimes(1);
    });
  });

  describe('buttons', () => {
    beforeEach(() => {
      graph.createPage('a', 'A', 'A');
      graph.createPage('b', 'B', 'B');
    });

    it('should number buttons with increasing suffixes', () => {
      const ids = [
        graph.addButton('a', 'One', 'x').id,
        graph.addButton('a', 'Two', 'x').id,
        graph.addButton('b', 'One', 'x').id,
      ];
      expect(ids).toEqual(['btn_1', 'btn_2', 'btn_3']);
    });

    it('should continue numbering after the highest stored suffix', () => {
      const document = emptyDocument();
      document.pages.a = {
        id: 'a',
        title: 'A',
        content: 'A',
        createdAt: NOW.toISOString(),
        buttons: [
          { id: 'btn_7', text: 'X', action: 'x', createdAt: NOW.toISOString() },
          { id: 'custom', text: 'Y', action: 'y', createdAt: NOW.toISOString() },
        ],
      };
      const restored = new ContentGraph(document, { clock: () => NOW });
      expect(restored.addButton('a', 'Z', 'z').id).toBe('btn_8');
    });

    it('should reject duplicate text on the same page only', () => {
      graph.addButton('a', 'Info', 'x');
      expect(codeOf(() => graph.addButton('a', ' Info ', 'y'))).toBe('DuplicateButtonText');
      expect(graph.addButton('b', 'Info', 'y').text).toBe('Info');
    });

    it('should reject empty or long text and action', () => {
      expect(codeOf(() => graph.addButton('a', '', 'x'))).toBe('InvalidText');
      expect(codeOf(() => graph.addButton('a', 'x'.repeat(65), 'x'))).toBe('InvalidText');
      expect(codeOf(() => graph.addButton('a', 'T', ' '))).toBe('InvalidAction');
      expect(codeOf(() => graph.addButton('a', 'T', 'x'.repeat(129)))).toBe('InvalidAction');
    });

    it('should allow an update to keep its own text', () => {
      const button = graph.addButton('a', 'Info', 'x');
      const located = graph.updateButton(button.id, 'Info', 'y');
      expect(located.page.id).toBe('a');
      expect(located.button.action).toBe('y');
    });

    it('should delete a button only from its owning page', () => {
      const onA = graph.addButton('a', 'Shared', 'x');
      graph.addButton('b', 'Shared', 'x');
      const { page } = graph.deleteButton(onA.id);
      expect(page.id).toBe('a');
      expect(graph.getPage('a')?.buttons).toEqual([]);
      expect(graph.getPage('b')?.buttons.map((item) => item.text)).toEqual(['Shared']);
    });

    it('should report missing buttons', () => {
      expect(codeOf(() => graph.deleteButton('btn_99'))).toBe('NotFound');
    });

    it('should find button text by action', () => {
      graph.addButton('b', 'Contacts', 'contacts');
      expect(graph.findButtonTextByAction('contacts')).toBe('Contacts');
      expect(graph.findButtonTextByAction('nothing')).toBe('Unknown');
    });
  });

  describe('actions', () => {
    it('should store the url for url actions', () => {
      const action = graph.createAction('site', 'url', 'https://example.com');
      expect(action.url).toBe('https://example.com');
    });

    it('should drop the url when the type changes', () => {
      graph.createAction('site', 'url', 'https://example.com');
      const updated = graph.updateAction('site', 'message', 'Hello');
      expect(updated.url).toBeUndefined();
      expect(updated.type).toBe('message');
    });

    it('should reject unknown types and duplicate ids', () => {
      expect(codeOf(() => graph.createAction('x', 'video', 'c'))).toBe('InvalidType');
      graph.createAction('x', 'message', 'c');
      expect(codeOf(() => graph.createAction('x', 'message', 'c'))).toBe('DuplicateId');
    });

    it('should reject ids that a built-in namespace would route', () => {
      for (const id of ['user_help', 'edit_x', 'page_x', 'admin_x', 'back_to_main']) {
        expect(codeOf(() => graph.createAction(id, 'message', 'c'))).toBe('InvalidId');
      }
      expect(graph.listActions()).toEqual([]);
      expect(graph.createAction('help', 'message', 'c').id).toBe('help');
    });

    it('should delete actions', () => {
      graph.createAction('x', 'message', 'c');
      graph.deleteAction('x');
      expect(graph.getAction('x')).toBeUndefined();
      expect(codeOf(() => graph.deleteAction('x'))).toBe('NotFound');
    });
  });

  describe('settings', () => {
    it('should only point the main menu at an existing page', () => {
      expect(codeOf(() => graph.setMainMenu('ghost'))).toBe('NotFound');
      graph.createPage('home', 'Home', 'Hi');
      graph.setMainMenu('home');
      expect(graph.mainMenuPageId).toBe('home');
    });

    it('should cap the welcome message', () => {
      expect(codeOf(() => graph.setWelcomeMessage('x'.repeat(1001)))).toBe('InvalidContent');
      graph.setWelcomeMessage('Hello there');
      expect(graph.settings.welcomeMessage).toBe('Hello there');
    });
  });

  it('should count pages, buttons and actions', () => {
    graph.createPage('a', 'A', 'A');
    graph.addButton('a', 'One', 'x');
    graph.addButton('a', 'Two', 'y');
    graph.createAction('x', 'message', 'c');
    expect(graph.stats()).toEqual({ pages: 1, buttons: 2, actions: 1 });
  });

  it('should round-trip through toDocument', () => {
    graph.createPage('a', 'A', 'A');
    graph.addButton('a', 'One', 'x');
    const restored = new ContentGraph(graph.toDocument());
    expect(restored.getPage('a')?.buttons[0]?.id).toBe('btn_1');
    expect(restored.lastUpdated).toBe(NOW.toISOString());
  });
});

describe('parseButtonSuffix', () => {
  it('should read numeric suffixes only', () => {
    expect(parseButtonSuffix('btn_12')).toBe(12);
    expect(parseButtonSuffix('btn_x')).toBeNull();
    expect(parseButtonSuffix('custom')).toBeNull();
  });
});
