import { describe, it, expect } from 'vitest';

import { decodeCallback, parseActionReference } from '../routes';

describe('decodeCallback', () => {
  it('should route admin tokens before the editor namespace', () => {
    expect(decodeCallback('admin_editor')).toEqual({ kind: 'admin', route: 'editor' });
    expect(decodeCallback('admin_back')).toEqual({ kind: 'admin', route: 'back' });
    expect(decodeCallback('admin_users')).toEqual({ kind: 'admin', route: 'admins' });
  });

  it('should route analytics and users tokens', () => {
    expect(decodeCallback('analytics_detailed')).toEqual({ kind: 'analytics', route: 'detailed' });
    expect(decodeCallback('users_page_next')).toEqual({ kind: 'users', route: 'page_next' });
  });

  it('should report unknown tokens inside a known namespace', () => {
    expect(decodeCallback('admin_unknown')).toEqual({
      kind: 'unrecognized',
      namespace: 'admin',
      token: 'admin_unknown',
    });
  });

  it('should decode exact editor tokens', () => {
    expect(decodeCallback('editor_buttons')).toEqual({ kind: 'editor', route: { op: 'pick_page_for_buttons' } });
    expect(decodeCallback('list_actions')).toEqual({ kind: 'editor', route: { op: 'list_actions' } });
  });

  it('should decode prefixed editor tokens with their argument', () => {
    expect(decodeCallback('edit_page_about')).toEqual({
      kind: 'editor',
      route: { op: 'edit_page', pageId: 'about' },
    });
    expect(decodeCallback('delete_button_btn_12')).toEqual({
      kind: 'editor',
      route: { op: 'delete_button', buttonId: 'btn_12' },
    });
    expect(decodeCallback('set_role_42_staff')).toEqual({
      kind: 'editor',
      route: { op: 'set_role', userId: 42, role: 'staff' },
    });
  });

  it('should reject non-numeric user ids', () => {
    expect(decodeCallback('user_details_abc')).toEqual({
      kind: 'unrecognized',
      namespace: 'editor',
      token: 'user_details_abc',
    });
  });

  it('should decode navigation tokens', () => {
    expect(decodeCallback('back_to_main')).toEqual({ kind: 'navigate', pageId: null });
    expect(decodeCallback('page_info')).toEqual({ kind: 'navigate', pageId: 'info' });
  });

  it('should treat everything else as an action reference', () => {
    expect(decodeCallback('contacts')).toEqual({ kind: 'action', token: 'contacts', actionId: 'contacts' });
    expect(decodeCallback('open:docs')).toEqual({
      kind: 'action',
      token: 'open:docs',
      actionId: 'open',
      params: 'docs',
    });
  });
});

describe('parseActionReference', () => {
  it('should split at the first colon only', () => {
    expect(parseActionReference('link:a:b')).toEqual({ actionId: 'link', params: 'a:b' });
  });

  it('should keep empty params', () => {
    expect(parseActionReference('link:')).toEqual({ actionId: 'link', params: '' });
  });
});
