import { describe, it, expect, beforeEach, vi } from 'vitest';

import { DEFAULT_ROLE_DEFINITIONS, UserRegistry } from '../../users/user-registry';
import { ActivityTracker } from '../activity-tracker';

describe('ActivityTracker', () => {
  let now: Date;
  let registry: UserRegistry;
  let tracker: ActivityTracker;
  let onRegistryChange: ReturnType<typeof vi.fn>;
  let onChange: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    now = new Date('2024-05-10T12:00:00.000Z');
    onRegistryChange = vi.fn();
    onChange = vi.fn();
    const clock = (): Date => now;
    registry = new UserRegistry({ users: {}, roles: DEFAULT_ROLE_DEFINITIONS }, { clock, onChange: onRegistryChange });
    tracker = new ActivityTracker(registry, { pageViews: {}, buttonClicks: {} }, { clock, onChange });
    registry.register(1, { username: 'one' });
    onRegistryChange.mockClear();
  });

  it('should ignore events from unregistered users', () => {
    tracker.trackPageView(2, 'main');
    tracker.trackButtonClick(2, 'Info');
    expect(tracker.totalPageViews()).toBe(0);
    expect(tracker.totalButtonClicks()).toBe(0);
    expect(onChange).not.toHaveBeenCalled();
  });

  it('should record page views per user and globally', () => {
    tracker.trackPageView(1, 'main');
    tracker.trackPageView(1, 'info');
    tracker.trackPageView(1, 'main');

    const record = registry.get(1);
    expect(record?.pagesVisited).toEqual(['main', 'info']);
    expect(record?.totalInteractions).toBe(3);
    expect(tracker.topPages(5)).toEqual([
      { key: 'main', count: 2 },
      { key: 'info', count: 1 },
    ]);
    expect(onChange).toHaveBeenCalledTimes(3);
    expect(onRegistryChange).toHaveBeenCalledTimes(3);
  });

  it('should cap visited pages at the most recent fifty', () => {
    for (let index = 0; index < 51; index += 1) {
      tracker.trackPageView(1, `p${index}`);
    }
    const visited = registry.get(1)?.pagesVisited ?? [];
    expect(visited).toHaveLength(50);
    expect(visited[0]).toBe('p1');
    expect(visited[49]).toBe('p50');
  });

  it('should count button clicks by text', () => {
    tracker.trackButtonClick(1, 'Info');
    tracker.trackButtonClick(1, 'Info');
    tracker.trackButtonClick(1, 'Contacts');
    expect(tracker.totalButtonClicks()).toBe(3);
    expect(tracker.topButtons(1)).toEqual([{ key: 'Info', count: 2 }]);
    expect(registry.get(1)?.buttonsClicked).toEqual(['Info', 'Contacts']);
  });

  it('should count commands on the user record only', () => {
    tracker.trackCommand(1, 'help');
    tracker.trackCommand(1, 'help');
    expect(registry.get(1)?.commandsUsed).toEqual({ help: 2 });
    expect(onChange).not.toHaveBeenCalled();
    expect(onRegistryChange).toHaveBeenCalledTimes(2);
  });

  it('should count users active within the window', () => {
    registry.register(2, {});
    now = new Date('2024-05-20T12:00:00.000Z');
    tracker.trackCommand(2, 'start');
    expect(tracker.activeUsers(now, 7)).toBe(1);
  });

  it('should bucket last-seen days newest first', () => {
    now = new Date('2024-05-12T08:00:00.000Z');
    registry.register(2, {});
    expect(tracker.dailyActivity(now, 3)).toEqual([
      { key: '2024-05-12', count: 1 },
      { key: '2024-05-11', count: 0 },
      { key: '2024-05-10', count: 1 },
    ]);
  });

  it('should keep counters in its document', () => {
    tracker.trackPageView(1, 'main');
    expect(tracker.toDocument()).toEqual({
      pageViews: { main: 1 },
      buttonClicks: {},
      lastUpdated: '2024-05-10T12:00:00.000Z',
    });
  });
});
