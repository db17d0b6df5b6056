import { USER_LIMITS, type AnalyticsDocument, type Logger, type UserRecord } from '@menu-editor/shared';
import type { UserRegistry } from '../users/user-registry';

export interface ActivityTrackerOptions {
  clock?: () => Date;
  /** Called when the global counters change */
  onChange?: () => void;
  logger?: Logger;
}

export interface RankedEntry {
  key: string;
  count: number;
}

function pushDistinct(list: string[], value: string, cap: number): void {
  if (list.includes(value)) {
    return;
  }
  list.push(value);
  while (list.length > cap) {
    list.shift();
  }
}

function rank(counters: Record<string, number>, limit: number): RankedEntry[] {
  return Object.entries(counters)
    .map(([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

function sum(counters: Record<string, number>): number {
  return Object.values(counters).reduce((total, value) => total + value, 0);
}

/**
 * Per-user activity and global counters. Events from users that never
 * registered are ignored.
 */
export class ActivityTracker {
  private readonly pageViews: Record<string, number>;
  private readonly buttonClicks: Record<string, number>;
  private readonly clock: () => Date;
  private readonly onChange: () => void;
  private readonly logger?: Logger;

  constructor(
    private readonly registry: UserRegistry,
    document: AnalyticsDocument,
    options: ActivityTrackerOptions = {}
  ) {
    this.pageViews = { ...document.pageViews };
    this.buttonClicks = { ...document.buttonClicks };
    this.clock = options.clock ?? (() => new Date());
    this.onChange = options.onChange ?? (() => undefined);
    this.logger = options.logger;
  }

  private touchUser(userId: number): UserRecord | undefined {
    const record = this.registry.get(userId);
    if (!record) {
      this.logger?.debug({ userId }, 'Activity from unregistered user ignored');
      return undefined;
    }
    record.lastSeen = this.clock().toISOString();
    record.totalInteractions += 1;
    return record;
  }

  trackPageView(userId: number, pageId: string): void {
    const record = this.touchUser(userId);
    if (!record) {
      return;
    }
    pushDistinct(record.pagesVisited, pageId, USER_LIMITS.MAX_PAGES_VISITED);
    this.pageViews[pageId] = (this.pageViews[pageId] ?? 0) + 1;
    this.registry.touch();
    this.onChange();
  }

  trackButtonClick(userId: number, buttonText: string): void {
    const record = this.touchUser(userId);
    if (!record) {
      return;
    }
    pushDistinct(record.buttonsClicked, buttonText, USER_LIMITS.MAX_BUTTONS_CLICKED);
    this.buttonClicks[buttonText] = (this.buttonClicks[buttonText] ?? 0) + 1;
    this.registry.touch();
    this.onChange();
  }

  trackCommand(userId: number, command: string): void {
    const record = this.touchUser(userId);
    if (!record) {
      return;
    }
    record.commandsUsed[command] = (record.commandsUsed[command] ?? 0) + 1;
    this.registry.touch();
  }

  totalPageViews(): number {
    return sum(this.pageViews);
  }

  totalButtonClicks(): number {
    return sum(this.buttonClicks);
  }

  topPages(limit: number): RankedEntry[] {
    return rank(this.pageViews, limit);
  }

  topButtons(limit: number): RankedEntry[] {
    return rank(this.buttonClicks, limit);
  }

  /** Users whose last interaction falls within the trailing window */
  activeUsers(now: Date, windowDays: number = USER_LIMITS.ACTIVE_USER_WINDOW_DAYS): number {
    const cutoff = now.getTime() - windowDays * 24 * 60 * 60 * 1000;
    let active = 0;
    for (const record of this.registry.values()) {
      if (Date.parse(record.lastSeen) > cutoff) {
        active += 1;
      }
    }
    return active;
  }

  /**
   * Count of users last seen on each of the trailing `days` calendar days
   * (UTC), newest first.
   */
  dailyActivity(now: Date, days: number): RankedEntry[] {
    const buckets = new Map<string, number>();
    for (let offset = 0; offset < days; offset += 1) {
      const day = new Date(now.getTime() - offset * 24 * 60 * 60 * 1000);
      buckets.set(day.toISOString().slice(0, 10), 0);
    }
    for (const record of this.registry.values()) {
      const day = record.lastSeen.slice(0, 10);
      const current = buckets.get(day);
      if (current !== undefined) {
        buckets.set(day, current + 1);
      }
    }
    return [...buckets].map(([key, count]) => ({ key, count }));
  }

  toDocument(): AnalyticsDocument {
    return {
      pageViews: { ...this.pageViews },
      buttonClicks: { ...this.buttonClicks },
      lastUpdated: this.clock().toISOString(),
    };
  }
}
