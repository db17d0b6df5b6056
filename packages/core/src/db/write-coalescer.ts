import { SESSION_DEFAULTS, type Logger } from '@menu-editor/shared';
import type { StoreName } from './json-store';

export type StoreWriters = Record<StoreName, () => Promise<void>>;

export interface WriteCoalescerOptions {
  debounceMs?: number;
  logger: Logger;
}

/**
 * Batches store writes. The first `schedule` opens a window; every store
 * marked dirty before it closes is written once. `flush` writes immediately.
 */
export class WriteCoalescer {
  private readonly dirty = new Set<StoreName>();
  private timeout: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> = Promise.resolve();
  private readonly debounceMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly writers: StoreWriters,
    options: WriteCoalescerOptions
  ) {
    this.debounceMs = options.debounceMs ?? SESSION_DEFAULTS.SAVE_DEBOUNCE_MS;
    this.logger = options.logger;
  }

  schedule(store: StoreName): void {
    this.dirty.add(store);
    if (this.timeout) {
      return;
    }
    this.timeout = setTimeout(() => {
      this.timeout = null;
      void this.flush();
    }, this.debounceMs);
  }

  get pending(): StoreName[] {
    return [...this.dirty];
  }

  /**
   * Writes every dirty store now. Failures are logged per store and never
   * rejected to the caller.
   */
  flush(): Promise<void> {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
    this.inFlight = this.inFlight.then(() => this.writeDirty());
    return this.inFlight;
  }

  private async writeDirty(): Promise<void> {
    const stores = [...this.dirty];
    this.dirty.clear();
    for (const store of stores) {
      try {
        await this.writers[store]();
        this.logger.debug({ store }, 'Store written');
      } catch (error) {
        this.logger.error({ store, error }, 'Failed to write store');
      }
    }
  }
}
