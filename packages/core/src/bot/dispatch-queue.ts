import type { Logger } from '@menu-editor/shared';

interface QueueTask {
  label: string;
  run: () => Promise<void>;
  resolve: () => void;
  reject: (error: unknown) => void;
}

/**
 * FIFO queue that runs one task at a time, so handlers that await between
 * reads and writes never interleave.
 */
export class DispatchQueue {
  private queue: QueueTask[] = [];
  private processing = false;

  constructor(private readonly logger?: Logger) {}

  get length(): number {
    return this.queue.length;
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  /**
   * Resolves once the task has run; rejects with the task's error.
   */
  enqueue(label: string, run: () => Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.queue.push({ label, run, resolve, reject });
      this.logger?.trace({ label, depth: this.queue.length }, 'Task queued');
      if (!this.processing) {
        void this.processQueue();
      }
    });
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    let task = this.queue.shift();
    while (task) {
      const start = Date.now();
      try {
        await task.run();
        task.resolve();
      } catch (error) {
        this.logger?.error({ label: task.label, error }, 'Queued task failed');
        task.reject(error);
      } finally {
        this.logger?.trace({ label: task.label, durationMs: Date.now() - start }, 'Task done');
      }
      task = this.queue.shift();
    }
    this.processing = false;
  }
}
