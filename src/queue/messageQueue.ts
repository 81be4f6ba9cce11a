/**
 * FIFO Queue for Sequential Task Processing
 *
 * Processes tasks one at a time in order. Each user gets their own
 * MessageQueue so mapping mutations for one user never interleave, while
 * different users proceed concurrently.
 */

import type { QueueTask } from "./types.ts";

export class MessageQueue {
  private queue: QueueTask[] = [];
  private processing = false;
  private consecutiveFailures = 0;

  get length(): number {
    return this.queue.length;
  }

  get isProcessing(): boolean {
    return this.processing;
  }

  enqueue(task: QueueTask): void {
    this.queue.push(task);
    if (!this.processing) {
      void this.processQueue();
    }
  }

  /**
   * Enqueue `fn` and resolve with its result once it has run.
   * A rejection is delivered to the caller and also counted as a failure.
   */
  run<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.enqueue({
        label,
        run: async () => {
          try {
            resolve(await fn());
          } catch (error) {
            reject(error);
            throw error;
          }
        },
      });
    });
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    let task = this.queue.shift();
    while (task) {
      const start = Date.now();
      try {
        await task.run();
        this.consecutiveFailures = 0;
      } catch (error) {
        console.error(`[queue] task failed (${task.label}):`, error);
        this.consecutiveFailures++;
      } finally {
        const elapsed = Date.now() - start;
        if (elapsed > 5000) {
          console.warn(`[queue] slow task: ${task.label} (${elapsed}ms)`);
        }
      }
      task = this.queue.shift();
    }
    this.processing = false;
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }
}
