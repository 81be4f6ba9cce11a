/**
 * Per-User Queue Manager
 *
 * Maintains an independent MessageQueue for each user id. This is the
 * per-user mutual-exclusion scope for mapping mutations: everything
 * submitted through run() for one user executes strictly one at a time,
 * different users run concurrently.
 */

import { MessageQueue } from "./messageQueue.ts";
import type { QueueConfig, QueueStats, QueueManagerStats } from "./types.ts";

const DEFAULT_CONFIG: QueueConfig = {
  idleTimeout: 60 * 60 * 1000, // 1 hour
  statsInterval: 5 * 60 * 1000, // 5 minutes
};

export class UserQueueManager {
  private queues = new Map<number, MessageQueue>();
  private lastActivity = new Map<number, number>();
  private config: QueueConfig;
  private cleanupInterval?: ReturnType<typeof setInterval>;
  private statsInterval?: ReturnType<typeof setInterval>;

  constructor(config?: Partial<QueueConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.startCleanupInterval();
    this.startStatsLogging();
  }

  /**
   * Get or create the queue for a user.
   */
  getOrCreate(userId: number): MessageQueue {
    let queue = this.queues.get(userId);
    if (!queue) {
      queue = new MessageQueue();
      this.queues.set(userId, queue);
    }
    this.lastActivity.set(userId, Date.now());
    return queue;
  }

  /**
   * Run `fn` on the user's queue and resolve with its result.
   */
  run<T>(userId: number, label: string, fn: () => Promise<T>): Promise<T> {
    return this.getOrCreate(userId).run(`${label}:${userId}`, fn);
  }

  /**
   * Remove empty queues that have been idle beyond the timeout.
   */
  cleanup(): void {
    const now = Date.now();
    let removed = 0;

    for (const [userId, lastActive] of this.lastActivity) {
      const queue = this.queues.get(userId);

      if (queue && queue.length === 0 && !queue.isProcessing && now - lastActive > this.config.idleTimeout) {
        this.queues.delete(userId);
        this.lastActivity.delete(userId);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[queue-manager] Removed ${removed} idle queue(s) (active: ${this.queues.size})`);
    }
  }

  /**
   * Get statistics for all queues.
   */
  getStats(): QueueManagerStats {
    const queues: QueueStats[] = [];
    let totalDepth = 0;
    let activeQueues = 0;

    for (const [userId, queue] of this.queues) {
      const depth = queue.length;
      const processing = queue.isProcessing;

      if (depth > 0 || processing) {
        activeQueues++;
      }

      totalDepth += depth;

      queues.push({
        userId,
        depth,
        processing,
        lastActivity: this.lastActivity.get(userId) || 0,
        consecutiveFailures: queue.getConsecutiveFailures(),
      });
    }

    return {
      timestamp: new Date().toISOString(),
      totalQueues: this.queues.size,
      activeQueues,
      totalDepth,
      queues: queues.filter((q) => q.depth > 0 || q.processing),
    };
  }

  /**
   * Gracefully shutdown: wait for all queues to drain or timeout.
   */
  async shutdown(timeoutMs: number = 30000): Promise<void> {
    if (this.cleanupInterval) clearInterval(this.cleanupInterval);
    if (this.statsInterval) clearInterval(this.statsInterval);

    const busy = (): number[] =>
      Array.from(this.queues.entries())
        .filter(([, queue]) => queue.length > 0 || queue.isProcessing)
        .map(([userId]) => userId);

    if (busy().length === 0) return;

    console.log(`[queue-manager] Waiting for ${busy().length} queue(s) to drain...`);

    const start = Date.now();
    while (Date.now() - start < timeoutMs) {
      if (busy().length === 0) {
        console.log("[queue-manager] All queues drained");
        return;
      }
      await new Promise((resolve) => setTimeout(resolve, 100));
    }

    console.warn(`[queue-manager] Shutdown timeout after ${timeoutMs}ms. Users still pending:`, busy());
  }

  private startCleanupInterval(): void {
    const interval = Math.max(this.config.idleTimeout / 4, 1000);
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, interval);
  }

  private startStatsLogging(): void {
    this.statsInterval = setInterval(() => {
      const stats = this.getStats();
      if (stats.activeQueues > 0) {
        console.log("[queue-stats]", JSON.stringify(stats));
      }
    }, this.config.statsInterval);
  }
}
