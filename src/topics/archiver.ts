/**
 * Topic Archiver
 *
 * Closes forum topics whose conversation has been idle for longer than
 * ARCHIVE_AFTER_HOURS and reopens them when the user writes again. Closing
 * only changes the topic's status: the binding stays, so the user keeps
 * their topic and its history.
 */

import { isStaleTopicError } from "../delivery/grammyTransport.ts";
import type { TelegramTransport } from "../delivery/types.ts";
import { DeliveryFailure } from "../routing/errors.ts";
import type { MappingStore } from "../store/types.ts";
import { trace } from "../utils/tracer.ts";

export interface ArchiverOptions {
  /** 0 disables archiving. */
  archiveAfterHours: number;
  intervalMs?: number;
  initialDelayMs?: number;
  now?: () => Date;
}

const HOUR_MS = 60 * 60 * 1000;

export class TopicArchiver {
  private intervalMs: number;
  private initialDelayMs: number;
  private now: () => Date;
  private timer?: ReturnType<typeof setInterval>;
  private firstRun?: ReturnType<typeof setTimeout>;
  private running = false;

  constructor(
    private transport: TelegramTransport,
    private store: MappingStore,
    private supportChatId: number,
    private options: ArchiverOptions,
  ) {
    this.intervalMs = options.intervalMs ?? HOUR_MS;
    this.initialDelayMs = options.initialDelayMs ?? 60_000;
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.options.archiveAfterHours > 0;
  }

  start(): void {
    if (!this.enabled || this.timer) return;
    const sweep = (): void => {
      this.archiveIdle().catch((err) => console.error("[archiver] sweep failed:", err));
    };
    this.firstRun = setTimeout(sweep, this.initialDelayMs);
    this.firstRun.unref();
    this.timer = setInterval(sweep, this.intervalMs);
    this.timer.unref();
    console.log(`[archiver] closing topics idle for more than ${this.options.archiveAfterHours}h`);
  }

  stop(): void {
    if (this.firstRun) clearTimeout(this.firstRun);
    if (this.timer) clearInterval(this.timer);
    this.firstRun = undefined;
    this.timer = undefined;
  }

  /**
   * Close every active topic idle past the threshold. Returns the ids that
   * were closed. Overlapping sweeps are skipped.
   */
  async archiveIdle(): Promise<number[]> {
    if (!this.enabled || this.running) return [];
    this.running = true;
    const closed: number[] = [];
    try {
      const cutoff = new Date(this.now().getTime() - this.options.archiveAfterHours * HOUR_MS);
      for (const topicId of this.store.listIdleTopics(cutoff)) {
        try {
          await this.transport.closeForumTopic(this.supportChatId, topicId);
        } catch (err) {
          if (!isStaleTopicError(err)) {
            console.warn(`[archiver] could not close topic ${topicId}:`, err);
            continue;
          }
          // Deleted topics are marked closed too; the next message recovers them.
        }
        this.store.setTopicStatus(topicId, "closed");
        closed.push(topicId);
        trace({ event: "topic_archived", topicId });
      }
    } finally {
      this.running = false;
    }
    if (closed.length > 0) {
      console.log(`[archiver] closed ${closed.length} idle topic(s): ${closed.join(", ")}`);
    }
    return closed;
  }

  /**
   * Reopen a closed topic before relaying into it. Returns true when the
   * topic was reopened. A deleted topic rejects with a stale DeliveryFailure.
   */
  async ensureOpen(topicId: number): Promise<boolean> {
    const state = this.store.getTopicState(topicId);
    if (!state || state.status !== "closed") return false;

    try {
      await this.transport.reopenForumTopic(this.supportChatId, topicId);
    } catch (err) {
      if (isStaleTopicError(err)) {
        throw new DeliveryFailure(this.supportChatId, topicId, true, err);
      }
      // status stays closed; the relay still posts into the topic
      console.warn(`[archiver] could not reopen topic ${topicId}:`, err);
      return false;
    }
    this.store.setTopicStatus(topicId, "active");
    console.log(`[archiver] reopened topic ${topicId}`);
    return true;
  }

  touch(topicId: number): void {
    this.store.touchTopic(topicId);
  }
}
