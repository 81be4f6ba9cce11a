/**
 * SQLite-backed MappingStore.
 *
 * Tables:
 *   user_conversations (user_id PK, topic_id UNIQUE NULL, created_at)
 *   reply_contexts     (seq PK, relayed_message_id UNIQUE, user_id, origin_message_id, created_at)
 *   topic_states       (topic_id PK, status, last_activity)
 *   store_meta         (key PK, value)
 *
 * better-sqlite3 is synchronous, so no other callback can interleave with a
 * method call; multi-statement writes still run in a transaction so a crash
 * never leaves half a binding on disk.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { ConflictError } from "../routing/errors.ts";
import type {
  ConversationStats,
  MappingStore,
  ReplyContext,
  TopicState,
  TopicStatus,
  UserConversation,
} from "./types.ts";

export interface SqliteMappingStoreOptions {
  /** Newest reply contexts to keep. 0 keeps every row. */
  replyContextLimit?: number;
  /**
   * Identifies the chat reply contexts were recorded in ("owner:555",
   * "forum:-1001"). Message ids are only unique per chat, so contexts from a
   * different scope are cleared on open.
   */
  replyScope?: string;
  now?: () => Date;
}

interface ConversationRow {
  user_id: number;
  topic_id: number | null;
  created_at: string;
}

interface ReplyContextRow {
  relayed_message_id: number;
  user_id: number;
  origin_message_id: number | null;
  created_at: string;
}

interface TopicStateRow {
  topic_id: number;
  status: TopicStatus;
  last_activity: string;
}

export class SqliteMappingStore implements MappingStore {
  private db: Database.Database;
  private replyContextLimit: number;
  private now: () => Date;

  constructor(dbPath: string, options: SqliteMappingStoreOptions = {}) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.replyContextLimit = options.replyContextLimit ?? 10_000;
    this.now = options.now ?? (() => new Date());
    this.init();
    if (options.replyScope !== undefined) {
      this.claimReplyScope(options.replyScope);
    }
  }

  private init(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS user_conversations (
        user_id INTEGER PRIMARY KEY,
        topic_id INTEGER UNIQUE,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS reply_contexts (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        relayed_message_id INTEGER NOT NULL UNIQUE,
        user_id INTEGER NOT NULL,
        origin_message_id INTEGER,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS topic_states (
        topic_id INTEGER PRIMARY KEY,
        status TEXT NOT NULL DEFAULT 'active',
        last_activity TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS store_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_topic_states_idle ON topic_states(status, last_activity);
    `);
  }

  private claimReplyScope(scope: string): void {
    const claim = this.db.transaction(() => {
      const row = this.db
        .prepare<[], { value: string }>("SELECT value FROM store_meta WHERE key = 'reply_scope'")
        .get();
      let cleared = 0;
      if (row && row.value !== scope) {
        cleared = this.db.prepare("DELETE FROM reply_contexts").run().changes;
      }
      this.db
        .prepare<[string]>(
          `INSERT INTO store_meta (key, value) VALUES ('reply_scope', ?)
           ON CONFLICT(key) DO UPDATE SET value = excluded.value`
        )
        .run(scope);
      return { previous: row?.value, cleared };
    });

    const { previous, cleared } = claim();
    if (previous !== undefined && previous !== scope) {
      console.log(`[store] reply scope changed ${previous} -> ${scope}, cleared ${cleared} reply context(s)`);
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  getConversation(userId: number): UserConversation | undefined {
    const row = this.db
      .prepare<[number], ConversationRow>(
        "SELECT user_id, topic_id, created_at FROM user_conversations WHERE user_id = ?"
      )
      .get(userId);
    if (!row) return undefined;
    return { userId: row.user_id, topicId: row.topic_id, createdAt: row.created_at };
  }

  getTopic(userId: number): number | undefined {
    return this.getConversation(userId)?.topicId ?? undefined;
  }

  getUserByTopic(topicId: number): number | undefined {
    const row = this.db
      .prepare<[number], { user_id: number }>("SELECT user_id FROM user_conversations WHERE topic_id = ?")
      .get(topicId);
    return row?.user_id;
  }

  putTopic(userId: number, topicId: number): void {
    const bind = this.db.transaction(() => {
      const owner = this.getUserByTopic(topicId);
      if (owner !== undefined && owner !== userId) {
        throw new ConflictError(topicId, owner, userId);
      }

      const previous = this.getTopic(userId);
      const now = this.timestamp();
      this.db
        .prepare<[number, number, string]>(
          `INSERT INTO user_conversations (user_id, topic_id, created_at) VALUES (?, ?, ?)
           ON CONFLICT(user_id) DO UPDATE SET topic_id = excluded.topic_id`
        )
        .run(userId, topicId, now);

      if (previous !== undefined && previous !== topicId) {
        this.db.prepare<[number]>("DELETE FROM topic_states WHERE topic_id = ?").run(previous);
      }
      this.db
        .prepare<[number, string]>(
          `INSERT INTO topic_states (topic_id, status, last_activity) VALUES (?, 'active', ?)
           ON CONFLICT(topic_id) DO UPDATE SET status = 'active', last_activity = excluded.last_activity`
        )
        .run(topicId, now);
    });

    bind();
    console.log(`[store] bound user ${userId} -> topic ${topicId}`);
  }

  registerUser(userId: number): boolean {
    const result = this.db
      .prepare<[number, string]>(
        "INSERT OR IGNORE INTO user_conversations (user_id, topic_id, created_at) VALUES (?, NULL, ?)"
      )
      .run(userId, this.timestamp());
    return result.changes > 0;
  }

  recordReplyContext(relayedMessageId: number, userId: number, originMessageId: number | null = null): void {
    const record = this.db.transaction(() => {
      this.db
        .prepare<[number, number, number | null, string]>(
          `INSERT OR REPLACE INTO reply_contexts (relayed_message_id, user_id, origin_message_id, created_at)
           VALUES (?, ?, ?, ?)`
        )
        .run(relayedMessageId, userId, originMessageId, this.timestamp());

      if (this.replyContextLimit <= 0) return 0;
      return this.db
        .prepare<[number]>(
          `DELETE FROM reply_contexts WHERE seq NOT IN (
             SELECT seq FROM reply_contexts ORDER BY seq DESC LIMIT ?
           )`
        )
        .run(this.replyContextLimit).changes;
    });

    const pruned = record();
    if (pruned > 0) {
      console.log(`[store] pruned ${pruned} reply context(s) beyond limit ${this.replyContextLimit}`);
    }
  }

  getReplyContext(relayedMessageId: number): ReplyContext | undefined {
    const row = this.db
      .prepare<[number], ReplyContextRow>(
        `SELECT relayed_message_id, user_id, origin_message_id, created_at
         FROM reply_contexts WHERE relayed_message_id = ?`
      )
      .get(relayedMessageId);
    if (!row) return undefined;
    return {
      relayedMessageId: row.relayed_message_id,
      userId: row.user_id,
      originMessageId: row.origin_message_id,
      createdAt: row.created_at,
    };
  }

  getUserByRelayedMessage(relayedMessageId: number): number | undefined {
    return this.getReplyContext(relayedMessageId)?.userId;
  }

  getTopicState(topicId: number): TopicState | undefined {
    const row = this.db
      .prepare<[number], TopicStateRow>(
        "SELECT topic_id, status, last_activity FROM topic_states WHERE topic_id = ?"
      )
      .get(topicId);
    if (!row) return undefined;
    return { topicId: row.topic_id, status: row.status, lastActivity: row.last_activity };
  }

  setTopicStatus(topicId: number, status: TopicStatus): void {
    this.db
      .prepare<[number, string, string]>(
        `INSERT INTO topic_states (topic_id, status, last_activity) VALUES (?, ?, ?)
         ON CONFLICT(topic_id) DO UPDATE SET status = excluded.status`
      )
      .run(topicId, status, this.timestamp());
  }

  touchTopic(topicId: number): void {
    this.db
      .prepare<[string, number]>("UPDATE topic_states SET last_activity = ? WHERE topic_id = ?")
      .run(this.timestamp(), topicId);
  }

  listIdleTopics(olderThan: Date): number[] {
    return this.db
      .prepare<[string], { topic_id: number }>(
        `SELECT topic_id FROM topic_states
         WHERE status = 'active' AND last_activity <= ?
         ORDER BY last_activity`
      )
      .all(olderThan.toISOString())
      .map((row) => row.topic_id);
  }

  getStats(): ConversationStats {
    const users = this.db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM user_conversations")
      .get();
    const topics = this.db
      .prepare<[], { status: TopicStatus; n: number }>(
        "SELECT status, COUNT(*) AS n FROM topic_states GROUP BY status"
      )
      .all();
    return {
      users: users?.n ?? 0,
      activeTopics: topics.find((t) => t.status === "active")?.n ?? 0,
      closedTopics: topics.find((t) => t.status === "closed")?.n ?? 0,
    };
  }

  close(): void {
    this.db.close();
  }
}
