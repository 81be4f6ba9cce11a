export type TopicStatus = "active" | "closed";

export interface UserConversation {
  userId: number;
  topicId: number | null;
  createdAt: string;
}

export interface ReplyContext {
  relayedMessageId: number;
  userId: number;
  /** The user's own message in their private chat, for reply threading. */
  originMessageId: number | null;
  createdAt: string;
}

export interface TopicState {
  topicId: number;
  status: TopicStatus;
  lastActivity: string;
}

export interface ConversationStats {
  users: number;
  activeTopics: number;
  closedTopics: number;
}

/**
 * Durable user↔conversation mapping.
 *
 * Every method is atomic on its own. Callers that need
 * read-then-create-if-absent across an await (topic provisioning) serialize
 * per user through UserQueueManager.
 */
export interface MappingStore {
  getConversation(userId: number): UserConversation | undefined;
  getTopic(userId: number): number | undefined;
  getUserByTopic(topicId: number): number | undefined;
  /**
   * Bind (or, on stale-topic recovery, rebind) a user to a topic.
   * Throws ConflictError when the topic belongs to another user.
   */
  putTopic(userId: number, topicId: number): void;
  /** Insert a topic-less conversation row if the user is unseen. Returns true when inserted. */
  registerUser(userId: number): boolean;

  recordReplyContext(relayedMessageId: number, userId: number, originMessageId?: number | null): void;
  getReplyContext(relayedMessageId: number): ReplyContext | undefined;
  getUserByRelayedMessage(relayedMessageId: number): number | undefined;

  getTopicState(topicId: number): TopicState | undefined;
  setTopicStatus(topicId: number, status: TopicStatus): void;
  touchTopic(topicId: number): void;
  listIdleTopics(olderThan: Date): number[];

  getStats(): ConversationStats;
  close(): void;
}
