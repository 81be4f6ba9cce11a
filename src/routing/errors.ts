/**
 * Routing error taxonomy.
 *
 * ProvisioningFailure  — topic creation failed; nothing was persisted.
 * ConflictError        — a topic is already bound to another user.
 * UnroutableReply      — a support-side message maps to no user.
 * DeliveryFailure      — copying a message failed; staleTopic marks a
 *                        deleted/inaccessible forum topic.
 */

function reasonOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause ?? "unknown error");
}

export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelayError";
  }
}

export class ProvisioningFailure extends RelayError {
  constructor(readonly userId: number, cause?: unknown) {
    super(`Could not create a topic for user ${userId}: ${reasonOf(cause)}`, { cause });
    this.name = "ProvisioningFailure";
  }
}

export class ConflictError extends RelayError {
  constructor(
    readonly topicId: number,
    readonly boundUserId: number,
    readonly attemptedUserId: number,
  ) {
    super(`Topic ${topicId} is already bound to user ${boundUserId}, refusing to bind user ${attemptedUserId}`);
    this.name = "ConflictError";
  }
}

export type ReplyOrigin =
  | { kind: "topic"; topicId: number; replyToMessageId?: number }
  | { kind: "reply"; relayedMessageId: number };

export class UnroutableReply extends RelayError {
  constructor(readonly origin: ReplyOrigin) {
    super(
      `No user is associated with ${
        origin.kind === "topic" ? `topic ${origin.topicId}` : `message ${origin.relayedMessageId}`
      }`,
    );
    this.name = "UnroutableReply";
  }
}

export class DeliveryFailure extends RelayError {
  constructor(
    readonly chatId: number,
    readonly topicId: number | null,
    readonly staleTopic: boolean,
    cause?: unknown,
  ) {
    super(
      `Delivery to chat ${chatId}${topicId !== null ? ` topic ${topicId}` : ""} failed` +
        `${staleTopic ? " (topic deleted)" : ""}: ${reasonOf(cause)}`,
      { cause },
    );
    this.name = "DeliveryFailure";
  }
}
