/**
 * Routing Engine
 *
 * Decides where a user's message goes and which user a support-side
 * message belongs to.
 *
 * Per user there are two states: NEW (no conversation row / no topic) and
 * BOUND. In forum mode NEW → BOUND happens once, when a provisioned topic is
 * persisted; stale-topic recovery is BOUND → BOUND with a new topic. Every
 * check → provision → persist sequence runs on the user's queue, so two
 * first-contact messages from one user yield exactly one topic.
 */

import type { RelayMode } from "../config/relayConfig.ts";
import type { UserQueueManager } from "../queue/userQueueManager.ts";
import type { MappingStore } from "../store/types.ts";
import { trace } from "../utils/tracer.ts";
import { ConflictError, ProvisioningFailure, UnroutableReply, type ReplyOrigin } from "./errors.ts";
import type { TopicProvisioner } from "./topicProvisioner.ts";

export type Destination =
  | { kind: "owner"; chatId: number }
  | { kind: "topic"; chatId: number; topicId: number; created: boolean };

export interface InboundUser {
  userId: number;
  /** Display label used as the topic title. */
  label: string;
}

export interface OutboundRoute {
  userId: number;
  /** The user's own message to thread the reply under, when known. */
  replyToMessageId?: number;
}

export class RoutingEngine {
  constructor(
    private mode: RelayMode,
    private store: MappingStore,
    private queues: UserQueueManager,
    private provisioner: TopicProvisioner | null,
  ) {
    if (mode.kind === "forum" && !provisioner) {
      throw new Error("Forum mode requires a TopicProvisioner");
    }
  }

  /**
   * Resolve the destination for a user's message, provisioning a topic on
   * first contact in forum mode. Provisioning failures reject with
   * ProvisioningFailure and leave no binding behind.
   */
  async routeInbound(user: InboundUser): Promise<Destination> {
    const mode = this.mode;
    if (mode.kind === "owner") {
      if (this.store.registerUser(user.userId)) {
        console.log(`[routing] new conversation: user ${user.userId} -> owner ${mode.ownerId}`);
      }
      return { kind: "owner", chatId: mode.ownerId };
    }

    return this.queues.run<Destination>(user.userId, "route-inbound", async () => {
      const existing = this.store.getTopic(user.userId);
      if (existing !== undefined) {
        return { kind: "topic", chatId: mode.supportChatId, topicId: existing, created: false };
      }

      const topicId = await this.provisionAndBind(user);
      trace({ event: "topic_provisioned", userId: user.userId, topicId });
      console.log(`[routing] provisioned topic ${topicId} for user ${user.userId}`);
      return { kind: "topic", chatId: mode.supportChatId, topicId, created: true };
    });
  }

  /**
   * Replace a topic that turned out to be deleted. If another message from
   * the same user already recovered, the current binding is returned as is.
   */
  async recoverTopic(user: InboundUser, staleTopicId: number): Promise<Destination> {
    const mode = this.mode;
    if (mode.kind !== "forum") {
      throw new Error("Topic recovery is only meaningful in forum mode");
    }

    return this.queues.run<Destination>(user.userId, "recover-topic", async () => {
      const current = this.store.getTopic(user.userId);
      if (current !== undefined && current !== staleTopicId) {
        return { kind: "topic", chatId: mode.supportChatId, topicId: current, created: false };
      }

      const topicId = await this.provisionAndBind(user);
      trace({ event: "topic_recovered", userId: user.userId, staleTopicId, topicId });
      console.warn(`[routing] topic ${staleTopicId} of user ${user.userId} is gone, rebound to ${topicId}`);
      return { kind: "topic", chatId: mode.supportChatId, topicId, created: true };
    });
  }

  /** Remember which user a message posted on the support side came from. */
  recordRelayedMessage(relayedMessageId: number, userId: number, originMessageId?: number): void {
    this.store.recordReplyContext(relayedMessageId, userId, originMessageId ?? null);
  }

  /**
   * Resolve the user a support-side message belongs to.
   * Throws UnroutableReply when no user can be attributed.
   */
  routeOutbound(origin: ReplyOrigin): OutboundRoute {
    if (origin.kind === "reply") {
      const context = this.store.getReplyContext(origin.relayedMessageId);
      if (!context) throw new UnroutableReply(origin);
      return {
        userId: context.userId,
        ...(context.originMessageId !== null ? { replyToMessageId: context.originMessageId } : {}),
      };
    }

    if (this.mode.kind !== "forum") throw new UnroutableReply(origin);

    const userId = this.store.getUserByTopic(origin.topicId);
    if (userId === undefined) throw new UnroutableReply(origin);

    if (origin.replyToMessageId !== undefined) {
      const context = this.store.getReplyContext(origin.replyToMessageId);
      if (context && context.userId === userId && context.originMessageId !== null) {
        return { userId, replyToMessageId: context.originMessageId };
      }
    }
    return { userId };
  }

  private async provisionAndBind(user: InboundUser): Promise<number> {
    if (!this.provisioner) {
      throw new ProvisioningFailure(user.userId, new Error("no topic provisioner configured"));
    }

    let topicId: number;
    try {
      topicId = await this.provisioner.createTopic(user.label);
    } catch (err) {
      console.error(`[routing] topic creation failed for user ${user.userId}:`, err);
      throw new ProvisioningFailure(user.userId, err);
    }

    try {
      this.store.putTopic(user.userId, topicId);
    } catch (err) {
      if (err instanceof ConflictError) {
        console.error(
          `[routing] CONFLICT: topic ${topicId} already belongs to user ${err.boundUserId}; ` +
            `not binding user ${user.userId}`
        );
        trace({ event: "binding_conflict", topicId, boundUserId: err.boundUserId, userId: user.userId });
      }
      throw err;
    }
    return topicId;
  }
}
