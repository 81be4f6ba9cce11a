/**
 * Relay Handlers
 *
 * The two directions of the relay, over plain event objects so they can run
 * without a live bot:
 *
 *   handleUserMessage    — a user's private message → owner chat or topic
 *   handleSupportMessage — a reply in the owner chat or a topic → the user
 *
 * relay.ts converts grammy contexts into these events.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import type { RelayMode } from "../config/relayConfig.ts";
import { deliverReply, relayMessage } from "../delivery/relayMessage.ts";
import type { ChatTarget, RelayResult, TelegramTransport } from "../delivery/types.ts";
import { DeliveryFailure, ProvisioningFailure, UnroutableReply, type ReplyOrigin } from "../routing/errors.ts";
import type { Destination, InboundUser, OutboundRoute, RoutingEngine } from "../routing/routingEngine.ts";
import type { TopicArchiver } from "../topics/archiver.ts";
import { saveRelayedMessage } from "../utils/saveMessage.ts";
import { trace } from "../utils/tracer.ts";
import { displayName, escapeHtml, formatUserHeader, type UserProfile } from "./userHeader.ts";

export const UNROUTABLE_NOTICE =
  "Could not tell which user this reply is for. Reply to a relayed message, or write inside the user's topic.";

export interface RelayDeps {
  mode: RelayMode;
  engine: RoutingEngine;
  transport: TelegramTransport;
  /** Forum mode only. */
  archiver: TopicArchiver | null;
  supabase: SupabaseClient | null;
}

export interface UserMessageEvent {
  user: UserProfile;
  /** The user's private chat. */
  chatId: number;
  messageId: number;
  /** Text or caption. */
  text?: string;
}

export interface SupportMessageEvent {
  chatId: number;
  messageId: number;
  /** Forum topic the message was posted in, if any. */
  topicId?: number;
  /** Message this one explicitly replies to. */
  replyToMessageId?: number;
  text?: string;
  fromBot: boolean;
  isCommand: boolean;
  isService: boolean;
}

export function openedHeader(user: UserProfile): string {
  return `Conversation opened: ${escapeHtml(formatUserHeader(user))}\nReply in this topic.`;
}

export function startedHeader(user: UserProfile): string {
  return `User started the conversation: ${escapeHtml(formatUserHeader(user))}`;
}

export function newMessageHeader(user: UserProfile): string {
  return `New message from: ${escapeHtml(formatUserHeader(user))}`;
}

export function provisioningNotice(user: UserProfile): string {
  return (
    `Could not create a topic for ${displayName(user)}.\n` +
    "Check that the chat is a forum and the bot may manage topics."
  );
}

// ============================================================
// USER → SUPPORT
// ============================================================

/**
 * Relay a user's private message. Resolves with the relayed copy, or null
 * when the message is not for relaying (the owner writing to the bot).
 */
export async function handleUserMessage(deps: RelayDeps, event: UserMessageEvent): Promise<RelayResult | null> {
  const { mode } = deps;
  if (mode.kind === "owner" && event.user.id === mode.ownerId) return null;

  try {
    return mode.kind === "forum" ? await relayToForum(deps, event) : await relayToOwner(deps, event, mode.ownerId);
  } catch (err) {
    console.error(`[relay] message ${event.messageId} from user ${event.user.id} was not relayed:`, err);
    trace({
      event: "relay_failed",
      direction: "inbound",
      userId: event.user.id,
      messageId: event.messageId,
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}

/**
 * /start: bind the user right away so operators see the conversation
 * before the first real message. Forum mode posts a header into the topic.
 */
export async function openConversation(deps: RelayDeps, event: UserMessageEvent): Promise<Destination> {
  const inbound: InboundUser = { userId: event.user.id, label: displayName(event.user) };
  const destination = await withProvisioningNotice(deps, event.user, () => deps.engine.routeInbound(inbound));
  if (destination.kind !== "topic") return destination;

  const target: ChatTarget = { chatId: destination.chatId, topicId: destination.topicId };
  await deps.archiver?.ensureOpen(destination.topicId);
  const header = destination.created ? openedHeader(event.user) : startedHeader(event.user);
  await postHeader(deps, target, header, event);
  deps.archiver?.touch(destination.topicId);
  return destination;
}

async function relayToForum(deps: RelayDeps, event: UserMessageEvent): Promise<RelayResult> {
  const inbound: InboundUser = { userId: event.user.id, label: displayName(event.user) };

  const destination = await withProvisioningNotice(deps, event.user, () => deps.engine.routeInbound(inbound));
  try {
    return await relayIntoTopic(deps, event, destination);
  } catch (err) {
    if (!(err instanceof DeliveryFailure) || !err.staleTopic || destination.kind !== "topic") throw err;

    const staleTopicId = destination.topicId;
    console.warn(`[relay] topic ${staleTopicId} of user ${event.user.id} is gone, recovering`);
    const recovered = await withProvisioningNotice(deps, event.user, () =>
      deps.engine.recoverTopic(inbound, staleTopicId)
    );
    return relayIntoTopic(deps, event, recovered);
  }
}

async function relayIntoTopic(deps: RelayDeps, event: UserMessageEvent, destination: Destination): Promise<RelayResult> {
  if (destination.kind !== "topic") {
    throw new Error(`Expected a topic destination, got ${destination.kind}`);
  }
  const target: ChatTarget = { chatId: destination.chatId, topicId: destination.topicId };

  if (destination.created) {
    await postHeader(deps, target, openedHeader(event.user), event);
  }
  await deps.archiver?.ensureOpen(destination.topicId);

  const result = await relayMessage(deps.transport, target, {
    chatId: event.chatId,
    messageId: event.messageId,
    text: event.text,
  });
  deps.engine.recordRelayedMessage(result.messageId, event.user.id, event.messageId);
  deps.archiver?.touch(destination.topicId);

  await logRelayed(deps, event, destination.topicId, result);
  return result;
}

async function relayToOwner(deps: RelayDeps, event: UserMessageEvent, ownerId: number): Promise<RelayResult> {
  await deps.engine.routeInbound({ userId: event.user.id, label: displayName(event.user) });
  const target: ChatTarget = { chatId: ownerId };

  await postHeader(deps, target, newMessageHeader(event.user), event);
  const result = await relayMessage(deps.transport, target, {
    chatId: event.chatId,
    messageId: event.messageId,
    text: event.text,
  });
  deps.engine.recordRelayedMessage(result.messageId, event.user.id, event.messageId);

  await logRelayed(deps, event, null, result);
  return result;
}

/**
 * Post a header line and make it a reply target too. A failed header does
 * not stop the relay; a deleted topic surfaces on the relay itself.
 */
async function postHeader(deps: RelayDeps, target: ChatTarget, html: string, event: UserMessageEvent): Promise<void> {
  try {
    const headerId = await deps.transport.sendText(target, html, { html: true });
    deps.engine.recordRelayedMessage(headerId, event.user.id, event.messageId);
  } catch (err) {
    console.warn(`[relay] header for user ${event.user.id} not posted:`, err);
  }
}

async function withProvisioningNotice(
  deps: RelayDeps,
  user: UserProfile,
  route: () => Promise<Destination>
): Promise<Destination> {
  try {
    return await route();
  } catch (err) {
    if (err instanceof ProvisioningFailure && deps.mode.kind === "forum") {
      await deps.transport
        .sendText({ chatId: deps.mode.supportChatId }, provisioningNotice(user))
        .catch((notifyErr: unknown) => console.error("[relay] could not notify operators:", notifyErr));
    }
    throw err;
  }
}

async function logRelayed(
  deps: RelayDeps,
  event: UserMessageEvent,
  topicId: number | null,
  result: RelayResult
): Promise<void> {
  console.log(
    `[relay] user ${event.user.id} -> ${topicId !== null ? `topic ${topicId}` : "owner"} ` +
      `(${result.method}, mid=${result.messageId})`
  );
  trace({
    event: "message_relayed",
    userId: event.user.id,
    topicId,
    method: result.method,
    relayedMessageId: result.messageId,
  });
  await saveRelayedMessage(deps.supabase, {
    direction: "inbound",
    userId: event.user.id,
    topicId,
    content: event.text ?? null,
    relayedMessageId: result.messageId,
  });
}

// ============================================================
// SUPPORT → USER
// ============================================================

/** Where a support-side message came from, or null when it is not a reply to route. */
export function replyOriginOf(mode: RelayMode, event: SupportMessageEvent): ReplyOrigin | null {
  if (event.fromBot || event.isCommand || event.isService) return null;

  if (mode.kind === "forum") {
    if (event.chatId !== mode.supportChatId || event.topicId === undefined) return null;
    return {
      kind: "topic",
      topicId: event.topicId,
      ...(event.replyToMessageId !== undefined ? { replyToMessageId: event.replyToMessageId } : {}),
    };
  }

  if (event.chatId !== mode.ownerId || event.replyToMessageId === undefined) return null;
  return { kind: "reply", relayedMessageId: event.replyToMessageId };
}

/**
 * Deliver an operator's message to its user. Resolves with the id of the
 * copy in the user's chat, or null when nothing was delivered (not a
 * routable message, or unroutable and reported back to the replier).
 */
export async function handleSupportMessage(deps: RelayDeps, event: SupportMessageEvent): Promise<number | null> {
  const origin = replyOriginOf(deps.mode, event);
  if (!origin) return null;

  const replier: ChatTarget = {
    chatId: event.chatId,
    ...(event.topicId !== undefined ? { topicId: event.topicId } : {}),
  };

  let route: OutboundRoute;
  try {
    route = deps.engine.routeOutbound(origin);
  } catch (err) {
    if (!(err instanceof UnroutableReply)) throw err;
    console.warn(`[relay] ${err.message}`);
    trace({ event: "unroutable_reply", chatId: event.chatId, messageId: event.messageId, origin });
    await deps.transport.sendText(replier, UNROUTABLE_NOTICE);
    return null;
  }

  let delivered: number;
  try {
    delivered = await deliverReply(
      deps.transport,
      route.userId,
      { chatId: event.chatId, messageId: event.messageId, text: event.text },
      route.replyToMessageId
    );
  } catch (err) {
    console.error(`[relay] reply ${event.messageId} to user ${route.userId} was not delivered:`, err);
    trace({
      event: "relay_failed",
      direction: "outbound",
      userId: route.userId,
      messageId: event.messageId,
      error: err instanceof Error ? err.message : String(err),
    });
    const reason = err instanceof Error ? err.message : String(err);
    await deps.transport
      .sendText(replier, `Not delivered: ${reason}`)
      .catch((notifyErr: unknown) => console.error("[relay] could not notify replier:", notifyErr));
    throw err;
  }

  if (event.topicId !== undefined) deps.archiver?.touch(event.topicId);

  console.log(`[relay] reply ${event.messageId} -> user ${route.userId} (mid=${delivered})`);
  trace({ event: "reply_delivered", userId: route.userId, topicId: event.topicId ?? null, deliveredMessageId: delivered });
  await saveRelayedMessage(deps.supabase, {
    direction: "outbound",
    userId: route.userId,
    topicId: event.topicId ?? null,
    content: event.text ?? null,
    relayedMessageId: delivered,
  });
  return delivered;
}
