/**
 * Message delivery with graceful degradation.
 *
 * User → support: copy, then forward, then plain text (or a notice when
 * there is no text). Support → user: copy only, so the operator's identity
 * is never exposed by a forward.
 *
 * A deleted forum topic short-circuits the chain: every fallback would hit
 * the same missing thread, and the caller needs to re-provision instead.
 */

import { DeliveryFailure } from "../routing/errors.ts";
import { isStaleTopicError } from "./grammyTransport.ts";
import type { ChatTarget, RelayResult, SourceMessage, TelegramTransport } from "./types.ts";

export const UNDISPLAYABLE_NOTICE = "Could not display the user's message (unsupported type or API error).";

function failure(target: ChatTarget, err: unknown): DeliveryFailure {
  return new DeliveryFailure(target.chatId, target.topicId ?? null, isStaleTopicError(err), err);
}

export async function relayMessage(
  transport: TelegramTransport,
  target: ChatTarget,
  source: SourceMessage,
): Promise<RelayResult> {
  try {
    const messageId = await transport.copyMessage(target, source.chatId, source.messageId);
    return { messageId, method: "copy" };
  } catch (copyError) {
    if (isStaleTopicError(copyError)) throw failure(target, copyError);
    console.warn(`[delivery] copy of ${source.chatId}/${source.messageId} failed, trying forward:`, copyError);
  }

  try {
    const messageId = await transport.forwardMessage(target, source.chatId, source.messageId);
    return { messageId, method: "forward" };
  } catch (forwardError) {
    if (isStaleTopicError(forwardError)) throw failure(target, forwardError);
    console.warn(`[delivery] forward of ${source.chatId}/${source.messageId} failed, sending text:`, forwardError);
  }

  try {
    if (source.text) {
      const messageId = await transport.sendText(target, `[User text]\n${source.text}`);
      return { messageId, method: "text" };
    }
    const messageId = await transport.sendText(target, UNDISPLAYABLE_NOTICE);
    return { messageId, method: "notice" };
  } catch (sendError) {
    throw failure(target, sendError);
  }
}

/**
 * Copy a support-side message into the user's private chat, threaded under
 * the user's own message when its id is known.
 */
export async function deliverReply(
  transport: TelegramTransport,
  userId: number,
  source: SourceMessage,
  replyToMessageId?: number,
): Promise<number> {
  const target: ChatTarget = { chatId: userId };
  try {
    return await transport.copyMessage(target, source.chatId, source.messageId, replyToMessageId);
  } catch (err) {
    throw failure(target, err);
  }
}
