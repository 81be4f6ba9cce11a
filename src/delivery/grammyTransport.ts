/**
 * TelegramTransport over grammy's Api.
 */

import { GrammyError, type Api } from "grammy";
import type { ChatTarget, TelegramTransport } from "./types.ts";

const STALE_TOPIC_PATTERNS = [/message thread not found/i, /TOPIC_DELETED/i, /TOPIC_ID_INVALID/i];

/**
 * True when Telegram rejected a call because the forum topic no longer
 * exists (deleted by an admin, or never existed in this group).
 */
export function isStaleTopicError(err: unknown): boolean {
  if (!(err instanceof GrammyError)) return false;
  return STALE_TOPIC_PATTERNS.some((pattern) => pattern.test(err.description));
}

function thread(target: ChatTarget): { message_thread_id?: number } {
  return target.topicId !== undefined ? { message_thread_id: target.topicId } : {};
}

export function createGrammyTransport(api: Api): TelegramTransport {
  return {
    async copyMessage(target, fromChatId, messageId, replyToMessageId) {
      const copied = await api.copyMessage(target.chatId, fromChatId, messageId, {
        ...thread(target),
        ...(replyToMessageId !== undefined
          ? { reply_parameters: { message_id: replyToMessageId, allow_sending_without_reply: true } }
          : {}),
      });
      return copied.message_id;
    },

    async forwardMessage(target, fromChatId, messageId) {
      const forwarded = await api.forwardMessage(target.chatId, fromChatId, messageId, thread(target));
      return forwarded.message_id;
    },

    async sendText(target, text, options) {
      const sent = await api.sendMessage(target.chatId, text, {
        ...thread(target),
        ...(options?.html ? { parse_mode: "HTML" as const } : {}),
        link_preview_options: { is_disabled: true },
      });
      return sent.message_id;
    },

    async createForumTopic(chatId, name) {
      const topic = await api.createForumTopic(chatId, name);
      return topic.message_thread_id;
    },

    async closeForumTopic(chatId, topicId) {
      await api.closeForumTopic(chatId, topicId);
    },

    async reopenForumTopic(chatId, topicId) {
      await api.reopenForumTopic(chatId, topicId);
    },
  };
}
