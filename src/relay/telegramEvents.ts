/**
 * grammy Message → relay events.
 */

import type { Message, User } from "grammy/types";
import type { RelayMode } from "../config/relayConfig.ts";
import type { SupportMessageEvent, UserMessageEvent } from "./handlers.ts";

const SERVICE_FIELDS = [
  "forum_topic_created",
  "forum_topic_edited",
  "forum_topic_closed",
  "forum_topic_reopened",
  "general_forum_topic_hidden",
  "general_forum_topic_unhidden",
  "new_chat_members",
  "left_chat_member",
  "new_chat_title",
  "new_chat_photo",
  "delete_chat_photo",
  "group_chat_created",
  "supergroup_chat_created",
  "migrate_to_chat_id",
  "migrate_from_chat_id",
  "pinned_message",
  "message_auto_delete_timer_changed",
  "video_chat_scheduled",
  "video_chat_started",
  "video_chat_ended",
  "video_chat_participants_invited",
] as const;

export function isServiceMessage(msg: Message): boolean {
  return SERVICE_FIELDS.some((field) => msg[field] !== undefined);
}

/** A message that starts with a /command. */
export function isCommandMessage(msg: Message): boolean {
  return (msg.entities ?? []).some((e) => e.type === "bot_command" && e.offset === 0);
}

export function toUserEvent(msg: Message, from: User): UserMessageEvent {
  return {
    user: { id: from.id, firstName: from.first_name, lastName: from.last_name, username: from.username },
    chatId: msg.chat.id,
    messageId: msg.message_id,
    text: msg.text ?? msg.caption,
  };
}

export function toSupportEvent(msg: Message): SupportMessageEvent {
  const topicId = msg.is_topic_message ? msg.message_thread_id : undefined;
  const replied = msg.reply_to_message;
  // Inside a topic every message "replies" to the topic's root service message.
  const replyToMessageId =
    replied && replied.message_id !== msg.message_thread_id ? replied.message_id : undefined;

  return {
    chatId: msg.chat.id,
    messageId: msg.message_id,
    topicId,
    replyToMessageId,
    text: msg.text ?? msg.caption,
    fromBot: !msg.from || msg.from.is_bot,
    isCommand: isCommandMessage(msg),
    isService: isServiceMessage(msg),
  };
}

export type MessageSide = "support" | "user" | "ignore";

/**
 * Which side of the relay a message belongs to. The operator chat is matched
 * by id alone; any other private chat is a user.
 */
export function messageSide(mode: RelayMode, msg: Message, from: User | undefined): MessageSide {
  const operatorChatId = mode.kind === "owner" ? mode.ownerId : mode.supportChatId;
  if (msg.chat.id === operatorChatId) return "support";

  if (msg.chat.type !== "private") return "ignore";
  if (!from || from.is_bot || isCommandMessage(msg)) return "ignore";
  return "user";
}
