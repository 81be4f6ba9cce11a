/**
 * Bot Commands
 *
 * Available commands:
 *   /start  - Greeting; in forum mode opens the user's topic right away
 *   /id     - Show the current chat id (for OWNER_ID / SUPPORT_CHAT_ID)
 *   /stats  - Conversation counts (owner chat or support group only)
 */

import type { Bot } from "grammy";
import type { RelayMode } from "../config/relayConfig.ts";
import { openConversation, type RelayDeps } from "../relay/handlers.ts";
import type { ConversationStats, MappingStore } from "../store/types.ts";

export interface CommandOptions {
  relay: RelayDeps;
  store: MappingStore;
}

export const USER_GREETING =
  "Hello! Describe your question or problem. Screenshots and your contact email help us answer faster. " +
  "An operator will reply in this chat.";

export function ownerGreeting(mode: RelayMode): string {
  const where = mode.kind === "forum" ? "the support group, one topic per user" : "this chat";
  return [
    `You are an operator. User messages are relayed to ${where}.`,
    mode.kind === "forum"
      ? "Write inside a user's topic and the bot sends it to that user."
      : "Reply to a relayed message and the bot sends your answer to that user.",
    "",
    "Commands:",
    "/id - show this chat's id",
    "/stats - conversation counts",
  ].join("\n");
}

/** True for the chat operators work in. */
export function isOperatorChat(mode: RelayMode, chatId: number): boolean {
  return mode.kind === "forum" ? chatId === mode.supportChatId : chatId === mode.ownerId;
}

export function formatStats(mode: RelayMode, stats: ConversationStats): string {
  const lines = [`Conversations: ${stats.users}`];
  if (mode.kind === "forum") {
    lines.push(`Active topics: ${stats.activeTopics}`, `Closed topics: ${stats.closedTopics}`);
  }
  return lines.join("\n");
}

/**
 * Register all bot commands.
 * Call once at startup, before the message handlers.
 */
export function registerCommands(bot: Bot, options: CommandOptions): void {
  const { relay, store } = options;
  const { mode } = relay;

  // /start - greet; users in forum mode get their topic immediately
  bot.command("start", async (ctx) => {
    const from = ctx.from;
    if (!from) return;

    if (isOperatorChat(mode, ctx.chat.id)) {
      await ctx.reply(ownerGreeting(mode));
      return;
    }
    if (ctx.chat.type !== "private") return;

    await ctx.reply(USER_GREETING);
    if (mode.kind === "forum") {
      const destination = await openConversation(relay, {
        user: { id: from.id, firstName: from.first_name, lastName: from.last_name, username: from.username },
        chatId: ctx.chat.id,
        messageId: ctx.msg.message_id,
      });
      if (destination.kind === "topic") {
        console.log(`[commands] /start from user ${from.id} -> topic ${destination.topicId}`);
      }
    }
  });

  // /id - print the chat id, used while configuring the relay
  bot.command("id", async (ctx) => {
    await ctx.reply(String(ctx.chat.id));
  });

  // /stats - operators only
  bot.command("stats", async (ctx) => {
    if (!isOperatorChat(mode, ctx.chat.id)) return;
    await ctx.reply(formatStats(mode, store.getStats()));
  });
}
