/**
 * Shared utility for saving relayed messages to the messages table.
 */

import type { SupabaseClient } from "@supabase/supabase-js";

export type MessageDirection = "inbound" | "outbound";

export interface RelayedMessageEntry {
  direction: MessageDirection;
  userId: number;
  topicId: number | null;
  /** Text or caption; null for media without one. */
  content: string | null;
  relayedMessageId: number;
}

/**
 * Insert one relayed message. No-op when supabase is null; insert errors
 * are logged, never thrown.
 */
export async function saveRelayedMessage(
  supabase: SupabaseClient | null,
  entry: RelayedMessageEntry
): Promise<void> {
  if (!supabase) return;
  try {
    const { error } = await supabase.from("messages").insert({
      direction: entry.direction,
      user_id: entry.userId,
      topic_id: entry.topicId,
      content: entry.content,
      channel: "telegram",
      metadata: { relayed_message_id: entry.relayedMessageId },
    });
    if (error) {
      console.error("[saveRelayedMessage] insert failed:", error.message);
    }
  } catch (err) {
    // Non-fatal — the message was already delivered
    console.error("[saveRelayedMessage] error:", err);
  }
}
