/**
 * Topic Provisioner
 *
 * Creates the forum topic that becomes a user's support conversation.
 * The transport call is raced against a timeout; a late success after the
 * timeout is not used, so the caller never persists a topic it gave up on.
 */

import type { TelegramTransport } from "../delivery/types.ts";

/** Telegram's limit on forum topic names. */
export const MAX_TOPIC_TITLE_LENGTH = 128;

export interface TopicProvisioner {
  createTopic(userLabel: string): Promise<number>;
}

export function topicTitle(userLabel: string): string {
  const trimmed = userLabel.trim() || "User";
  return Array.from(trimmed).slice(0, MAX_TOPIC_TITLE_LENGTH).join("");
}

export class TelegramTopicProvisioner implements TopicProvisioner {
  constructor(
    private transport: TelegramTransport,
    private supportChatId: number,
    private timeoutMs: number,
  ) {}

  async createTopic(userLabel: string): Promise<number> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`createForumTopic timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([
        this.transport.createForumTopic(this.supportChatId, topicTitle(userLabel)),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
