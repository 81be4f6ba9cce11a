/** A chat, optionally narrowed to one forum topic. */
export interface ChatTarget {
  chatId: number;
  topicId?: number;
}

/**
 * The slice of the Telegram Bot API the relay uses. Every method resolves
 * with the id of the message or topic it created.
 */
export interface TelegramTransport {
  copyMessage(target: ChatTarget, fromChatId: number, messageId: number, replyToMessageId?: number): Promise<number>;
  forwardMessage(target: ChatTarget, fromChatId: number, messageId: number): Promise<number>;
  sendText(target: ChatTarget, text: string, options?: { html?: boolean }): Promise<number>;
  createForumTopic(chatId: number, name: string): Promise<number>;
  closeForumTopic(chatId: number, topicId: number): Promise<void>;
  reopenForumTopic(chatId: number, topicId: number): Promise<void>;
}

/** A message in some chat that should be carried to a target. */
export interface SourceMessage {
  chatId: number;
  messageId: number;
  /** Text or caption, used by the last-resort text fallback. */
  text?: string;
}

export type RelayMethod = "copy" | "forward" | "text" | "notice";

export interface RelayResult {
  /** Id of the message in the target chat that now carries the content. */
  messageId: number;
  method: RelayMethod;
}
