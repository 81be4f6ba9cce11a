/**
 * In-process TelegramTransport for tests.
 *
 * Hands out increasing message ids (from 500) and topic ids (from 1000),
 * records every call, and can simulate deleted topics, per-method failures
 * and slow topic creation.
 */

import { GrammyError } from "grammy";
import type { ChatTarget, TelegramTransport } from "../delivery/types.ts";

export type TransportCall =
  | { method: "copyMessage"; target: ChatTarget; fromChatId: number; messageId: number; replyTo?: number; result: number }
  | { method: "forwardMessage"; target: ChatTarget; fromChatId: number; messageId: number; result: number }
  | { method: "sendText"; target: ChatTarget; text: string; html: boolean; result: number }
  | { method: "createForumTopic"; chatId: number; name: string; result: number }
  | { method: "closeForumTopic"; chatId: number; topicId: number }
  | { method: "reopenForumTopic"; chatId: number; topicId: number };

type FailingMethod = "copyMessage" | "forwardMessage" | "sendText" | "createForumTopic" | "closeForumTopic" | "reopenForumTopic";

export function telegramError(method: string, description: string, code = 400): GrammyError {
  return new GrammyError(
    `Call to '${method}' failed! (${code}: ${description})`,
    { ok: false, error_code: code, description },
    method,
    {},
  );
}

export class FakeTransport implements TelegramTransport {
  calls: TransportCall[] = [];
  deletedTopics = new Set<number>();
  createTopicDelayMs = 0;
  private nextMessageId = 500;
  private nextTopicId = 1000;
  private failures = new Map<FailingMethod, unknown[]>();

  /** Make the next `count` calls of `method` reject with `error`. */
  failNext(method: FailingMethod, error: unknown, count = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < count; i++) queue.push(error);
    this.failures.set(method, queue);
  }

  callsOf<M extends TransportCall["method"]>(method: M): Extract<TransportCall, { method: M }>[] {
    return this.calls.filter((c): c is Extract<TransportCall, { method: M }> => c.method === method);
  }

  private check(method: FailingMethod, topicId?: number): void {
    const queued = this.failures.get(method);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }
    if (topicId !== undefined && this.deletedTopics.has(topicId)) {
      throw telegramError(method, "Bad Request: message thread not found");
    }
  }

  async copyMessage(target: ChatTarget, fromChatId: number, messageId: number, replyTo?: number): Promise<number> {
    this.check("copyMessage", target.topicId);
    const result = this.nextMessageId++;
    this.calls.push({ method: "copyMessage", target, fromChatId, messageId, replyTo, result });
    return result;
  }

  async forwardMessage(target: ChatTarget, fromChatId: number, messageId: number): Promise<number> {
    this.check("forwardMessage", target.topicId);
    const result = this.nextMessageId++;
    this.calls.push({ method: "forwardMessage", target, fromChatId, messageId, result });
    return result;
  }

  async sendText(target: ChatTarget, text: string, options?: { html?: boolean }): Promise<number> {
    this.check("sendText", target.topicId);
    const result = this.nextMessageId++;
    this.calls.push({ method: "sendText", target, text, html: options?.html ?? false, result });
    return result;
  }

  async createForumTopic(chatId: number, name: string): Promise<number> {
    if (this.createTopicDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.createTopicDelayMs));
    }
    this.check("createForumTopic");
    const result = this.nextTopicId++;
    this.calls.push({ method: "createForumTopic", chatId, name, result });
    return result;
  }

  async closeForumTopic(chatId: number, topicId: number): Promise<void> {
    this.check("closeForumTopic", topicId);
    this.calls.push({ method: "closeForumTopic", chatId, topicId });
  }

  async reopenForumTopic(chatId: number, topicId: number): Promise<void> {
    this.check("reopenForumTopic", topicId);
    this.calls.push({ method: "reopenForumTopic", chatId, topicId });
  }
}
