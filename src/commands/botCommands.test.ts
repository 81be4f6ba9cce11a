import { describe, test, expect } from "vitest";
import { formatStats, isOperatorChat, ownerGreeting } from "./botCommands.ts";
import type { RelayMode } from "../config/relayConfig.ts";

const FORUM: RelayMode = { kind: "forum", supportChatId: -1001 };
const OWNER: RelayMode = { kind: "owner", ownerId: 555 };

// We test the pure functions only (no bot instance needed)
describe("formatStats", () => {
  const stats = { users: 3, activeTopics: 1, closedTopics: 2 };

  test("forum mode lists topic counts", () => {
    expect(formatStats(FORUM, stats)).toBe("Conversations: 3\nActive topics: 1\nClosed topics: 2");
  });

  test("owner mode lists conversations only", () => {
    expect(formatStats(OWNER, stats)).toBe("Conversations: 3");
  });
});

describe("isOperatorChat", () => {
  test("matches the support group in forum mode", () => {
    expect(isOperatorChat(FORUM, -1001)).toBe(true);
    expect(isOperatorChat(FORUM, 555)).toBe(false);
  });

  test("matches the owner chat in owner mode", () => {
    expect(isOperatorChat(OWNER, 555)).toBe(true);
    expect(isOperatorChat(OWNER, -1001)).toBe(false);
  });
});

describe("ownerGreeting", () => {
  test("explains reply-based routing in owner mode", () => {
    expect(ownerGreeting(OWNER).split("\n")[1]).toBe(
      "Reply to a relayed message and the bot sends your answer to that user."
    );
  });

  test("explains topic routing in forum mode", () => {
    expect(ownerGreeting(FORUM).split("\n")[0]).toBe(
      "You are an operator. User messages are relayed to the support group, one topic per user."
    );
  });
});
