import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { TopicArchiver } from "./archiver.ts";
import { SqliteMappingStore } from "../store/sqliteMappingStore.ts";
import { DeliveryFailure } from "../routing/errors.ts";
import { FakeTransport } from "../testing/fakeTransport.ts";

const GROUP = -1001;
const HOUR = 60 * 60 * 1000;

describe("TopicArchiver", () => {
  let clock: Date;
  let store: SqliteMappingStore;
  let transport: FakeTransport;
  let archiver: TopicArchiver;

  function advance(hours: number): void {
    clock = new Date(clock.getTime() + hours * HOUR);
  }

  beforeEach(() => {
    clock = new Date("2026-03-01T00:00:00.000Z");
    store = new SqliteMappingStore(":memory:", { now: () => clock });
    transport = new FakeTransport();
    archiver = new TopicArchiver(transport, store, GROUP, { archiveAfterHours: 72, now: () => clock });

    store.putTopic(1, 11);
    advance(2);
    store.putTopic(2, 22);
  });

  afterEach(() => {
    archiver.stop();
    store.close();
  });

  test("closes only topics idle past the threshold", async () => {
    advance(71);

    expect(await archiver.archiveIdle()).toEqual([11]);
    expect(transport.callsOf("closeForumTopic")).toEqual([{ method: "closeForumTopic", chatId: GROUP, topicId: 11 }]);
    expect(store.getTopicState(11)?.status).toBe("closed");
    expect(store.getTopicState(22)?.status).toBe("active");
    expect(store.getTopic(1)).toBe(11);
  });

  test("activity keeps a topic open", async () => {
    advance(70);
    archiver.touch(11);
    advance(3);

    expect(await archiver.archiveIdle()).toEqual([22]);
  });

  test("a closed topic is reopened on the next message", async () => {
    advance(100);
    await archiver.archiveIdle();

    expect(await archiver.ensureOpen(11)).toBe(true);
    expect(transport.callsOf("reopenForumTopic")).toEqual([{ method: "reopenForumTopic", chatId: GROUP, topicId: 11 }]);
    expect(store.getTopicState(11)?.status).toBe("active");

    expect(await archiver.ensureOpen(11)).toBe(false);
    expect(transport.callsOf("reopenForumTopic")).toHaveLength(1);
  });

  test("reopening a deleted topic is a stale delivery failure", async () => {
    advance(100);
    await archiver.archiveIdle();
    transport.deletedTopics.add(11);

    const error = await archiver.ensureOpen(11).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryFailure);
    if (error instanceof DeliveryFailure) {
      expect(error.staleTopic).toBe(true);
      expect(error.topicId).toBe(11);
    }
  });

  test("a deleted topic is marked closed without failing the sweep", async () => {
    transport.deletedTopics.add(11);
    advance(100);

    expect(await archiver.archiveIdle()).toEqual([11, 22]);
    expect(store.getTopicState(11)?.status).toBe("closed");
  });

  test("other close errors leave the topic active", async () => {
    transport.failNext("closeForumTopic", new Error("timeout"));
    advance(100);

    expect(await archiver.archiveIdle()).toEqual([22]);
    expect(store.getTopicState(11)?.status).toBe("active");
  });

  test("a threshold of 0 disables archiving", async () => {
    const disabled = new TopicArchiver(transport, store, GROUP, { archiveAfterHours: 0, now: () => clock });
    advance(1000);

    expect(disabled.enabled).toBe(false);
    expect(await disabled.archiveIdle()).toEqual([]);
    expect(transport.calls).toEqual([]);
  });
});
