import { describe, test, expect } from "vitest";
import { MessageQueue } from "./messageQueue.ts";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function waitForQueueEmpty(queue: MessageQueue, timeoutMs = 5000): Promise<void> {
  const start = Date.now();
  while (queue.length > 0 || queue.isProcessing) {
    if (Date.now() - start > timeoutMs) {
      throw new Error("Timeout waiting for queue to empty");
    }
    await sleep(20);
  }
}

describe("MessageQueue", () => {
  test("initializes empty", () => {
    const queue = new MessageQueue();
    expect(queue.length).toBe(0);
    expect(queue.isProcessing).toBe(false);
  });

  test("processes tasks in FIFO order", async () => {
    const queue = new MessageQueue();
    const results: number[] = [];

    for (const n of [1, 2, 3]) {
      queue.enqueue({ label: `task-${n}`, run: async () => void results.push(n) });
    }

    await waitForQueueEmpty(queue);
    expect(results).toEqual([1, 2, 3]);
  });

  test("processes one task at a time", async () => {
    const queue = new MessageQueue();
    let concurrent = 0;
    let maxConcurrent = 0;

    for (let i = 0; i < 5; i++) {
      queue.enqueue({
        label: `concurrent-check-${i}`,
        run: async () => {
          concurrent++;
          maxConcurrent = Math.max(maxConcurrent, concurrent);
          await sleep(10);
          concurrent--;
        },
      });
    }

    await waitForQueueEmpty(queue);
    expect(maxConcurrent).toBe(1);
  });

  test("continues processing after task failure", async () => {
    const queue = new MessageQueue();
    const results: string[] = [];

    queue.enqueue({ label: "task-1", run: async () => void results.push("task-1") });
    queue.enqueue({
      label: "task-2-fail",
      run: async () => {
        throw new Error("Task 2 failed");
      },
    });
    queue.enqueue({ label: "task-3", run: async () => void results.push("task-3") });

    await waitForQueueEmpty(queue);

    expect(results).toEqual(["task-1", "task-3"]);
    expect(queue.getConsecutiveFailures()).toBe(0);
  });

  test("tracks consecutive failures", async () => {
    const queue = new MessageQueue();
    for (let i = 0; i < 3; i++) {
      queue.enqueue({
        label: `fail-${i}`,
        run: async () => {
          throw new Error("Fail");
        },
      });
    }

    await waitForQueueEmpty(queue);
    expect(queue.getConsecutiveFailures()).toBe(3);
  });

  test("isProcessing is true during task execution", async () => {
    const queue = new MessageQueue();
    let wasProcessing = false;

    queue.enqueue({
      label: "check-processing",
      run: async () => {
        wasProcessing = queue.isProcessing;
        await sleep(20);
      },
    });

    expect(queue.isProcessing).toBe(true);
    await waitForQueueEmpty(queue);
    expect(wasProcessing).toBe(true);
    expect(queue.isProcessing).toBe(false);
  });

  describe("run", () => {
    test("resolves with the task result", async () => {
      const queue = new MessageQueue();
      await expect(queue.run("answer", async () => 42)).resolves.toBe(42);
    });

    test("rejects with the task error and keeps the queue alive", async () => {
      const queue = new MessageQueue();
      const failed = queue.run("boom", async () => {
        throw new Error("boom");
      });
      const next = queue.run("after", async () => "ok");

      await expect(failed).rejects.toThrow("boom");
      await expect(next).resolves.toBe("ok");
    });

    test("a later run observes state written by an earlier one", async () => {
      const queue = new MessageQueue();
      let bound: string | undefined;

      const first = queue.run("first", async () => {
        if (!bound) {
          await sleep(20);
          bound = "topic-1";
        }
        return bound;
      });
      const second = queue.run("second", async () => {
        if (!bound) {
          await sleep(20);
          bound = "topic-2";
        }
        return bound;
      });

      expect(await Promise.all([first, second])).toEqual(["topic-1", "topic-1"]);
    });
  });
});
