import { describe, expect, it } from "vitest";
import { SerialQueue } from "./serial-queue.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SerialQueue", () => {
  it("runs tasks one at a time in order", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const gate = deferred();

    const first = queue.enqueue(async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = queue.enqueue(async () => {
      events.push("second:start");
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(["first:start"]);
    expect(queue.length).toBe(1);
    expect(queue.isRunning).toBe(true);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
    expect(queue.isRunning).toBe(false);
  });

  it("keeps going after a task fails", async () => {
    const queue = new SerialQueue();

    const failing = queue.enqueue(async () => {
      throw new Error("backend gone");
    });
    const next = queue.enqueue(async () => "ok");

    await expect(failing).rejects.toThrow("backend gone");
    await expect(next).resolves.toBe("ok");
  });

  it("wraps non-Error rejections", async () => {
    const queue = new SerialQueue();
    await expect(queue.enqueue(() => Promise.reject("plain"))).rejects.toThrow("plain");
  });
});
