import { describe, expect, it } from "vitest";
import { KeyedLock } from "../../../src/agent-files/keyed-lock";

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

describe("KeyedLock", () => {
  it("runs tasks for the same key one after another", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run("agent", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = lock.run("agent", async () => {
      events.push("second:start");
    });

    await Promise.resolve();
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const blocked = lock.run("a", () => gate.promise);

    await expect(lock.run("b", async () => "free")).resolves.toBe("free");

    gate.resolve();
    await blocked;
  });

  it("continues with the next task after a failure", async () => {
    const lock = new KeyedLock();

    const failing = lock.run("agent", async () => {
      throw new Error("boom");
    });
    const next = lock.run("agent", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("releases the key once the queue drains", async () => {
    const lock = new KeyedLock();

    const pending = lock.run("agent", async () => undefined);
    expect(lock.isLocked("agent")).toBe(true);

    await pending;
    expect(lock.isLocked("agent")).toBe(false);
  });
});
