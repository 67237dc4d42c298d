import { afterEach, describe, expect, it, vi } from "vitest";
import { GetSessionHandler, GetSessionQuery } from "../../../src/sessions/queries";
import { MAX_ACTIVITY_ENTRIES, SessionStore } from "../../../src/sessions/session.store";
import { createLogger, createSettings } from "../support/fakes";

const createStore = (idleTtlMinutes = 120) =>
  new SessionStore(createSettings({ sessions: { idleTtlMinutes } }), createLogger());

describe("SessionStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("creates an empty session for a new id and reuses it afterwards", () => {
    const store = createStore();

    const first = store.resolve("tab-0001");
    const second = store.resolve("tab-0001");

    expect(second).toBe(first);
    expect(first).toMatchObject({
      id: "tab-0001",
      threadId: null,
      lastUploadedFileId: null,
      agentList: [],
      logs: [],
    });
    expect(store.size).toBe(1);
  });

  it("issues a fresh id when none or a malformed one is given", () => {
    const store = createStore();

    const anonymous = store.resolve(undefined);
    const malformed = store.resolve("bad id!");

    expect(anonymous.id).toMatch(/^[0-9a-f-]{36}$/u);
    expect(malformed.id).not.toBe("bad id!");
    expect(malformed.id).not.toBe(anonymous.id);
  });

  it("keeps sessions apart", () => {
    const store = createStore();
    const a = store.resolve("tab-aaaa");
    const b = store.resolve("tab-bbbb");

    a.threadId = "thread-a";

    expect(b.threadId).toBeNull();
  });

  it("evicts sessions idle longer than the ttl", () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-05-01T10:00:00Z"));
    const store = createStore(1);
    store.resolve("tab-stale");

    vi.setSystemTime(new Date("2024-05-01T10:00:59Z"));
    store.resolve("tab-fresh");
    expect(store.size).toBe(2);

    vi.setSystemTime(new Date("2024-05-01T10:01:01Z"));
    expect(store.evictIdle()).toBe(1);
    expect(store.get("tab-stale")).toBeUndefined();
    expect(store.get("tab-fresh")).toBeDefined();
  });

  it("appends activity entries and keeps only the newest ones", () => {
    const store = createStore();
    const session = store.resolve("tab-0001");

    for (let index = 0; index < MAX_ACTIVITY_ENTRIES + 5; index += 1) {
      store.record(session, "info", `entry ${index}`);
    }

    expect(session.logs).toHaveLength(MAX_ACTIVITY_ENTRIES);
    expect(session.logs[0]?.message).toBe("entry 5");
    expect(session.logs.at(-1)?.message).toBe(`entry ${MAX_ACTIVITY_ENTRIES + 4}`);
  });

  it("records the level and a timestamp", () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-05-01T10:00:00Z"));
    const store = createStore();
    const session = store.resolve("tab-0001");

    const entry = store.record(session, "warn", "Could not delete file object f1: gone");

    expect(entry).toMatchObject({
      level: "warn",
      message: "Could not delete file object f1: gone",
      createdAt: "2024-05-01T10:00:00.000Z",
    });
  });

  it("clears the log", () => {
    const store = createStore();
    const session = store.resolve("tab-0001");
    store.record(session, "info", "one");

    store.clearLogs(session);

    expect(session.logs).toEqual([]);
  });

  it("returns a detached snapshot through the session query", async () => {
    const store = createStore();
    const session = store.resolve("tab-0001");
    session.threadId = "thread-1";
    session.lastUploadedFileId = "file-1";
    store.record(session, "info", "one");

    const snapshot = await new GetSessionHandler(store).execute(new GetSessionQuery(session));
    store.record(session, "info", "two");

    expect(snapshot).toMatchObject({
      sessionId: "tab-0001",
      threadId: "thread-1",
      lastUploadedFileId: "file-1",
    });
    expect(snapshot.logs.map((entry) => entry.message)).toEqual(["one"]);
  });
});
