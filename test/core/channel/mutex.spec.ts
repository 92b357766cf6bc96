// test/core/channel/mutex.spec.ts
// Tests for per-link mutual exclusion

import { describe, it, expect, beforeEach } from "vitest";
import {
  createMutex,
  acquireMutex,
  tryAcquireMutex,
  releaseMutex,
  withMutex,
  mutexForLink,
  resetMutexIds,
  type MutexEvent,
} from "../../../src/core/channel/mutex";
import { LoopbackLink } from "../../../src/ports/loopback";
import { sym } from "../../../src/core/expr/expr";

describe("mutex", () => {
  beforeEach(() => {
    resetMutexIds();
  });

  it("creates unlocked mutexes with fresh ids", () => {
    const a = createMutex("a");
    const b = createMutex();
    expect(a.id).toBe("mutex-0");
    expect(b.id).toBe("mutex-1");
    expect(a.holder).toBeUndefined();
    expect(a.name).toBe("a");
  });

  it("grants tryAcquire only when free", () => {
    const m = createMutex();
    expect(tryAcquireMutex(m, "r1")).toBe(true);
    expect(tryAcquireMutex(m, "r2")).toBe(false);
    expect(m.holder).toBe("r1");
  });

  it("ignores release by a non-holder", () => {
    const m = createMutex();
    tryAcquireMutex(m, "r1");
    expect(releaseMutex(m, "r2")).toBeUndefined();
    expect(m.holder).toBe("r1");
  });

  it("hands the lock to waiters in arrival order", async () => {
    const m = createMutex();
    const order: string[] = [];
    await acquireMutex(m, "r1");
    const second = acquireMutex(m, "r2").then(() => order.push("r2"));
    const third = acquireMutex(m, "r3").then(() => order.push("r3"));

    expect(releaseMutex(m, "r1")).toBe("r2");
    await second;
    expect(releaseMutex(m, "r2")).toBe("r3");
    await third;
    expect(releaseMutex(m, "r3")).toBeUndefined();

    expect(order).toEqual(["r2", "r3"]);
    expect(m.holder).toBeUndefined();
    expect(m.acquisitionCount).toBe(3);
  });

  it("reports lock activity", async () => {
    const m = createMutex();
    const events: MutexEvent[] = [];
    const onEvent = (e: MutexEvent) => { events.push(e); };

    await acquireMutex(m, "r1", onEvent);
    const waiting = acquireMutex(m, "r2", onEvent);
    releaseMutex(m, "r1", onEvent);
    await waiting;

    expect(events.map((e) => `${e.tag}:${e.requestId}`)).toEqual([
      "mutexLock:r1",
      "mutexBlock:r2",
      "mutexUnlock:r1",
      "mutexLock:r2",
    ]);
  });

  it("releases after a thrown error", async () => {
    const m = createMutex();
    await expect(withMutex(m, "r1", async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    expect(m.holder).toBeUndefined();
    await expect(withMutex(m, "r2", async () => "ok")).resolves.toBe("ok");
  });

  it("keeps one mutex per link", () => {
    const link = new LoopbackLink(() => sym("x"), { id: "engine" });
    const m = mutexForLink(link);
    expect(mutexForLink(link)).toBe(m);
    expect(m.name).toBe("engine");
    expect(mutexForLink(new LoopbackLink(() => sym("x")))).not.toBe(m);
  });
});
