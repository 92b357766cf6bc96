// test/core/bridge/bridge.spec.ts
// End-to-end tests: convert, evaluate and decode over a loopback link

import { describe, it, expect, beforeEach } from "vitest";
import { createBridge, evaluate, parse } from "../../../src/core/bridge";
import { resetRequestIds } from "../../../src/core/channel/channel";
import type { MutexEvent } from "../../../src/core/channel/mutex";
import { apply, int, list, sym } from "../../../src/core/expr/expr";
import { makeConfig } from "../../../src/core/config/config";
import { EngineEvaluationError, MissingLinkError } from "../../../src/core/errors";
import { LazySeq } from "../../../src/core/values/lazy";
import { ExprNode, isEngineFunction } from "../../../src/core/values/values";
import { stubLink } from "../../helpers/engine";

describe("evaluate", () => {
  beforeEach(() => {
    resetRequestIds();
  });

  it("evaluates text and decodes the answer", async () => {
    expect(await evaluate("1+1", stubLink({ "1+1": int(2) }))).toBe(2);
  });

  it("evaluates expressions", async () => {
    const link = stubLink();
    expect(await evaluate(apply("Times", [int(6), int(7)]), link)).toBe(42);
    expect(await evaluate(null, link)).toBeNull();
    expect(link.requestCount).toBe(1);
  });

  it("binds decoded functions to the link", async () => {
    const link = stubLink();
    const f = await evaluate("Function[Plus[Slot[1], 10]]", link);
    if (!isEngineFunction(f)) throw new Error("expected a function");
    expect(await f(5)).toBe(15);
    expect(link.requestCount).toBe(2);
  });

  it("raises engine failures in strict mode", async () => {
    const link = stubLink({ "1/0": sym("$Failed") });
    expect(await evaluate("1/0", link)).toBe(Symbol.for("$Failed"));
    await expect(evaluate("1/0", link, makeConfig({ strict: true }))).rejects.toThrow(EngineEvaluationError);
  });
});

describe("parse", () => {
  it("decodes text without evaluating it", async () => {
    const link = stubLink();
    expect(await parse("Plus[1, 2]", link)).toEqual(new ExprNode(Symbol.for("Plus"), [1, 2]));
  });

  it("decodes expressions locally", async () => {
    expect(await parse(list([int(1), int(2)]))).toEqual([1, 2]);
  });

  it("falls back to the link of the configuration", async () => {
    const link = stubLink();
    expect(await parse("f[x]", undefined, makeConfig({ link })))
      .toEqual(new ExprNode(Symbol.for("f"), [Symbol.for("x")]));
    await expect(parse("f[x]")).rejects.toBeInstanceOf(MissingLinkError);
  });
});

describe("createBridge", () => {
  beforeEach(() => {
    resetRequestIds();
  });

  it("applies its base configuration", async () => {
    const bridge = createBridge(stubLink(), { sequences: "lazy" });
    const v = await bridge.evaluate(list([int(1), int(2)]));
    expect(v).toBeInstanceOf(LazySeq);
    expect(bridge.config.sequences).toBe("lazy");
  });

  it("takes per-call overrides without changing the base", async () => {
    const bridge = createBridge(stubLink(), { sequences: "lazy" });
    expect(await bridge.evaluate(list([int(1), int(2)]), { sequences: "vectors" })).toEqual([1, 2]);
    expect(await bridge.evaluate(list([int(1)]))).toBeInstanceOf(LazySeq);
  });

  it("parses through its link", async () => {
    const bridge = createBridge(stubLink());
    expect(await bridge.parse("g[1]")).toEqual(new ExprNode(Symbol.for("g"), [1]));
  });

  it("serializes concurrent evaluations", async () => {
    const events: MutexEvent[] = [];
    const link = stubLink();
    const bridge = createBridge(link, {}, { onEvent: (e) => { events.push(e); } });
    const results = await Promise.all([
      bridge.evaluate(apply("Plus", [int(1), int(1)])),
      bridge.evaluate(apply("Plus", [int(2), int(2)])),
    ]);
    expect(results).toEqual([2, 4]);
    expect(events.map((e) => e.tag)).toEqual([
      "mutexLock", "mutexBlock", "mutexUnlock", "mutexLock", "mutexUnlock",
    ]);
    expect(link.requestCount).toBe(2);
  });
});
