import { describe, expect, it, vi } from "vitest";
import { RuntimeError } from "../../main/ts/common/errors.js";
import { START } from "../../main/ts/common/position.js";
import { DEFAULT_DIALECT } from "../../main/ts/config/dialect.js";
import { ExecutionBudget } from "../../main/ts/runtime/limits.js";
import { FunctionRegistry, registerFunction } from "../../main/ts/runtime/registry.js";
import { INT_MAX, UNIT, int, range, str } from "../../main/ts/runtime/values.js";
import { runErr, runOk } from "./helpers.js";

describe("ExecutionBudget", () => {
  it("should count operations up to the limit", () => {
    const budget = new ExecutionBudget({ ...DEFAULT_DIALECT, maxOperations: 2 });
    budget.tick(START);
    budget.tick(START);

    expect(budget.operationCount).toBe(2);
    expect(() => budget.tick(START)).toThrow("Too many operations (limit 2).");
  });

  it("should track call depth", () => {
    const budget = new ExecutionBudget({ ...DEFAULT_DIALECT, maxCallDepth: 1 });

    const depth = budget.enterCall("f", START, () => budget.depth);

    expect(depth).toBe(1);
    expect(budget.depth).toBe(0);
    expect(() =>
      budget.enterCall("f", START, () => budget.enterCall("g", START, () => 0))
    ).toThrow("Call to 'g' exceeds the maximum call depth of 1.");
    expect(budget.depth).toBe(0);
  });

  it("should return values within the size limits", () => {
    const budget = new ExecutionBudget({ ...DEFAULT_DIALECT, maxStringSize: 2 });
    const value = str("ab");

    expect(budget.checkSize(value, START)).toBe(value);
    expect(() => budget.checkSize(str("abc"), START)).toThrow(RuntimeError);
  });
});

describe("resource limits", () => {
  it("should stop runaway loops", () => {
    const error = runErr("loop { }", { dialect: { maxOperations: 100 } });

    expect(error.kind).toBe("ResourceLimitExceeded");
    expect(error.message).toBe("Too many operations (limit 100).");
  });

  it("should limit the call depth", () => {
    const error = runErr("fn f(n) { f(n + 1) } f(0)", {
      dialect: { maxCallDepth: 10 },
    });

    expect(error.kind).toBe("ResourceLimitExceeded");
    expect(error.message).toBe(
      "Call to 'f' exceeds the maximum call depth of 10."
    );
    expect(error.identifier).toBe("f");
    expect(error.trace).toHaveLength(10);
  });

  it("should turn a host stack overflow into a resource error", () => {
    const error = runErr("fn f(n) { f(n + 1) } f(0)", {
      dialect: { maxCallDepth: 0 },
    });

    expect(error.kind).toBe("ResourceLimitExceeded");
    expect(error.message).toBe("Call stack exhausted.");
  });

  it("should limit string sizes", () => {
    const error = runErr('let s = "ab"; s + "cd"', {
      dialect: { maxStringSize: 3 },
    });

    expect(error.kind).toBe("ResourceLimitExceeded");
    expect(error.message).toBe("The string is too large: 4 exceeds the limit of 3.");
  });

  it("should limit array sizes", () => {
    const dialect = { maxArraySize: 2 };

    expect(runErr("[1, 2, 3]", { dialect }).message).toBe(
      "The array is too large: 3 exceeds the limit of 2."
    );
    expect(runErr("let a = [1]; a += [2, 3];", { dialect }).kind).toBe(
      "ResourceLimitExceeded"
    );
    expect(runOk("let t = 0; for i in 0..10 { t += 1; } t", { dialect })).toEqual(
      int(10)
    );
  });

  it("should not allocate for ranges", () => {
    expect(
      runOk("let r = 0..9223372036854775807; r", { dialect: { maxArraySize: 2 } })
    ).toEqual(range(0n, INT_MAX));
  });

  it("should let the operation limit stop a huge range", () => {
    const error = runErr("for i in 0..9223372036854775807 { }", {
      dialect: { maxOperations: 50 },
    });

    expect(error.message).toBe("Too many operations (limit 50).");
  });

  it("should limit map sizes", () => {
    const error = runErr("let m = #{ a: 1 }; m.b = 2;", {
      dialect: { maxMapSize: 1 },
    });

    expect(error.kind).toBe("ResourceLimitExceeded");
    expect(error.message).toBe("The map is too large: 2 exceeds the limit of 1.");
  });

  it("should limit values returned by natives", () => {
    const registry = new FunctionRegistry();
    registerFunction(registry, { name: "big", params: [] }, () => str("abcd"));

    expect(
      runErr("big()", { registry, dialect: { maxStringSize: 3 } }).kind
    ).toBe("ResourceLimitExceeded");
  });
});

describe("interruption", () => {
  it("should not start when the signal is already aborted", () => {
    const controller = new AbortController();
    controller.abort();

    const error = runErr("1 + 1", { signal: controller.signal });

    expect(error.kind).toBe("ExecutionInterrupted");
    expect(error.message).toBe("Execution aborted.");
  });

  it("should stop when the signal is aborted during the run", () => {
    const controller = new AbortController();
    const registry = new FunctionRegistry();
    registerFunction(registry, { name: "stop", params: [] }, () => {
      controller.abort();
      return undefined;
    });

    const error = runErr("stop(); loop { }", {
      registry,
      signal: controller.signal,
    });

    expect(error.kind).toBe("ExecutionInterrupted");
  });

  it("should stop when the progress callback asks to", () => {
    const onProgress = vi.fn((operations: number) => operations >= 20);

    const error = runErr("loop { }", { onProgress });

    expect(error.kind).toBe("ExecutionInterrupted");
    expect(error.message).toBe("Execution stopped by the host.");
    expect(onProgress).toHaveBeenCalledTimes(20);
  });

  it("should keep running while the progress callback returns nothing", () => {
    const onProgress = vi.fn();

    expect(runOk("let x = 1;", { onProgress })).toEqual(UNIT);
    expect(onProgress).toHaveBeenNthCalledWith(1, 1);
  });

  it("should not let try/catch intercept interruption", () => {
    const onProgress = vi.fn((operations: number) => operations > 5);

    expect(runErr("try { loop { } } catch { 1 }", { onProgress }).kind).toBe(
      "ExecutionInterrupted"
    );
  });
});
