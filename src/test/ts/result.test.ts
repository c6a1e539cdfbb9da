import { describe, expect, it } from "vitest";
import { Result, err, isOk, ok, unwrap } from "../../main/ts/common/result.js";

const parsed = (text: string): Result<number, string> => {
  const n = Number(text);
  return Number.isNaN(n) ? err(`not a number: ${text}`) : ok(n);
};

describe("Result", () => {
  it("should tell success from failure", () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isOk(err("bad"))).toBe(false);
    expect(parsed("x")).toEqual({ ok: false, error: "not a number: x" });
  });

  it("should unwrap values and throw errors", () => {
    const failure = new Error("boom");

    expect(unwrap(parsed("5"))).toBe(5);
    expect(() => unwrap(err(failure))).toThrow(failure);
  });
});
