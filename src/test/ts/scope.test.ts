import { describe, expect, it } from "vitest";
import { RuntimeError } from "../../main/ts/common/errors.js";
import { Scope } from "../../main/ts/runtime/scope.js";
import { array, int, map, str } from "../../main/ts/runtime/values.js";

describe("Scope", () => {
  it("should look up the innermost binding", () => {
    const scope = new Scope();
    scope.set("x", int(1));
    scope.pushBlock();
    scope.define("x", int(2));

    expect(scope.get("x")).toEqual(int(2));
    expect(scope.size).toBe(2);

    scope.popBlock();
    expect(scope.get("x")).toEqual(int(1));
    expect(scope.size).toBe(1);
  });

  it("should track block depth", () => {
    const scope = new Scope();
    scope.pushBlock();
    scope.pushBlock();

    expect(scope.depth).toBe(2);
    scope.popBlock();
    scope.popBlock();
    expect(scope.depth).toBe(0);
    expect(() => scope.popBlock()).toThrow(RangeError);
  });

  it("should update the innermost binding on set", () => {
    const scope = new Scope();
    scope.set("x", int(1));
    scope.pushBlock();
    scope.set("x", int(5));
    scope.popBlock();

    expect(scope.get("x")).toEqual(int(5));
  });

  it("should refuse to overwrite constants", () => {
    const scope = new Scope().setConstant("LIMIT", int(10));

    expect(() => scope.set("LIMIT", int(11))).toThrow(RuntimeError);
    expect(scope.get("LIMIT")).toEqual(int(10));
  });

  it("should copy containers in and out", () => {
    const scope = new Scope();
    const items = array([int(1)]);
    scope.set("items", items);
    items.items.push(int(2));

    const read = scope.get("items");
    expect(read).toEqual(array([int(1)]));

    if (read?.type === "array") read.items.push(int(3));
    expect(scope.get("items")).toEqual(array([int(1)]));
  });

  it("should report missing names", () => {
    const scope = new Scope();

    expect(scope.get("nope")).toBeUndefined();
    expect(scope.has("nope")).toBe(false);
  });

  it("should list visible bindings in declaration order", () => {
    const scope = new Scope();
    scope.define("a", int(1));
    scope.define("b", str("x"));
    scope.define("a", int(2));

    expect([...scope.entries()]).toEqual([
      ["b", str("x")],
      ["a", int(2)],
    ]);
  });

  it("should list only constants that are not shadowed", () => {
    const scope = new Scope();
    scope.setConstant("A", int(1));
    scope.setConstant("B", map([["k", int(2)]]));
    scope.define("A", int(3));

    expect(scope.constants()).toEqual(new Map([["B", map([["k", int(2)]])]]));
  });
});
