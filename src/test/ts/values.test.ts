import { describe, expect, it } from "vitest";
import { RuntimeError } from "../../main/ts/common/errors.js";
import {
  INT_MAX,
  UNIT,
  array,
  bool,
  char,
  cloneValue,
  custom,
  debugValue,
  displayValue,
  float,
  fnPtr,
  formatFloat,
  fromJs,
  int,
  map,
  range,
  str,
  toJs,
  typeOf,
  valuesEqual,
} from "../../main/ts/runtime/values.js";
import { runOk } from "./helpers.js";

describe("int", () => {
  it("should accept the full 64-bit range", () => {
    expect(int(INT_MAX).value).toBe(9223372036854775807n);
    expect(int(-3)).toEqual({ type: "int", value: -3n });
  });

  it("should reject values outside it", () => {
    expect(() => int(INT_MAX + 1n)).toThrow(
      "Integer 9223372036854775808 does not fit in 64 bits."
    );
  });
});

describe("formatFloat", () => {
  it.each([
    [1, "1.0"],
    [1.5, "1.5"],
    [-0, "-0.0"],
    [1e21, "1e+21"],
  ])("should format %s as %s", (value, text) => {
    expect(formatFloat(value)).toBe(text);
  });
});

describe("displayValue", () => {
  it("should show scalars plainly", () => {
    expect(displayValue(UNIT)).toBe("()");
    expect(displayValue(bool(false))).toBe("false");
    expect(displayValue(str("hi"))).toBe("hi");
    expect(displayValue(char("c"))).toBe("c");
    expect(displayValue(fnPtr("f"))).toBe("Fn(f)");
    expect(displayValue(custom("Rect", {}))).toBe("<Rect>");
  });

  it("should quote strings inside containers", () => {
    const value = array([
      int(1),
      str("a"),
      char("b"),
      map([["k", float(2)]]),
    ]);

    expect(displayValue(value)).toBe('[1, "a", \'b\', #{"k": 2.0}]');
    expect(debugValue(str('say "hi"'))).toBe('"say \\"hi\\""');
  });
});

describe("cloneValue", () => {
  it("should copy containers deeply", () => {
    const source = map([["list", array([int(1)])]]);
    const copy = cloneValue(source);

    expect(copy).toEqual(source);
    if (copy.type === "map" && source.type === "map") {
      expect(copy.entries.get("list")).not.toBe(source.entries.get("list"));
    }
  });

  it("should share immutable values", () => {
    const data = { width: 2 };
    const value = custom("Rect", data);

    expect(cloneValue(value)).toBe(value);
    expect(cloneValue(str("s"))).toEqual(str("s"));
  });
});

describe("valuesEqual", () => {
  it("should compare ints and floats by value", () => {
    expect(valuesEqual(int(2), float(2))).toBe(true);
    expect(valuesEqual(float(2.5), int(2))).toBe(false);
  });

  it("should compare maps regardless of insertion order", () => {
    const a = map([
      ["x", int(1)],
      ["y", int(2)],
    ]);
    const b = map([
      ["y", int(2)],
      ["x", int(1)],
    ]);

    expect(valuesEqual(a, b)).toBe(true);
    expect(valuesEqual(a, map([["x", int(1)]]))).toBe(false);
  });

  it("should compare functions by name and customs by identity", () => {
    const data = {};
    const closure = runOk("let f = || 1; f");

    expect(valuesEqual(fnPtr("f"), fnPtr("f"))).toBe(true);
    expect(valuesEqual(closure, closure)).toBe(false);
    expect(valuesEqual(custom("T", data), custom("T", data))).toBe(true);
    expect(valuesEqual(custom("T", {}), custom("T", {}))).toBe(false);
  });
});

describe("range", () => {
  it("should compare by the integers it covers", () => {
    expect(valuesEqual(range(1n, 4n), range(1n, 3n, true))).toBe(true);
    expect(valuesEqual(range(1n, 4n), range(1n, 4n, true))).toBe(false);
    expect(displayValue(range(-2n, 2n))).toBe("-2..2");
  });
});

describe("typeOf", () => {
  it("should report custom type names", () => {
    expect(typeOf(custom("Rect", null))).toBe("Rect");
    expect(typeOf(array([]))).toBe("array");
  });
});

describe("fromJs", () => {
  it("should convert plain data", () => {
    expect(
      fromJs({ a: [1, 1.5, null, "x", true], big: 5n, missing: undefined })
    ).toEqual(
      map([
        ["a", array([int(1), float(1.5), UNIT, str("x"), bool(true)])],
        ["big", int(5)],
        ["missing", UNIT],
      ])
    );
  });

  it("should reject non-finite numbers", () => {
    expect(() => fromJs(Infinity)).toThrow(RuntimeError);
    expect(() => fromJs(NaN)).toThrow("NaN is not a finite number.");
  });
});

describe("toJs", () => {
  it("should convert values to plain data", () => {
    const value = map([
      ["small", int(3)],
      ["big", int(INT_MAX)],
      ["none", UNIT],
      ["list", array([float(1.5), char("c"), fnPtr("f")])],
    ]);

    expect(toJs(value)).toEqual({
      small: 3,
      big: 9223372036854775807n,
      none: null,
      list: [1.5, "c", "Fn(f)"],
    });
  });

  it("should keep a __proto__ key as an own property", () => {
    const plain = toJs(map([["__proto__", int(1)]]));

    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
    expect(JSON.stringify(plain)).toBe('{"__proto__":1}');
  });

  it("should show ranges as text", () => {
    expect(toJs(range(0n, 3n, true))).toBe("0..=3");
  });

  it("should return function and custom values as they are", () => {
    const fn = fnPtr("f");
    const rect = custom("Rect", { width: 1 });

    expect(toJs(fn)).toBe(fn);
    expect(toJs(rect)).toBe(rect);
  });
});
