import { describe, expect, it, vi } from "vitest";
import { Script } from "../../main/ts/ast/ast.js";
import { unwrap } from "../../main/ts/common/result.js";
import { compile } from "../../main/ts/compiler/compile.js";
import { OptimizationLevel } from "../../main/ts/config/dialect.js";
import { optimize } from "../../main/ts/optimizer/optimizer.js";
import { evaluate } from "../../main/ts/runtime/evaluator.js";
import { FunctionRegistry, registerFunction } from "../../main/ts/runtime/registry.js";
import { Scope } from "../../main/ts/runtime/scope.js";
import {
  array,
  char,
  displayValue,
  int,
  str,
} from "../../main/ts/runtime/values.js";
import { compileOk, runOk, shape } from "./helpers.js";

const parse = (source: string) => compileOk(source, { optimizationLevel: "none" });

const optimized = (
  source: string,
  level: OptimizationLevel = "simple"
): unknown[] => optimize(parse(source), undefined, level).statements.map(shape);

const literalStmt = (value: unknown) => ({
  kind: "ExpressionStmt",
  expression: { kind: "Literal", value },
});

describe("optimize", () => {
  describe("constant folding", () => {
    it("should fold operators over literals", () => {
      expect(optimized("1 + 2 * 3")).toEqual([
        literalStmt({ type: "int", value: 7n }),
      ]);
      expect(optimized('"n = " + 1')).toEqual([
        literalStmt({ type: "string", value: "n = 1" }),
      ]);
      expect(optimized("-(2.5) < 0")).toEqual([
        literalStmt({ type: "bool", value: true }),
      ]);
    });

    it("should leave failing operations for run time", () => {
      expect(optimized("1 / 0")).toEqual([
        {
          kind: "ExpressionStmt",
          expression: {
            kind: "Binary",
            operator: "/",
            left: { kind: "Literal", value: { type: "int", value: 1n } },
            right: { kind: "Literal", value: { type: "int", value: 0n } },
          },
        },
      ]);
    });

    it("should not fold strings past the size limit", () => {
      const script = compileOk('"ab" + "cd"', { maxStringSize: 3 });
      const [stmt] = script.statements;

      expect(stmt).toMatchObject({
        kind: "ExpressionStmt",
        expression: { kind: "Binary", operator: "+" },
      });
    });

    it("should fold short-circuit operators with a literal left side", () => {
      expect(optimized("false && f()")).toEqual([
        literalStmt({ type: "bool", value: false }),
      ]);
      expect(optimized("true && false")).toEqual([
        literalStmt({ type: "bool", value: false }),
      ]);
      expect(optimized("() ?? 5")).toEqual([
        literalStmt({ type: "int", value: 5n }),
      ]);
      expect(optimized("true && x")).toEqual([
        {
          kind: "ExpressionStmt",
          expression: {
            kind: "Logical",
            operator: "&&",
            left: { kind: "Literal", value: { type: "bool", value: true } },
            right: { kind: "Variable", name: "x" },
          },
        },
      ]);
    });
  });

  describe("constants", () => {
    it("should substitute script constants only at the full level", () => {
      const source = "const N = 4; N * 2";

      expect(optimized(source, "full")[1]).toEqual(
        literalStmt({ type: "int", value: 8n })
      );
      expect(optimized(source, "simple")[1]).toMatchObject({
        expression: { kind: "Binary", left: { kind: "Variable", name: "N" } },
      });
    });

    it("should respect shadowing", () => {
      const [, block] = optimize(
        parse("const N = 4; { let N = 1; N = 2; N }"),
        undefined,
        "full"
      ).statements;

      expect(shape(block)).toMatchObject({
        expression: {
          kind: "Block",
          statements: [
            { kind: "Let", name: "N" },
            { expression: { kind: "Assign", target: { name: "N" } } },
            { expression: { kind: "Variable", name: "N" } },
          ],
        },
      });
    });

    it("should not substitute into closure and function bodies", () => {
      const statements = optimize(
        parse("const N = 1; let f = || N; fn g() { N }"),
        undefined,
        "full"
      ).statements;

      expect(shape(statements[1])).toMatchObject({
        initializer: { kind: "Closure", body: { kind: "Variable", name: "N" } },
      });
      expect(shape(statements[2])).toMatchObject({
        body: { statements: [{ expression: { kind: "Variable", name: "N" } }] },
      });
    });

    it("should substitute host constants", () => {
      const script = unwrap(
        compile("LIMIT + 1", {}, { constants: new Map([["LIMIT", int(10)]]) })
      );

      expect(shape(script.statements)).toEqual([
        literalStmt({ type: "int", value: 11n }),
      ]);
    });

    it("should skip host constants that are not literals", () => {
      const script = optimize(
        parse("items"),
        new Map([["items", array([str("a")])]])
      );

      expect(shape(script.statements)).toEqual([
        {
          kind: "ExpressionStmt",
          expression: { kind: "Variable", name: "items" },
        },
      ]);
    });
  });

  describe("dead code", () => {
    it("should keep only the branch of a constant condition", () => {
      const onNote = vi.fn();
      const script = optimize(
        parse("if 1 < 2 { a } else { b }"),
        undefined,
        "simple",
        { onNote }
      );

      expect(shape(script.statements)).toEqual([
        {
          kind: "ExpressionStmt",
          expression: {
            kind: "Block",
            statements: [
              { kind: "ExpressionStmt", expression: { kind: "Variable", name: "a" } },
            ],
          },
        },
      ]);
      expect(onNote).toHaveBeenCalledWith(
        "Branch with a constant condition removed.",
        { line: 1, column: 1, offset: 0 }
      );
    });

    it("should reduce a switch on a constant to one arm", () => {
      expect(optimized('switch 2 { 1 => "a", 2 | 3 => "b", _ => "c" }')).toEqual([
        literalStmt({ type: "string", value: "b" }),
      ]);
      expect(optimized('switch 9 { 1 => "a" }')).toEqual([
        literalStmt({ type: "unit" }),
      ]);
    });

    it("should drop loops that never run", () => {
      expect(optimized("while false { x; } 5")).toEqual([
        literalStmt({ type: "int", value: 5n }),
      ]);
      expect(optimized("while false { x; }")).toEqual([
        literalStmt({ type: "unit" }),
      ]);
    });

    it("should drop literal statements that are not the tail", () => {
      expect(optimized("1; {} x; 3")).toEqual([
        { kind: "ExpressionStmt", expression: { kind: "Variable", name: "x" } },
        literalStmt({ type: "int", value: 3n }),
      ]);
    });

    it("should drop code after a return", () => {
      const onNote = vi.fn();
      const script = optimize(
        parse("fn f() {\n  return 1;\n  g();\n}"),
        undefined,
        "simple",
        { onNote }
      );

      expect(shape(script.statements)).toEqual([
        {
          kind: "FnDef",
          name: "f",
          params: [],
          body: {
            kind: "Block",
            statements: [
              {
                kind: "Return",
                value: { kind: "Literal", value: { type: "int", value: 1n } },
              },
            ],
          },
        },
      ]);
      expect(onNote).toHaveBeenCalledWith("Unreachable code removed.", {
        line: 3,
        column: 3,
        offset: 23,
      });
    });
  });

  describe("functions after an exit", () => {
    it("should keep definitions that follow a top-level return", () => {
      const onNote = vi.fn();
      const script = optimize(
        parse("return f(); g(); fn f() { 5 }"),
        undefined,
        "simple",
        { onNote }
      );

      expect(shape(script.statements)).toMatchObject([
        { kind: "Return" },
        { kind: "FnDef", name: "f" },
      ]);
      expect(onNote).toHaveBeenCalledTimes(1);
      expect(onNote).toHaveBeenCalledWith("Unreachable code removed.", {
        line: 1,
        column: 13,
        offset: 12,
      });
    });
  });

  describe("method calls", () => {
    const registry = () => {
      const registry = new FunctionRegistry();
      registerFunction(registry, { name: "up", params: ["char"] }, ([c]) =>
        c.type === "char" ? char(c.value.toUpperCase()) : undefined
      );
      return registry;
    };

    it("should keep the root of a receiver below a script constant", () => {
      const source = 'const t = "abc"; t[0].up()';

      expect(
        runOk(source, { registry: registry(), dialect: { optimizationLevel: "full" } })
      ).toEqual(char("A"));
      expect(optimized(source, "full")[1]).toMatchObject({
        expression: {
          kind: "MethodCall",
          receiver: { kind: "Index", object: { kind: "Variable", name: "t" } },
        },
      });
    });

    it("should keep the root of a receiver below a host constant", () => {
      const constants = new Map([["s", str("abc")]]);
      const script = unwrap(
        compile("s[0].up()", { optimizationLevel: "full" }, { constants })
      );

      const result = evaluate(
        script,
        new Scope().setConstant("s", str("abc")),
        registry()
      );

      expect(result).toEqual({ ok: true, value: char("A") });
    });

    it("should evaluate a receiver that is not a variable path", () => {
      const source = '["xy", "z"][1][0].up()';

      expect(
        runOk(source, { registry: registry(), dialect: { optimizationLevel: "full" } })
      ).toEqual(char("Z"));
    });
  });

  it("should return the script untouched at level none", () => {
    const script = parse("1 + 2");

    expect(optimize(script, undefined, "none")).toBe(script);
  });

  it("should not modify its input", () => {
    const script: Script = parse("1 + 2");
    optimize(script);

    expect(script.statements[0]).toMatchObject({
      expression: { kind: "Binary", operator: "+" },
    });
  });

  it.each([
    "let x = 2 + 3 * 4; x",
    "const K = 3; let t = 0; for i in 0..K { t += i * K; } t",
    'if 2 > 1 && "a" in "abc" { "yes" } else { "no" }',
    "let s = switch 1 + 1 { 2 => 20, _ => 0 }; s ?? 1",
    "fn f(n) { return n * 2; n } f(4) + (1 / 2)",
    "let a = [1, 2]; while false { a += [3]; } a ?? ()",
    "return f(); fn f() { 5 }",
    "const K = 2; fn f(x) { x * 3 } return f(K); fn g() { 0 }",
  ])("should not change the result of %s", (source) => {
    const plain = runOk(source, { dialect: { optimizationLevel: "none" } });
    const full = runOk(source, { dialect: { optimizationLevel: "full" } });

    expect(displayValue(full)).toBe(displayValue(plain));
  });
});
