import { Script } from "../../main/ts/ast/ast.js";
import { CompileError, RuntimeError } from "../../main/ts/common/errors.js";
import { Result, unwrap } from "../../main/ts/common/result.js";
import { compile } from "../../main/ts/compiler/compile.js";
import { DialectConfig } from "../../main/ts/config/dialect.js";
import { EvaluateOptions, evaluate } from "../../main/ts/runtime/evaluator.js";
import { FunctionRegistry } from "../../main/ts/runtime/registry.js";
import { Scope } from "../../main/ts/runtime/scope.js";
import { Value } from "../../main/ts/runtime/values.js";

export function compileOk(
  source: string,
  dialect: Partial<DialectConfig> = {}
): Script {
  return unwrap(compile(source, dialect));
}

export function compileErr(
  source: string,
  dialect: Partial<DialectConfig> = {}
): CompileError {
  const result = compile(source, dialect);
  if (result.ok) throw new Error(`Expected '${source}' to fail to compile`);
  return result.error;
}

export interface RunSetup extends EvaluateOptions {
  dialect?: Partial<DialectConfig>;
  scope?: Scope;
  registry?: FunctionRegistry;
}

export function run(
  source: string,
  setup: RunSetup = {}
): Result<Value, RuntimeError> {
  const { dialect, scope, registry, ...options } = setup;
  return evaluate(
    compileOk(source, dialect),
    scope ?? new Scope(),
    registry ?? new FunctionRegistry(),
    options
  );
}

export function runOk(source: string, setup: RunSetup = {}): Value {
  return unwrap(run(source, setup));
}

export function runErr(source: string, setup: RunSetup = {}): RuntimeError {
  const result = run(source, setup);
  if (result.ok) throw new Error(`Expected '${source}' to fail`);
  return result.error;
}

/** Drops `pos` (and the script's own metadata) so trees compare by shape. */
export function shape(node: unknown): unknown {
  if (Array.isArray(node)) return node.map(shape);
  if (node instanceof Map) return node;
  if (node !== null && typeof node === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(node)) {
      if (key === "pos" || key === "sourceName") continue;
      out[key] = shape(value);
    }
    return out;
  }
  return node;
}
