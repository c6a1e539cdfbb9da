import { Script } from "./ast/ast.js";
import {
  DiagnosticReporter,
  DiagnosticSeverity,
} from "./common/diagnostics.js";
import { CompileError, EngineError, RuntimeError } from "./common/errors.js";
import { Result, err } from "./common/result.js";
import { compile } from "./compiler/compile.js";
import { DialectConfig, resolveDialect } from "./config/dialect.js";
import {
  CallFunctionOptions,
  EvaluateOptions,
  callFunction,
  evaluate,
} from "./runtime/evaluator.js";
import {
  FunctionRegistry,
  NativeFunction,
  TypeConstraint,
  registerFunction,
} from "./runtime/registry.js";
import { Scope } from "./runtime/scope.js";
import { Value } from "./runtime/values.js";

export interface EngineOptions {
  registry?: FunctionRegistry;
  reporter?: DiagnosticReporter;
}

export interface RunOptions extends EvaluateOptions {
  sourceName?: string;
}

/**
 * A dialect, a function registry and a diagnostic reporter shared by every
 * script the host compiles and runs.
 *
 * ```ts
 * const engine = new Engine();
 * engine.registerFn("shout", ["string"], ([s]) => str(displayValue(s) + "!"));
 * engine.eval('shout("hi")'); // ok(str("hi!"))
 * ```
 */
export class Engine {
  readonly dialect: DialectConfig;
  readonly registry: FunctionRegistry;
  readonly reporter: DiagnosticReporter;

  constructor(dialect: Partial<DialectConfig> = {}, options: EngineOptions = {}) {
    this.dialect = resolveDialect(dialect);
    this.registry = options.registry ?? new FunctionRegistry();
    this.reporter = options.reporter ?? new DiagnosticReporter();
  }

  registerFn(name: string, params: TypeConstraint[], fn: NativeFunction): this {
    registerFunction(this.registry, { name, params }, fn);
    return this;
  }

  /**
   * Compiles `source`. Constants already in `scope` may be folded into the
   * script, which must then run against that scope.
   */
  compile(
    source: string,
    options: { sourceName?: string; scope?: Scope } = {}
  ): Result<Script, CompileError> {
    return compile(source, this.dialect, {
      sourceName: options.sourceName,
      reporter: this.reporter,
      constants: options.scope?.constants(),
    });
  }

  /** Compiles and runs `source` in a fresh scope. */
  eval(source: string, options: RunOptions = {}): Result<Value, EngineError> {
    return this.evalWithScope(new Scope(), source, options);
  }

  /** Compiles and runs `source`; top-level declarations stay in `scope`. */
  evalWithScope(
    scope: Scope,
    source: string,
    options: RunOptions = {}
  ): Result<Value, EngineError> {
    const compiled = this.compile(source, {
      sourceName: options.sourceName,
      scope,
    });
    if (!compiled.ok) return compiled;
    return this.run(
      () => evaluate(compiled.value, scope, this.registry, options),
      options.sourceName
    );
  }

  /**
   * Calls a function defined by `script`, after running its top level in
   * `scope` unless `options.evalTopLevel` is `false`.
   */
  callFn(
    script: Script,
    scope: Scope,
    name: string,
    args: Value[],
    options: CallFunctionOptions = {}
  ): Result<Value, RuntimeError> {
    return this.run(
      () => callFunction(script, scope, this.registry, name, args, options),
      script.sourceName
    );
  }

  private run(
    body: () => Result<Value, RuntimeError>,
    sourceName?: string
  ): Result<Value, RuntimeError> {
    const result = body();
    if (!result.ok) {
      this.reporter.report({
        severity: DiagnosticSeverity.Error,
        message: result.error.message,
        pos: result.error.pos,
        sourceName,
      });
      return err(result.error);
    }
    return result;
  }
}
