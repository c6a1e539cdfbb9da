export * from "./ast/ast.js";
export { formatExpression, formatLiteral, formatScript } from "./ast/printer.js";
export {
  type Diagnostic,
  DiagnosticReporter,
  DiagnosticSeverity,
  formatCodeFrame,
} from "./common/diagnostics.js";
export * from "./common/errors.js";
export { type Position, formatPosition } from "./common/position.js";
export {
  type Err,
  type Ok,
  type Result,
  err,
  isOk,
  ok,
  unwrap,
} from "./common/result.js";
export { type CompileOptions, compile } from "./compiler/compile.js";
export {
  DEFAULT_DIALECT,
  type DialectConfig,
  type OptimizationLevel,
  resolveDialect,
} from "./config/dialect.js";
export { Engine, type EngineOptions, type RunOptions } from "./engine.js";
export { Lexer, type LexerOptions } from "./lexer/lexer.js";
export { type Token, TokenType } from "./lexer/token.js";
export { type OptimizeOptions, optimize } from "./optimizer/optimizer.js";
export { Parser } from "./parser/parser.js";
export {
  type CallFunctionOptions,
  type EvaluateOptions,
  callFunction,
  evaluate,
} from "./runtime/evaluator.js";
export {
  type BudgetOptions,
  ExecutionBudget,
  type ProgressCallback,
} from "./runtime/limits.js";
export {
  type CallContext,
  type Callable,
  type FunctionSignature,
  FunctionRegistry,
  type NativeFunction,
  type RegistryEntry,
  type TypeConstraint,
  registerFunction,
} from "./runtime/registry.js";
export { type Binding, Scope } from "./runtime/scope.js";
export * from "./runtime/values.js";
