import type { Value } from "../runtime/values.js";
import { formatCodeFrame } from "./diagnostics.js";
import { Position, formatPosition } from "./position.js";

export type LexErrorKind =
  | "UnterminatedString"
  | "UnterminatedChar"
  | "MalformedChar"
  | "InvalidEscape"
  | "MalformedNumber"
  | "UnterminatedComment"
  | "UnexpectedCharacter";

export class LexError extends Error {
  constructor(
    readonly kind: LexErrorKind,
    message: string,
    readonly pos: Position
  ) {
    super(message);
    this.name = "LexError";
  }
}

export type ParseErrorKind =
  | "UnexpectedToken"
  | "MissingToken"
  | "UnexpectedEOF"
  | "DuplicateParameter"
  | "InvalidAssignmentTarget"
  | "LoopControlOutsideLoop"
  | "DuplicateFunction"
  | "NestedFunction"
  | "DuplicateProperty"
  | "DuplicateSwitchCase"
  | "InvalidSwitchCase"
  | "FeatureDisabled"
  | "LiteralTooLarge"
  | "ExpressionTooDeep";

export class ParseError extends Error {
  constructor(
    readonly kind: ParseErrorKind,
    message: string,
    readonly pos: Position
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * A failed compilation. `error` is the first lexer or parser failure; nothing
 * of the script survives it.
 */
export class CompileError extends Error {
  readonly pos: Position;

  constructor(readonly error: LexError | ParseError, readonly sourceName?: string) {
    super(error.message, { cause: error });
    this.name = "CompileError";
    this.pos = error.pos;
  }

  get phase(): "lex" | "parse" {
    return this.error instanceof LexError ? "lex" : "parse";
  }
}

export type RuntimeErrorKind =
  | "TypeMismatch"
  | "UndefinedVariable"
  | "FunctionNotFound"
  | "AmbiguousFunction"
  | "DivisionByZero"
  | "Overflow"
  | "Arithmetic"
  | "DanglingLoopControl"
  | "ResourceLimitExceeded"
  | "ExecutionInterrupted"
  | "IndexOutOfBounds"
  | "PropertyNotFound"
  | "AssignmentToConstant"
  | "NotIterable"
  | "Thrown"
  | "NativeFailure";

export interface RuntimeErrorInit {
  pos?: Position;
  /** Variable or function the error is about. */
  identifier?: string;
  arity?: number;
  /** Payload of a script `throw`. */
  thrown?: Value;
  cause?: unknown;
}

export class RuntimeError extends Error {
  pos?: Position;
  readonly identifier?: string;
  readonly arity?: number;
  readonly thrown?: Value;
  /** Script functions the error unwound through, innermost first. */
  readonly trace: string[] = [];

  constructor(
    readonly kind: RuntimeErrorKind,
    message: string,
    init: RuntimeErrorInit = {}
  ) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = "RuntimeError";
    this.pos = init.pos;
    this.identifier = init.identifier;
    this.arity = init.arity;
    this.thrown = init.thrown;
  }

  /** Limits and interruption end the run; `try`/`catch` cannot intercept them. */
  get catchable(): boolean {
    return (
      this.kind !== "ResourceLimitExceeded" &&
      this.kind !== "ExecutionInterrupted"
    );
  }

  at(pos: Position): this {
    if (!this.pos) this.pos = pos;
    return this;
  }
}

/** An implementation fault, as opposed to a problem with the script. */
export class InternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalError";
  }
}

export class ConfigError extends Error {
  constructor(
    readonly option: string,
    message: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type EngineError = CompileError | RuntimeError;

/**
 * Renders an error with its position and, when the source is given, the
 * offending line.
 */
export function formatError(
  error: EngineError | LexError | ParseError,
  source?: string,
  sourceName?: string
): string {
  const name =
    error instanceof CompileError ? error.error.name : error.name;
  const kind = error instanceof CompileError ? error.error.kind : error.kind;
  const header = `${name}(${kind}): ${error.message}`;
  const pos = error.pos;
  if (!pos) return header;

  const lines = [`${formatPosition(pos, sourceName)} ${header}`];
  if (source !== undefined) lines.push(formatCodeFrame(source, pos));
  if (error instanceof RuntimeError) {
    for (const fn of error.trace) lines.push(`  in call to '${fn}'`);
  }
  return lines.join("\n");
}
