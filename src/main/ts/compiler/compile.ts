import { Script } from "../ast/ast.js";
import {
  DiagnosticReporter,
  DiagnosticSeverity,
} from "../common/diagnostics.js";
import { CompileError, LexError, ParseError } from "../common/errors.js";
import { START } from "../common/position.js";
import { Result, err, ok } from "../common/result.js";
import { DialectConfig, resolveDialect } from "../config/dialect.js";
import { Lexer } from "../lexer/lexer.js";
import { optimize } from "../optimizer/optimizer.js";
import { Parser } from "../parser/parser.js";
import { Value } from "../runtime/values.js";

export interface CompileOptions {
  /** Shown in diagnostics, e.g. a file name. */
  sourceName?: string;
  reporter?: DiagnosticReporter;
  /** Host constants the optimizer may substitute. */
  constants?: ReadonlyMap<string, Value>;
}

/**
 * Tokenizes, parses and optimizes `source`. Lex and parse failures are
 * reported and returned; an invalid dialect throws `ConfigError`.
 */
export function compile(
  source: string,
  dialect: Partial<DialectConfig> = {},
  options: CompileOptions = {}
): Result<Script, CompileError> {
  const config = resolveDialect(dialect);
  const { sourceName, reporter } = options;

  try {
    const lexer = new Lexer(source, {
      allowDecimalLiterals: config.allowDecimalLiterals,
    });
    const script = new Parser(lexer, config, sourceName).parse();
    return ok(
      optimize(script, options.constants, config.optimizationLevel, {
        onNote: (message, pos) =>
          reporter?.report({
            severity: DiagnosticSeverity.Hint,
            message,
            pos,
            sourceName,
          }),
      })
    );
  } catch (e) {
    const error = stackOverflow(e) ?? e;
    if (!(error instanceof LexError || error instanceof ParseError)) throw e;
    reporter?.report({
      severity: DiagnosticSeverity.Error,
      message: error.message,
      pos: error.pos,
      sourceName,
    });
    return err(new CompileError(error, sourceName));
  }
}

// without a depth limit, deep nesting can exhaust the host stack
function stackOverflow(e: unknown): ParseError | undefined {
  if (e instanceof RangeError && /call stack/i.test(e.message)) {
    return new ParseError(
      "ExpressionTooDeep",
      "Expression nesting exhausted the call stack.",
      START
    );
  }
  return undefined;
}
