import { ParseError } from "../common/errors.js";
import { DialectConfig } from "../config/dialect.js";
import { Token } from "../lexer/token.js";

type FeatureFlag =
  | "allowClosures"
  | "allowSwitch"
  | "allowLooping";

/**
 * Nesting state shared by the statement and expression parsers.
 */
export class ParseContext {
  private depth = 0;
  private loops = 0;
  private functions = 0;
  private blocks = 0;

  constructor(readonly dialect: DialectConfig) {}

  get inLoop(): boolean {
    return this.loops > 0;
  }

  get atTopLevel(): boolean {
    return this.blocks === 0 && this.functions === 0;
  }

  require(flag: FeatureFlag, token: Token, message: string) {
    if (!this.dialect[flag]) {
      throw new ParseError("FeatureDisabled", message, token.pos);
    }
  }

  nested<T>(token: Token, parse: () => T): T {
    const max = this.dialect.maxExpressionDepth;
    if (max > 0 && this.depth >= max) {
      throw new ParseError(
        "ExpressionTooDeep",
        `Expression nesting exceeds ${max} levels.`,
        token.pos
      );
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  inBlock<T>(parse: () => T): T {
    this.blocks++;
    try {
      return parse();
    } finally {
      this.blocks--;
    }
  }

  inLoopBody<T>(parse: () => T): T {
    this.loops++;
    try {
      return parse();
    } finally {
      this.loops--;
    }
  }

  /** Function and closure bodies start outside any loop. */
  inFunction<T>(parse: () => T): T {
    const loops = this.loops;
    this.loops = 0;
    this.functions++;
    try {
      return parse();
    } finally {
      this.functions--;
      this.loops = loops;
    }
  }
}
