import {
  BinaryOperator,
  BlockExpr,
  CompoundOperator,
  Expression,
  IfExpr,
  LiteralExpr,
  LiteralValue,
  Statement,
  SwitchCase,
  isPlace,
} from "../ast/ast.js";
import { ParseError } from "../common/errors.js";
import { Token, TokenType } from "../lexer/token.js";
import { freeVariables } from "./captures.js";
import { ParseContext } from "./context.js";
import { ParserState } from "./state.js";

export enum Precedence {
  None,
  Assignment, // = += -= ...
  NullCoalesce, // ??
  Or, // ||
  And, // &&
  BitOr, // |
  BitXor, // ^
  BitAnd, // &
  Equality, // == !=
  Comparison, // < > <= >= in
  Range, // .. ..=
  Shift, // << >>
  Term, // + -
  Factor, // * / %
  Power, // **
  Unary, // ! - +
  Call, // . () []
  Primary,
}

const BINARY_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
  [TokenType.Plus]: "+",
  [TokenType.Minus]: "-",
  [TokenType.Star]: "*",
  [TokenType.Slash]: "/",
  [TokenType.Percent]: "%",
  [TokenType.StarStar]: "**",
  [TokenType.EqualEqual]: "==",
  [TokenType.BangEqual]: "!=",
  [TokenType.Less]: "<",
  [TokenType.LessEqual]: "<=",
  [TokenType.Greater]: ">",
  [TokenType.GreaterEqual]: ">=",
  [TokenType.Ampersand]: "&",
  [TokenType.Pipe]: "|",
  [TokenType.Caret]: "^",
  [TokenType.LessLess]: "<<",
  [TokenType.GreaterGreater]: ">>",
  [TokenType.In]: "in",
};

const COMPOUND_ASSIGNMENTS: Partial<Record<TokenType, CompoundOperator>> = {
  [TokenType.PlusEqual]: "+",
  [TokenType.MinusEqual]: "-",
  [TokenType.StarEqual]: "*",
  [TokenType.StarStarEqual]: "**",
  [TokenType.SlashEqual]: "/",
  [TokenType.PercentEqual]: "%",
  [TokenType.LessLessEqual]: "<<",
  [TokenType.GreaterGreaterEqual]: ">>",
  [TokenType.AmpersandEqual]: "&",
  [TokenType.PipeEqual]: "|",
  [TokenType.CaretEqual]: "^",
};

const PRECEDENCE: Partial<Record<TokenType, Precedence>> = {
  [TokenType.Equal]: Precedence.Assignment,
  [TokenType.PlusEqual]: Precedence.Assignment,
  [TokenType.MinusEqual]: Precedence.Assignment,
  [TokenType.StarEqual]: Precedence.Assignment,
  [TokenType.StarStarEqual]: Precedence.Assignment,
  [TokenType.SlashEqual]: Precedence.Assignment,
  [TokenType.PercentEqual]: Precedence.Assignment,
  [TokenType.LessLessEqual]: Precedence.Assignment,
  [TokenType.GreaterGreaterEqual]: Precedence.Assignment,
  [TokenType.AmpersandEqual]: Precedence.Assignment,
  [TokenType.PipeEqual]: Precedence.Assignment,
  [TokenType.CaretEqual]: Precedence.Assignment,
  [TokenType.QuestionQuestion]: Precedence.NullCoalesce,
  [TokenType.PipePipe]: Precedence.Or,
  [TokenType.AmpersandAmpersand]: Precedence.And,
  [TokenType.Pipe]: Precedence.BitOr,
  [TokenType.Caret]: Precedence.BitXor,
  [TokenType.Ampersand]: Precedence.BitAnd,
  [TokenType.EqualEqual]: Precedence.Equality,
  [TokenType.BangEqual]: Precedence.Equality,
  [TokenType.Less]: Precedence.Comparison,
  [TokenType.LessEqual]: Precedence.Comparison,
  [TokenType.Greater]: Precedence.Comparison,
  [TokenType.GreaterEqual]: Precedence.Comparison,
  [TokenType.In]: Precedence.Comparison,
  [TokenType.DotDot]: Precedence.Range,
  [TokenType.DotDotEqual]: Precedence.Range,
  [TokenType.LessLess]: Precedence.Shift,
  [TokenType.GreaterGreater]: Precedence.Shift,
  [TokenType.Plus]: Precedence.Term,
  [TokenType.Minus]: Precedence.Term,
  [TokenType.Star]: Precedence.Factor,
  [TokenType.Slash]: Precedence.Factor,
  [TokenType.Percent]: Precedence.Factor,
  [TokenType.StarStar]: Precedence.Power,
  [TokenType.Dot]: Precedence.Call,
  [TokenType.OpenBracket]: Precedence.Call,
};

const INT_MAX = (1n << 63n) - 1n;

export class ExpressionParser {
  constructor(
    private readonly state: ParserState,
    private readonly context: ParseContext,
    private readonly parseStatement: () => Statement | null
  ) {}

  parseExpression(precedence: Precedence = Precedence.None): Expression {
    return this.context.nested(this.state.peek(), () => {
      let left = this.prefix();

      while (precedence < this.getPrecedence(this.state.peek().type)) {
        left = this.infix(left);
      }

      return left;
    });
  }

  /**
   * At the start of a statement, a block, `if` or `switch` is a statement on
   * its own: `if c { a } else { b } - 1` is two statements.
   */
  parseStatementExpression(): Expression {
    const token = this.state.peek();
    if (
      token.type === TokenType.OpenBrace ||
      token.type === TokenType.If ||
      token.type === TokenType.Switch
    ) {
      return this.context.nested(token, () => this.prefix());
    }
    return this.parseExpression();
  }

  parseBlock(openBrace: Token): BlockExpr {
    return this.context.nested<BlockExpr>(openBrace, () =>
      this.context.inBlock<BlockExpr>(() => {
        const statements: Statement[] = [];

        while (
          !this.state.check(TokenType.CloseBrace) &&
          !this.state.isAtEnd()
        ) {
          const stmt = this.parseStatement();
          if (stmt) statements.push(stmt);
        }

        this.state.consume(TokenType.CloseBrace, "Expect '}' after block.");

        return {
          kind: "Block",
          statements,
          pos: openBrace.pos,
        };
      })
    );
  }

  private prefix(): Expression {
    const token = this.state.advance();

    switch (token.type) {
      case TokenType.Int:
      case TokenType.Float:
      case TokenType.String:
      case TokenType.Char:
      case TokenType.True:
      case TokenType.False:
        return this.literal(token, false);
      case TokenType.Identifier:
        if (this.state.check(TokenType.OpenParen)) return this.call(token);
        return { kind: "Variable", name: token.lexeme, pos: token.pos };
      case TokenType.OpenBrace:
        return this.parseBlock(token);
      case TokenType.Minus:
      case TokenType.Plus:
      case TokenType.Bang:
        return this.unary(token);
      case TokenType.OpenParen:
        return this.grouping(token);
      case TokenType.OpenBracket:
        return this.arrayLiteral(token);
      case TokenType.HashBrace:
        return this.mapLiteral(token);
      case TokenType.If:
        return this.ifExpression(token);
      case TokenType.Switch:
        return this.switchExpression(token);
      case TokenType.Pipe:
      case TokenType.PipePipe:
        return this.closure(token);
      default:
        throw this.state.error(token, "Expect expression.");
    }
  }

  private infix(left: Expression): Expression {
    const token = this.state.advance();

    const binary = BINARY_OPERATORS[token.type];
    if (binary !== undefined) {
      // `**` is right-associative
      const precedence = this.getPrecedence(token.type);
      const right = this.parseExpression(
        token.type === TokenType.StarStar ? precedence - 1 : precedence
      );
      return {
        kind: "Binary",
        operator: binary,
        left,
        right,
        pos: token.pos,
      };
    }

    switch (token.type) {
      case TokenType.AmpersandAmpersand:
      case TokenType.PipePipe:
      case TokenType.QuestionQuestion:
        return this.logical(left, token);
      case TokenType.DotDot:
      case TokenType.DotDotEqual:
        return {
          kind: "Range",
          start: left,
          end: this.parseExpression(Precedence.Range),
          inclusive: token.type === TokenType.DotDotEqual,
          pos: token.pos,
        };
      case TokenType.Dot:
        return this.access(left);
      case TokenType.OpenBracket:
        return this.index(left, token);
      case TokenType.Equal:
        return this.assignment(left, token);
      default: {
        const compound = COMPOUND_ASSIGNMENTS[token.type];
        if (compound !== undefined) {
          return this.assignment(left, token, compound);
        }
        throw this.state.error(token, `Unexpected '${token.lexeme}'.`);
      }
    }
  }

  private literal(token: Token, negated: boolean): LiteralExpr {
    return { kind: "Literal", value: this.literalValue(token, negated), pos: token.pos };
  }

  private literalValue(token: Token, negated: boolean): LiteralValue {
    const literal = token.literal;
    switch (token.type) {
      case TokenType.True:
        return { type: "bool", value: true };
      case TokenType.False:
        return { type: "bool", value: false };
      case TokenType.Int: {
        if (typeof literal !== "bigint") break;
        const value = negated ? -literal : literal;
        if (value > INT_MAX) {
          throw this.state.error(
            token,
            `Integer literal '${token.lexeme}' does not fit in 64 bits.`,
            "LiteralTooLarge"
          );
        }
        return { type: "int", value };
      }
      case TokenType.Float:
        if (typeof literal !== "number") break;
        return { type: "float", value: negated ? -literal : literal };
      case TokenType.String:
        if (typeof literal !== "string") break;
        return { type: "string", value: literal };
      case TokenType.Char:
        if (typeof literal !== "string") break;
        return { type: "char", value: literal };
    }
    throw this.state.error(token, "Expect literal.");
  }

  private unary(operator: Token): Expression {
    // `-5` is a literal unless the number is the receiver of a postfix chain
    if (
      operator.type === TokenType.Minus &&
      this.state.checkAhead(0, TokenType.Int, TokenType.Float) &&
      !this.state.checkAhead(1, TokenType.Dot, TokenType.OpenBracket)
    ) {
      const number = this.state.advance();
      return {
        kind: "Literal",
        value: this.literalValue(number, true),
        pos: operator.pos,
      };
    }

    const operand = this.parseExpression(Precedence.Unary);
    return {
      kind: "Unary",
      operator:
        operator.type === TokenType.Bang
          ? "!"
          : operator.type === TokenType.Plus
            ? "+"
            : "-",
      operand,
      pos: operator.pos,
    };
  }

  private logical(left: Expression, operator: Token): Expression {
    const right = this.parseExpression(this.getPrecedence(operator.type));
    return {
      kind: "Logical",
      operator:
        operator.type === TokenType.AmpersandAmpersand
          ? "&&"
          : operator.type === TokenType.PipePipe
            ? "||"
            : "??",
      left,
      right,
      pos: operator.pos,
    };
  }

  private grouping(open: Token): Expression {
    if (this.state.match(TokenType.CloseParen)) {
      return { kind: "Literal", value: { type: "unit" }, pos: open.pos };
    }
    const expr = this.parseExpression();
    this.state.consume(TokenType.CloseParen, "Expect ')' after expression.");
    return expr;
  }

  private arguments(): Expression[] {
    this.state.consume(TokenType.OpenParen, "Expect '(' before arguments.");
    const args: Expression[] = [];
    if (!this.state.check(TokenType.CloseParen)) {
      do {
        if (this.state.check(TokenType.CloseParen)) break;
        args.push(this.parseExpression());
      } while (this.state.match(TokenType.Comma));
    }
    this.state.consume(TokenType.CloseParen, "Expect ')' after arguments.");
    return args;
  }

  private call(name: Token): Expression {
    return {
      kind: "Call",
      name: name.lexeme,
      args: this.arguments(),
      pos: name.pos,
    };
  }

  private access(object: Expression): Expression {
    const member = this.state.consume(
      TokenType.Identifier,
      "Expect property name after '.'."
    );

    if (this.state.check(TokenType.OpenParen)) {
      return {
        kind: "MethodCall",
        receiver: object,
        method: member.lexeme,
        args: this.arguments(),
        pos: member.pos,
      };
    }

    return {
      kind: "Property",
      object,
      name: member.lexeme,
      pos: member.pos,
    };
  }

  private index(object: Expression, open: Token): Expression {
    const index = this.parseExpression();
    this.state.consume(TokenType.CloseBracket, "Expect ']' after index.");
    return { kind: "Index", object, index, pos: open.pos };
  }

  private assignment(
    target: Expression,
    operator: Token,
    compound?: CompoundOperator
  ): Expression {
    if (!isPlace(target)) {
      throw new ParseError(
        "InvalidAssignmentTarget",
        "Invalid assignment target.",
        target.pos
      );
    }
    // right-associative: `a = b = 1` assigns `b` first
    const value = this.parseExpression(Precedence.Assignment - 1);
    return {
      kind: "Assign",
      target,
      operator: compound,
      value,
      pos: operator.pos,
    };
  }

  private arrayLiteral(open: Token): Expression {
    const elements: Expression[] = [];
    while (!this.state.check(TokenType.CloseBracket)) {
      elements.push(this.parseExpression());
      if (!this.state.match(TokenType.Comma)) break;
    }
    this.state.consume(
      TokenType.CloseBracket,
      "Expect ']' after array literal."
    );
    return { kind: "ArrayLiteral", elements, pos: open.pos };
  }

  private mapLiteral(open: Token): Expression {
    const entries: { key: string; value: Expression }[] = [];
    const seen = new Set<string>();
    while (!this.state.check(TokenType.CloseBrace)) {
      const keyToken = this.state.advance();
      let key: string;
      if (keyToken.type === TokenType.Identifier) {
        key = keyToken.lexeme;
      } else if (
        keyToken.type === TokenType.String &&
        typeof keyToken.literal === "string"
      ) {
        key = keyToken.literal;
      } else {
        throw this.state.error(keyToken, "Expect property name in map literal.");
      }
      if (seen.has(key)) {
        throw this.state.error(
          keyToken,
          `Duplicate property '${key}' in map literal.`,
          "DuplicateProperty"
        );
      }
      seen.add(key);
      this.state.consume(TokenType.Colon, "Expect ':' after property name.");
      entries.push({ key, value: this.parseExpression() });
      if (!this.state.match(TokenType.Comma)) break;
    }
    this.state.consume(TokenType.CloseBrace, "Expect '}' after map literal.");
    return { kind: "MapLiteral", entries, pos: open.pos };
  }

  private ifExpression(ifToken: Token): IfExpr {
    const condition = this.parseExpression();
    const thenBranch = this.parseBlock(
      this.state.consume(TokenType.OpenBrace, "Expect '{' after if condition.")
    );

    let elseBranch: BlockExpr | IfExpr | undefined;
    if (this.state.match(TokenType.Else)) {
      if (this.state.match(TokenType.If)) {
        elseBranch = this.ifExpression(this.state.previous());
      } else {
        elseBranch = this.parseBlock(
          this.state.consume(TokenType.OpenBrace, "Expect '{' after else.")
        );
      }
    }

    return {
      kind: "If",
      condition,
      thenBranch,
      elseBranch,
      pos: ifToken.pos,
    };
  }

  private switchExpression(switchToken: Token): Expression {
    this.context.require(
      "allowSwitch",
      switchToken,
      "'switch' expressions are not enabled."
    );
    const subject = this.parseExpression();
    this.state.consume(TokenType.OpenBrace, "Expect '{' after switch subject.");

    const cases: SwitchCase[] = [];
    const seen = new Set<string>();
    let hasDefault = false;

    while (!this.state.check(TokenType.CloseBrace)) {
      const armStart = this.state.peek();
      if (hasDefault) {
        throw this.state.error(
          armStart,
          "The '_' arm must be the last in a switch.",
          "InvalidSwitchCase"
        );
      }

      const patterns: LiteralExpr[] = [];
      if (this.state.match(TokenType.Underscore)) {
        hasDefault = true;
      } else {
        do {
          const pattern = this.switchPattern();
          const key = this.patternKey(pattern.value);
          if (seen.has(key)) {
            throw new ParseError(
              "DuplicateSwitchCase",
              "Duplicate switch case.",
              pattern.pos
            );
          }
          seen.add(key);
          patterns.push(pattern);
        } while (this.state.match(TokenType.Pipe));
      }

      this.state.consume(TokenType.Arrow, "Expect '=>' after switch pattern.");
      const body = this.parseExpression();
      cases.push({ patterns, body });

      const blockBodied = body.kind === "Block";
      if (!this.state.match(TokenType.Comma) && !blockBodied) break;
    }

    this.state.consume(TokenType.CloseBrace, "Expect '}' after switch arms.");
    return { kind: "Switch", subject, cases, pos: switchToken.pos };
  }

  private switchPattern(): LiteralExpr {
    const token = this.state.advance();
    switch (token.type) {
      case TokenType.Int:
      case TokenType.Float:
      case TokenType.String:
      case TokenType.Char:
      case TokenType.True:
      case TokenType.False:
        return this.literal(token, false);
      case TokenType.Minus:
        if (this.state.checkAhead(0, TokenType.Int, TokenType.Float)) {
          const number = this.state.advance();
          return {
            kind: "Literal",
            value: this.literalValue(number, true),
            pos: token.pos,
          };
        }
        break;
    }
    throw this.state.error(
      token,
      "Switch patterns must be literals.",
      "InvalidSwitchCase"
    );
  }

  private patternKey(value: LiteralValue): string {
    return value.type === "unit" ? "unit" : `${value.type}:${String(value.value)}`;
  }

  private closure(open: Token): Expression {
    this.context.require(
      "allowClosures",
      open,
      "Closures are not enabled."
    );

    const params: string[] = [];
    if (open.type === TokenType.Pipe) {
      while (!this.state.check(TokenType.Pipe)) {
        const param = this.state.consume(
          TokenType.Identifier,
          "Expect parameter name."
        );
        if (params.includes(param.lexeme)) {
          throw this.state.error(
            param,
            `Duplicate parameter '${param.lexeme}'.`,
            "DuplicateParameter"
          );
        }
        params.push(param.lexeme);
        if (!this.state.match(TokenType.Comma)) break;
      }
      this.state.consume(TokenType.Pipe, "Expect '|' after closure parameters.");
    }

    const body = this.context.inFunction(() => this.parseExpression());
    return {
      kind: "Closure",
      params,
      body,
      captures: freeVariables(body, params),
      pos: open.pos,
    };
  }

  private getPrecedence(type: TokenType): Precedence {
    if (COMPOUND_ASSIGNMENTS[type] !== undefined) return Precedence.Assignment;
    return PRECEDENCE[type] ?? Precedence.None;
  }
}
