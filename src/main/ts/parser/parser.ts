import {
  BlockExpr,
  DoLoopStmt,
  Expression,
  FnDef,
  ForStmt,
  LetStmt,
  Script,
  Statement,
  TryCatchStmt,
  WhileStmt,
} from "../ast/ast.js";
import { START } from "../common/position.js";
import { DEFAULT_DIALECT, DialectConfig } from "../config/dialect.js";
import { Token, TokenType } from "../lexer/token.js";
import { ParseContext } from "./context.js";
import { ExpressionParser } from "./expressions.js";
import { ParserState } from "./state.js";

export class Parser {
  private readonly state: ParserState;
  private readonly context: ParseContext;
  private readonly expressionParser: ExpressionParser;
  private readonly functions = new Set<string>();

  constructor(
    tokens: Iterable<Token>,
    private readonly dialect: DialectConfig = { ...DEFAULT_DIALECT },
    private readonly sourceName?: string
  ) {
    this.state = new ParserState(tokens[Symbol.iterator]());
    this.context = new ParseContext(dialect);
    this.expressionParser = new ExpressionParser(
      this.state,
      this.context,
      () => this.statement()
    );
  }

  /** Parses the whole token stream; throws the first `ParseError`. */
  parse(): Script {
    const statements: Statement[] = [];
    const start = this.state.isAtEnd() ? START : this.state.peek().pos;

    while (!this.state.isAtEnd()) {
      const stmt = this.statement();
      if (stmt) statements.push(stmt);
    }

    return {
      kind: "Script",
      statements,
      dialect: this.dialect,
      sourceName: this.sourceName,
      pos: start,
    };
  }

  private statement(): Statement | null {
    if (this.state.match(TokenType.Semicolon)) return null;

    if (this.state.match(TokenType.Let)) return this.letDeclaration(false);
    if (this.state.match(TokenType.Const)) return this.letDeclaration(true);
    if (this.state.match(TokenType.Fn)) return this.fnDeclaration();
    if (this.state.match(TokenType.While)) return this.whileStatement();
    if (this.state.match(TokenType.Loop)) return this.loopStatement();
    if (this.state.match(TokenType.Do)) return this.doStatement();
    if (this.state.match(TokenType.For)) return this.forStatement();
    if (this.state.match(TokenType.Return)) return this.returnStatement();
    if (this.state.match(TokenType.Break, TokenType.Continue)) {
      return this.loopControl(this.state.previous());
    }
    if (this.state.match(TokenType.Throw)) return this.throwStatement();
    if (this.state.match(TokenType.Try)) return this.tryStatement();

    return this.expressionStatement();
  }

  private letDeclaration(constant: boolean): LetStmt {
    const start = this.state.previous();
    const name = this.state.consume(
      TokenType.Identifier,
      "Expect variable name."
    ).lexeme;

    let initializer: Expression | undefined;
    if (this.state.match(TokenType.Equal)) {
      initializer = this.expression();
    } else if (constant) {
      this.state.consume(TokenType.Equal, "Expect '=' after constant name.");
    }
    this.terminate("variable declaration");

    return { kind: "Let", name, constant, initializer, pos: start.pos };
  }

  private fnDeclaration(): FnDef {
    const start = this.state.previous();
    if (!this.context.atTopLevel) {
      throw this.state.error(
        start,
        "Functions can only be defined at the top level.",
        "NestedFunction"
      );
    }

    const nameToken = this.state.consume(
      TokenType.Identifier,
      "Expect function name."
    );
    const name = nameToken.lexeme;

    this.state.consume(TokenType.OpenParen, "Expect '(' after function name.");
    const params: string[] = [];
    while (!this.state.check(TokenType.CloseParen)) {
      const param = this.state.consume(
        TokenType.Identifier,
        "Expect parameter name."
      );
      if (params.includes(param.lexeme)) {
        throw this.state.error(
          param,
          `Duplicate parameter '${param.lexeme}' in function '${name}'.`,
          "DuplicateParameter"
        );
      }
      params.push(param.lexeme);
      if (!this.state.match(TokenType.Comma)) break;
    }
    this.state.consume(TokenType.CloseParen, "Expect ')' after parameters.");

    const key = `${name}/${params.length}`;
    if (this.functions.has(key)) {
      throw this.state.error(
        nameToken,
        `Function '${name}' with ${params.length} parameters is already defined.`,
        "DuplicateFunction"
      );
    }
    this.functions.add(key);

    const body = this.context.inFunction(() => this.block("function body"));
    return { kind: "FnDef", name, params, body, pos: start.pos };
  }

  private whileStatement(): WhileStmt {
    const start = this.state.previous();
    this.context.require("allowLooping", start, "Loops are not enabled.");
    const condition = this.expression();
    const body = this.context.inLoopBody(() => this.block("while condition"));
    return { kind: "While", condition, body, pos: start.pos };
  }

  private loopStatement(): WhileStmt {
    const start = this.state.previous();
    this.context.require("allowLooping", start, "Loops are not enabled.");
    const body = this.context.inLoopBody(() => this.block("'loop'"));
    return {
      kind: "While",
      condition: {
        kind: "Literal",
        value: { type: "bool", value: true },
        pos: start.pos,
      },
      body,
      pos: start.pos,
    };
  }

  private doStatement(): DoLoopStmt {
    const start = this.state.previous();
    this.context.require("allowLooping", start, "Loops are not enabled.");
    const body = this.context.inLoopBody(() => this.block("'do'"));

    let until: boolean;
    if (this.state.match(TokenType.Until)) {
      until = true;
    } else {
      this.state.consume(
        TokenType.While,
        "Expect 'while' or 'until' after do body."
      );
      until = false;
    }
    const condition = this.expression();
    this.terminate("do loop");

    return { kind: "DoLoop", body, condition, until, pos: start.pos };
  }

  private forStatement(): ForStmt {
    const start = this.state.previous();
    this.context.require("allowLooping", start, "Loops are not enabled.");

    let variable: string;
    let indexVariable: string | undefined;
    if (this.state.match(TokenType.OpenParen)) {
      variable = this.state.consume(
        TokenType.Identifier,
        "Expect loop variable name."
      ).lexeme;
      this.state.consume(TokenType.Comma, "Expect ',' after loop variable.");
      const index = this.state.consume(
        TokenType.Identifier,
        "Expect index variable name."
      );
      if (index.lexeme === variable) {
        throw this.state.error(
          index,
          `Duplicate loop variable '${variable}'.`,
          "DuplicateParameter"
        );
      }
      indexVariable = index.lexeme;
      this.state.consume(
        TokenType.CloseParen,
        "Expect ')' after loop variables."
      );
    } else {
      variable = this.state.consume(
        TokenType.Identifier,
        "Expect loop variable name."
      ).lexeme;
    }

    this.state.consume(TokenType.In, "Expect 'in' after loop variable.");
    const iterable = this.expression();
    const body = this.context.inLoopBody(() => this.block("for iterable"));

    return {
      kind: "For",
      variable,
      indexVariable,
      iterable,
      body,
      pos: start.pos,
    };
  }

  private returnStatement(): Statement {
    const start = this.state.previous();
    const value = this.endsStatement() ? undefined : this.expression();
    this.terminate("return");
    return { kind: "Return", value, pos: start.pos };
  }

  private loopControl(keyword: Token): Statement {
    if (this.dialect.strictLoopControl && !this.context.inLoop) {
      throw this.state.error(
        keyword,
        `'${keyword.lexeme}' must be inside a loop.`,
        "LoopControlOutsideLoop"
      );
    }
    this.terminate(`'${keyword.lexeme}'`);
    return keyword.type === TokenType.Break
      ? { kind: "Break", pos: keyword.pos }
      : { kind: "Continue", pos: keyword.pos };
  }

  private throwStatement(): Statement {
    const start = this.state.previous();
    const value = this.endsStatement() ? undefined : this.expression();
    this.terminate("throw");
    return { kind: "Throw", value, pos: start.pos };
  }

  private tryStatement(): TryCatchStmt {
    const start = this.state.previous();
    const body = this.block("'try'");
    this.state.consume(TokenType.Catch, "Expect 'catch' after try block.");

    let errorVariable: string | undefined;
    if (this.state.match(TokenType.OpenParen)) {
      errorVariable = this.state.consume(
        TokenType.Identifier,
        "Expect error variable name."
      ).lexeme;
      this.state.consume(
        TokenType.CloseParen,
        "Expect ')' after error variable."
      );
    }
    const handler = this.block("'catch'");

    return { kind: "TryCatch", body, errorVariable, handler, pos: start.pos };
  }

  private expressionStatement(): Statement {
    const expression = this.expressionParser.parseStatementExpression();
    const blockLike =
      expression.kind === "Block" ||
      expression.kind === "If" ||
      expression.kind === "Switch";
    if (!blockLike) this.terminate("expression");
    else this.state.match(TokenType.Semicolon);

    return { kind: "ExpressionStmt", expression, pos: expression.pos };
  }

  private block(after: string): BlockExpr {
    const open = this.state.consume(
      TokenType.OpenBrace,
      `Expect '{' after ${after}.`
    );
    return this.expressionParser.parseBlock(open);
  }

  private expression(): Expression {
    return this.expressionParser.parseExpression();
  }

  private endsStatement(): boolean {
    return (
      this.state.check(TokenType.Semicolon) ||
      this.state.check(TokenType.CloseBrace) ||
      this.state.isAtEnd()
    );
  }

  /**
   * A statement ends with ';', or without one when it is the last statement of
   * a block or of the script.
   */
  private terminate(what: string) {
    if (this.state.match(TokenType.Semicolon)) return;
    if (this.state.check(TokenType.CloseBrace) || this.state.isAtEnd()) return;
    throw this.state.error(
      this.state.peek(),
      `Expect ';' after ${what}.`,
      "MissingToken"
    );
  }
}
