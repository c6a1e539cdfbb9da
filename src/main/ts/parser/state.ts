import { InternalError, ParseError, ParseErrorKind } from "../common/errors.js";
import { Token, TokenType } from "../lexer/token.js";

/**
 * Cursor over a lazily produced token stream. Tokens are pulled from the
 * iterator only as far as the parser looks ahead.
 */
export class ParserState {
  private readonly lookahead: Token[] = [];
  private last: Token | undefined;
  private eof: Token | undefined;

  constructor(private readonly tokens: Iterator<Token>) {}

  match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(
      this.peek(),
      message,
      this.isAtEnd() ? "UnexpectedEOF" : "MissingToken"
    );
  }

  check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  checkAhead(distance: number, ...types: TokenType[]): boolean {
    const type = this.peek(distance).type;
    return types.some((t) => t === type);
  }

  advance(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) this.lookahead.shift();
    this.last = token;
    return token;
  }

  isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  peek(distance = 0): Token {
    while (this.lookahead.length <= distance) {
      if (this.eof) return this.eof;
      const next = this.tokens.next();
      if (next.done) {
        throw new InternalError("Token stream ended without an EOF token.");
      }
      if (next.value.type === TokenType.EOF) this.eof = next.value;
      this.lookahead.push(next.value);
    }
    return this.lookahead[distance];
  }

  previous(): Token {
    if (!this.last) throw new InternalError("No token has been consumed yet.");
    return this.last;
  }

  error(
    token: Token,
    message: string,
    kind: ParseErrorKind = "UnexpectedToken"
  ): ParseError {
    if (token.type === TokenType.EOF && kind === "UnexpectedToken") {
      kind = "UnexpectedEOF";
    }
    return new ParseError(kind, message, token.pos);
  }
}
