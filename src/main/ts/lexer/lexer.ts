import { LexError, LexErrorKind } from "../common/errors.js";
import { Position } from "../common/position.js";
import { KEYWORDS, SYMBOLS, Token, TokenLiteral, TokenType } from "./token.js";

export interface LexerOptions {
  allowDecimalLiterals?: boolean;
}

const MAX_INT_MAGNITUDE = 1n << 63n;

/**
 * Tokenizer over a source string. Iterating produces tokens lazily, ending with
 * exactly one EOF token; every new iteration starts again from the top.
 */
export class Lexer implements Iterable<Token> {
  private readonly allowDecimalLiterals: boolean;

  constructor(
    private readonly source: string,
    options: LexerOptions = {}
  ) {
    this.allowDecimalLiterals = options.allowDecimalLiterals ?? true;
  }

  [Symbol.iterator](): Iterator<Token> {
    return new Scanner(this.source, this.allowDecimalLiterals).tokens();
  }

  scanTokens(): Token[] {
    return [...this];
  }
}

class Scanner {
  private start = 0;
  private current = 0;
  private line = 1;
  private column = 1;
  private startPos: Position = { line: 1, column: 1, offset: 0 };

  constructor(
    private readonly source: string,
    private readonly allowDecimalLiterals: boolean
  ) {}

  *tokens(): Generator<Token, void, undefined> {
    for (;;) {
      this.skipTrivia();
      this.start = this.current;
      this.startPos = this.position();
      if (this.isAtEnd()) {
        yield this.makeToken(TokenType.EOF);
        return;
      }
      yield this.scanToken();
    }
  }

  private scanToken(): Token {
    const c = this.peek();

    if (this.isDigit(c)) return this.number();
    if (this.isAlpha(c)) return this.identifier();
    if (c === '"') return this.string();
    if (c === "'") return this.char();

    for (const [symbol, type] of SYMBOLS) {
      if (this.source.startsWith(symbol, this.current)) {
        for (let i = 0; i < symbol.length; i++) this.advance();
        return this.makeToken(type);
      }
    }

    throw this.error("UnexpectedCharacter", `Unexpected character '${c}'.`);
  }

  private skipTrivia() {
    while (!this.isAtEnd()) {
      const c = this.peek();
      if (c === " " || c === "\t" || c === "\r" || c === "\n") {
        this.advance();
      } else if (c === "/" && this.peekNext() === "/") {
        while (this.peek() !== "\n" && !this.isAtEnd()) this.advance();
      } else if (c === "/" && this.peekNext() === "*") {
        this.blockComment();
      } else {
        return;
      }
    }
  }

  private blockComment() {
    const open = this.position();
    let depth = 0;
    do {
      if (this.isAtEnd()) {
        throw new LexError(
          "UnterminatedComment",
          "Unterminated block comment.",
          open
        );
      }
      if (this.peek() === "/" && this.peekNext() === "*") {
        this.advance();
        this.advance();
        depth++;
      } else if (this.peek() === "*" && this.peekNext() === "/") {
        this.advance();
        this.advance();
        depth--;
      } else {
        this.advance();
      }
    } while (depth > 0);
  }

  private identifier(): Token {
    while (this.isAlphaNumeric(this.peek())) this.advance();

    const text = this.source.substring(this.start, this.current);
    if (text === "_") return this.makeToken(TokenType.Underscore);
    return this.makeToken(KEYWORDS.get(text) ?? TokenType.Identifier);
  }

  private number(): Token {
    const radix = this.radixPrefix();
    if (radix !== null) {
      this.advance();
      this.advance();
      let digits = 0;
      while (this.isRadixDigit(this.peek(), radix) || this.peek() === "_") {
        if (this.peek() !== "_") digits++;
        this.advance();
      }
      if (digits === 0) {
        throw this.error("MalformedNumber", "Expect digits after radix prefix.");
      }
      return this.integerToken();
    }

    while (this.isDigit(this.peek()) || this.peek() === "_") this.advance();

    let isFloat = false;
    if (this.peek() === "." && this.isDigit(this.peekNext())) {
      isFloat = true;
      this.advance();
      while (this.isDigit(this.peek()) || this.peek() === "_") this.advance();
    }

    if (this.peek() === "e" || this.peek() === "E") {
      const sign = this.peekNext();
      const afterSign = this.source.charAt(this.current + 2);
      if (
        this.isDigit(sign) ||
        ((sign === "+" || sign === "-") && this.isDigit(afterSign))
      ) {
        isFloat = true;
        this.advance();
        if (sign === "+" || sign === "-") this.advance();
        while (this.isDigit(this.peek())) this.advance();
      }
    }

    if (!isFloat) return this.integerToken();

    this.rejectTrailingLetters();
    if (!this.allowDecimalLiterals) {
      throw new LexError(
        "MalformedNumber",
        "Decimal literals are not enabled.",
        this.startPos
      );
    }
    const text = this.source.substring(this.start, this.current);
    const value = parseFloat(text.replace(/_/g, ""));
    if (!Number.isFinite(value)) {
      throw new LexError(
        "MalformedNumber",
        `Float literal '${text}' is out of range.`,
        this.startPos
      );
    }
    return this.makeToken(TokenType.Float, value);
  }

  private integerToken(): Token {
    this.rejectTrailingLetters();
    const text = this.source.substring(this.start, this.current);
    const value = BigInt(text.replace(/_/g, ""));
    if (value > MAX_INT_MAGNITUDE) {
      throw new LexError(
        "MalformedNumber",
        `Integer literal '${text}' is too large.`,
        this.startPos
      );
    }
    return this.makeToken(TokenType.Int, value);
  }

  private rejectTrailingLetters() {
    if (this.isAlpha(this.peek())) {
      while (this.isAlphaNumeric(this.peek())) this.advance();
      const text = this.source.substring(this.start, this.current);
      throw new LexError(
        "MalformedNumber",
        `Invalid numeric literal '${text}'.`,
        this.startPos
      );
    }
  }

  private radixPrefix(): 16 | 8 | 2 | null {
    if (this.peek() !== "0") return null;
    switch (this.peekNext()) {
      case "x":
      case "X":
        return 16;
      case "o":
      case "O":
        return 8;
      case "b":
      case "B":
        return 2;
      default:
        return null;
    }
  }

  private string(): Token {
    this.advance();
    let value = "";
    while (this.peek() !== '"') {
      if (this.isAtEnd() || this.peek() === "\n") {
        throw new LexError(
          "UnterminatedString",
          "Unterminated string.",
          this.startPos
        );
      }
      value += this.escapedChar();
    }
    this.advance();
    return this.makeToken(TokenType.String, value);
  }

  private char(): Token {
    this.advance();
    let value = "";
    while (this.peek() !== "'") {
      if (this.isAtEnd() || this.peek() === "\n") {
        throw new LexError(
          "UnterminatedChar",
          "Unterminated character literal.",
          this.startPos
        );
      }
      value += this.escapedChar();
    }
    this.advance();
    if ([...value].length !== 1) {
      throw new LexError(
        "MalformedChar",
        "Character literal must hold exactly one character.",
        this.startPos
      );
    }
    return this.makeToken(TokenType.Char, value);
  }

  private escapedChar(): string {
    const c = this.advance();
    if (c !== "\\") return c;

    const escapePos = this.position();
    escapePos.column--;
    escapePos.offset--;
    const e = this.advance();
    switch (e) {
      case "n":
        return "\n";
      case "t":
        return "\t";
      case "r":
        return "\r";
      case "0":
        return "\0";
      case "\\":
      case '"':
      case "'":
        return e;
      case "x":
        return this.hexEscape(2, escapePos);
      case "u":
        return this.unicodeEscape(escapePos);
      default:
        throw new LexError(
          "InvalidEscape",
          `Invalid escape sequence '\\${e}'.`,
          escapePos
        );
    }
  }

  private hexEscape(length: number, escapePos: Position): string {
    const digits = this.source.slice(this.current, this.current + length);
    if (digits.length !== length || !/^[0-9a-fA-F]+$/.test(digits)) {
      throw new LexError(
        "InvalidEscape",
        `Expect ${length} hex digits after '\\x'.`,
        escapePos
      );
    }
    for (let i = 0; i < length; i++) this.advance();
    return String.fromCharCode(parseInt(digits, 16));
  }

  private unicodeEscape(escapePos: Position): string {
    const close = this.source.indexOf("}", this.current);
    const body =
      this.peek() === "{" && close !== -1
        ? this.source.substring(this.current + 1, close)
        : "";
    const code = /^[0-9a-fA-F]{1,6}$/.test(body) ? parseInt(body, 16) : -1;
    // surrogates are not scalar values
    const surrogate = code >= 0xd800 && code <= 0xdfff;
    if (code < 0 || code > 0x10ffff || surrogate) {
      throw new LexError(
        "InvalidEscape",
        "Expect '\\u{...}' with a valid code point.",
        escapePos
      );
    }
    while (this.current <= close) this.advance();
    return String.fromCodePoint(code);
  }

  private peek(): string {
    if (this.isAtEnd()) return "\0";
    return this.source.charAt(this.current);
  }

  private peekNext(): string {
    if (this.current + 1 >= this.source.length) return "\0";
    return this.source.charAt(this.current + 1);
  }

  private isAlpha(c: string): boolean {
    return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
  }

  private isAlphaNumeric(c: string): boolean {
    return this.isAlpha(c) || this.isDigit(c);
  }

  private isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
  }

  private isRadixDigit(c: string, radix: 16 | 8 | 2): boolean {
    switch (radix) {
      case 16:
        return /^[0-9a-fA-F]$/.test(c);
      case 8:
        return c >= "0" && c <= "7";
      case 2:
        return c === "0" || c === "1";
    }
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private advance(): string {
    const c = this.source.charAt(this.current++);
    if (c === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private position(): Position {
    return { line: this.line, column: this.column, offset: this.current };
  }

  private makeToken(type: TokenType, literal?: TokenLiteral): Token {
    return {
      type,
      lexeme: this.source.substring(this.start, this.current),
      literal,
      pos: this.startPos,
      length: this.current - this.start,
    };
  }

  private error(kind: LexErrorKind, message: string): LexError {
    return new LexError(kind, message, this.position());
  }
}
