import { describe, expect, it } from "vitest";
import { LexError } from "../../main/ts/common/errors.js";
import { Lexer } from "../../main/ts/lexer/lexer.js";
import { TokenType } from "../../main/ts/lexer/token.js";

function lexError(source: string, allowDecimalLiterals = true): LexError {
  try {
    new Lexer(source, { allowDecimalLiterals }).scanTokens();
  } catch (e) {
    if (e instanceof LexError) return e;
    throw e;
  }
  throw new Error(`Expected '${source}' to fail`);
}

describe("Lexer", () => {
  it("should scan basic tokens", () => {
    const tokens = new Lexer("let x = 0x1F + 1_000;").scanTokens();

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Let,
      TokenType.Identifier,
      TokenType.Equal,
      TokenType.Int,
      TokenType.Plus,
      TokenType.Int,
      TokenType.Semicolon,
      TokenType.EOF,
    ]);
    expect(tokens[3].literal).toBe(31n);
    expect(tokens[5].literal).toBe(1000n);
  });

  it("should track lines and columns", () => {
    const tokens = new Lexer("let x\n  = 1").scanTokens();

    expect(tokens.map((t) => t.pos)).toEqual([
      { line: 1, column: 1, offset: 0 },
      { line: 1, column: 5, offset: 4 },
      { line: 2, column: 3, offset: 8 },
      { line: 2, column: 5, offset: 10 },
      { line: 2, column: 6, offset: 11 },
    ]);
  });

  it("should restart from the top on every iteration", () => {
    const lexer = new Lexer("a + b");
    const first = [...lexer].map((t) => t.lexeme);
    const second = [...lexer].map((t) => t.lexeme);

    expect(first).toEqual(["a", "+", "b", ""]);
    expect(second).toEqual(first);
  });

  it("should produce tokens lazily", () => {
    const tokens = new Lexer("1 @")[Symbol.iterator]();

    expect(tokens.next().value).toMatchObject({ type: TokenType.Int, literal: 1n });
    expect(() => tokens.next()).toThrow(LexError);
  });

  it("should handle operators by longest match", () => {
    const tokens = new Lexer(
      "a **= b ..= c ** d .. e => f ?? g #{ h <<= i"
    ).scanTokens();

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Identifier,
      TokenType.StarStarEqual,
      TokenType.Identifier,
      TokenType.DotDotEqual,
      TokenType.Identifier,
      TokenType.StarStar,
      TokenType.Identifier,
      TokenType.DotDot,
      TokenType.Identifier,
      TokenType.Arrow,
      TokenType.Identifier,
      TokenType.QuestionQuestion,
      TokenType.Identifier,
      TokenType.HashBrace,
      TokenType.Identifier,
      TokenType.LessLessEqual,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
  });

  it("should not read a range as a float", () => {
    const tokens = new Lexer("1..5").scanTokens();

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Int,
      TokenType.DotDot,
      TokenType.Int,
      TokenType.EOF,
    ]);
  });

  it("should scan floats with fractions and exponents", () => {
    const tokens = new Lexer("1.5e3 2e-2 0.25").scanTokens();

    expect(tokens.slice(0, 3).map((t) => t.literal)).toEqual([1500, 0.02, 0.25]);
    expect(tokens[0].type).toBe(TokenType.Float);
  });

  it("should reject floats when decimal literals are disabled", () => {
    const error = lexError("x = 1.5", false);

    expect(error.kind).toBe("MalformedNumber");
    expect(error.pos).toEqual({ line: 1, column: 5, offset: 4 });
  });

  it("should decode escapes in strings", () => {
    const tokens = new Lexer(String.raw`"a\n\t\x41\u{1F600}\""`).scanTokens();

    expect(tokens[0].type).toBe(TokenType.String);
    expect(tokens[0].literal).toBe('a\n\tA\u{1F600}"');
  });

  it("should scan char literals", () => {
    const tokens = new Lexer(String.raw`'x' '\'' '😀'`).scanTokens();

    expect(tokens.slice(0, 3).map((t) => [t.type, t.literal])).toEqual([
      [TokenType.Char, "x"],
      [TokenType.Char, "'"],
      [TokenType.Char, "😀"],
    ]);
  });

  it("should skip nested block comments and line comments", () => {
    const tokens = new Lexer("/* a /* b */ c */ 42 // done\n7").scanTokens();

    expect(tokens.map((t) => t.literal)).toEqual([42n, 7n, undefined]);
  });

  it("should tell keywords, identifiers and the wildcard apart", () => {
    const tokens = new Lexer("loop until _ _x switch").scanTokens();

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Loop,
      TokenType.Until,
      TokenType.Underscore,
      TokenType.Identifier,
      TokenType.Switch,
      TokenType.EOF,
    ]);
  });

  it("should accept the magnitude of the smallest integer", () => {
    const tokens = new Lexer("9223372036854775808").scanTokens();

    expect(tokens[0].literal).toBe(9223372036854775808n);
  });

  describe("errors", () => {
    it("should report an unterminated string at the opening quote", () => {
      const error = lexError('let s = "abc');

      expect(error.kind).toBe("UnterminatedString");
      expect(error.pos).toEqual({ line: 1, column: 9, offset: 8 });
    });

    it("should report an invalid escape at the backslash", () => {
      const error = lexError(String.raw`"a\q"`);

      expect(error.kind).toBe("InvalidEscape");
      expect(error.pos).toEqual({ line: 1, column: 3, offset: 2 });
    });

    it("should reject escapes of surrogate code points", () => {
      const error = lexError(String.raw`"\u{D800}"`);

      expect(error.kind).toBe("InvalidEscape");
      expect(error.message).toBe("Expect '\\u{...}' with a valid code point.");
      expect(error.pos).toEqual({ line: 1, column: 2, offset: 1 });
      expect(lexError(String.raw`'\u{DFFF}'`).kind).toBe("InvalidEscape");
    });

    it("should reject chars holding more than one character", () => {
      const error = lexError("'ab'");

      expect(error.kind).toBe("MalformedChar");
      expect(error.pos.column).toBe(1);
    });

    it("should report an unterminated char", () => {
      expect(lexError("'a").kind).toBe("UnterminatedChar");
    });

    it("should report an unterminated block comment at its start", () => {
      const error = lexError("1 /* open /* nested */");

      expect(error.kind).toBe("UnterminatedComment");
      expect(error.pos).toEqual({ line: 1, column: 3, offset: 2 });
    });

    it("should reject letters after a number", () => {
      expect(lexError("12abc").kind).toBe("MalformedNumber");
    });

    it("should reject integers that do not fit in 64 bits", () => {
      expect(lexError("9223372036854775809").kind).toBe("MalformedNumber");
    });

    it("should reject a radix prefix without digits", () => {
      expect(lexError("0x").kind).toBe("MalformedNumber");
    });

    it("should report unexpected characters where they occur", () => {
      const error = lexError("a\n  @");

      expect(error.kind).toBe("UnexpectedCharacter");
      expect(error.pos).toEqual({ line: 2, column: 3, offset: 4 });
    });
  });
});
