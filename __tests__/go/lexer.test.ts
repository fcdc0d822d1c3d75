import { describe, expect, test } from "vitest";
import { isAutoSemicolon, tokenize } from "../../src/go/lexer";
import { GoSyntaxError, SourceFile } from "../../src/go/source";
import { TokenKind } from "../../src/go/tokens";

const lex = (text: string, keepComments = false) =>
  tokenize(new SourceFile("t.go", Buffer.from(text)), { keepComments }).map((tok) => [
    tok.kind,
    tok.value,
    tok.start,
    tok.end,
  ]);

function syntaxError(text: string): GoSyntaxError | undefined {
  try {
    tokenize(new SourceFile("t.go", Buffer.from(text)));
  } catch (error) {
    if (error instanceof GoSyntaxError) return error;
    throw error;
  }
  return undefined;
}

describe("Go lexer", () => {
  test("scans a short statement with byte offsets", () => {
    expect(lex("x := 1\n")).toEqual([
      [TokenKind.Ident, "x", 0, 1],
      [TokenKind.Operator, ":=", 2, 4],
      [TokenKind.Int, "1", 5, 6],
      [TokenKind.Semicolon, "\n", 6, 6],
      [TokenKind.Eof, "", 7, 7],
    ]);
  });

  test("inserts semicolons after return and closing braces", () => {
    expect(lex("return\n}")).toEqual([
      [TokenKind.Keyword, "return", 0, 6],
      [TokenKind.Semicolon, "\n", 6, 6],
      [TokenKind.Operator, "}", 7, 8],
      [TokenKind.Semicolon, "\n", 8, 8],
      [TokenKind.Eof, "", 8, 8],
    ]);
  });

  test("no semicolon after an operator at end of line", () => {
    expect(lex("a +\nb").map(([kind, value]) => `${kind}:${JSON.stringify(value)}`)).toEqual([
      'Ident:"a"',
      'Operator:"+"',
      'Ident:"b"',
      'Semicolon:"\\n"',
      'Eof:""',
    ]);
  });

  test("explicit semicolons are not automatic", () => {
    const tokens = tokenize(new SourceFile("t.go", Buffer.from("a; b")));
    expect(tokens[1].value).toBe(";");
    expect(isAutoSemicolon(tokens[1])).toBe(false);
    expect(isAutoSemicolon(tokens[3])).toBe(true);
  });

  test("a line comment ends the line", () => {
    expect(lex("a // c\nb", true)).toEqual([
      [TokenKind.Ident, "a", 0, 1],
      [TokenKind.Semicolon, "\n", 2, 2],
      [TokenKind.Comment, "// c", 2, 6],
      [TokenKind.Ident, "b", 7, 8],
      [TokenKind.Semicolon, "\n", 8, 8],
      [TokenKind.Eof, "", 8, 8],
    ]);
  });

  test("single-line block comments are dropped without a semicolon", () => {
    expect(lex("a /* c */ b").map(([kind]) => kind)).toEqual([
      TokenKind.Ident,
      TokenKind.Ident,
      TokenKind.Semicolon,
      TokenKind.Eof,
    ]);
  });

  test("classifies literals", () => {
    expect(lex("1.5 0x1F 2i 'a' \"s\\\"q\" `raw\nline`").slice(0, 6).map(([kind, value]) => [kind, value])).toEqual([
      [TokenKind.Float, "1.5"],
      [TokenKind.Int, "0x1F"],
      [TokenKind.Imag, "2i"],
      [TokenKind.Char, "'a'"],
      [TokenKind.String, '"s\\"q"'],
      [TokenKind.String, "`raw\nline`"],
    ]);
  });

  test("keywords and longest operator match", () => {
    expect(lex("if x &^= y").map(([kind, value]) => [kind, value]).slice(0, 4)).toEqual([
      [TokenKind.Keyword, "if"],
      [TokenKind.Ident, "x"],
      [TokenKind.Operator, "&^="],
      [TokenKind.Ident, "y"],
    ]);
  });

  test("reports an unterminated string with its position", () => {
    const error = syntaxError('x := "abc\n');
    expect(error?.message).toBe("t.go:1:6: string literal not terminated");
    expect(error?.offset).toBe(5);
  });

  test("reports invalid characters", () => {
    expect(syntaxError("x @")?.message).toBe('t.go:1:3: invalid character "@"');
  });

  test("reports unterminated comments", () => {
    expect(syntaxError("\n/* x")?.message).toBe("t.go:2:1: comment not terminated");
  });
});
