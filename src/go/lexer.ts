/**
 * Go Lexer
 *
 * 按字节扫描 Go 源码，产出带字节偏移的 token 流，并按 Go 规则自动插入分号。
 */

import { GoSyntaxError, SourceFile } from "./source";
import { KEYWORDS, OPERATORS, Token, TokenKind } from "./tokens";

export interface LexerOptions {
  /** 是否保留注释 token（格式化器需要） */
  keepComments?: boolean;
}

const SEMI_AFTER_KEYWORDS = new Set(["break", "continue", "fallthrough", "return"]);
const SEMI_AFTER_OPERATORS = new Set([")", "]", "}", "++", "--"]);

const CH_NEWLINE = 0x0a;
const CH_SLASH = 0x2f;
const CH_STAR = 0x2a;
const CH_BACKSLASH = 0x5c;
const CH_DOT = 0x2e;

function isLetter(ch: number): boolean {
  return (
    (ch >= 0x61 && ch <= 0x7a) ||
    (ch >= 0x41 && ch <= 0x5a) ||
    ch === 0x5f ||
    ch >= 0x80
  );
}

function isDigit(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x39;
}

function isSpace(ch: number): boolean {
  return ch === 0x20 || ch === 0x09 || ch === 0x0d;
}

export class Lexer {
  private source: SourceFile;
  private bytes: Buffer;
  private pos = 0;
  private insertSemi = false;
  private tokens: Token[] = [];
  private keepComments: boolean;

  constructor(source: SourceFile, options: LexerOptions = {}) {
    this.source = source;
    this.bytes = source.content;
    this.keepComments = options.keepComments ?? false;
  }

  tokenize(): Token[] {
    while (true) {
      while (this.pos < this.bytes.length && isSpace(this.bytes[this.pos])) {
        this.pos++;
      }

      if (this.pos >= this.bytes.length) {
        this.autoSemicolon(this.pos);
        this.push(TokenKind.Eof, this.pos, this.pos, "");
        return this.tokens;
      }

      const ch = this.bytes[this.pos];
      if (ch === CH_NEWLINE) {
        this.autoSemicolon(this.pos);
        this.pos++;
        continue;
      }

      if (ch === CH_SLASH && this.bytes[this.pos + 1] === CH_SLASH) {
        this.scanLineComment();
        continue;
      }
      if (ch === CH_SLASH && this.bytes[this.pos + 1] === CH_STAR) {
        this.scanBlockComment();
        continue;
      }

      this.scanToken(ch);
    }
  }

  // ===== Token scanning =====

  private scanToken(ch: number): void {
    const start = this.pos;

    if (isLetter(ch)) {
      while (this.pos < this.bytes.length && (isLetter(this.bytes[this.pos]) || isDigit(this.bytes[this.pos]))) {
        this.pos++;
      }
      const word = this.source.text(start, this.pos);
      if (KEYWORDS.has(word)) {
        this.push(TokenKind.Keyword, start, this.pos, word);
        this.insertSemi = SEMI_AFTER_KEYWORDS.has(word);
      } else {
        this.push(TokenKind.Ident, start, this.pos, word);
        this.insertSemi = true;
      }
      return;
    }

    if (isDigit(ch) || (ch === CH_DOT && isDigit(this.bytes[this.pos + 1] ?? 0))) {
      this.scanNumber(start);
      return;
    }

    switch (ch) {
      case 0x22: // "
        this.scanQuoted(start, 0x22, TokenKind.String, "string literal not terminated");
        return;
      case 0x27: // '
        this.scanQuoted(start, 0x27, TokenKind.Char, "rune literal not terminated");
        return;
      case 0x60: // `
        this.scanRawString(start);
        return;
      case 0x3b: // ;
        this.pos++;
        this.push(TokenKind.Semicolon, start, this.pos, ";");
        this.insertSemi = false;
        return;
    }

    for (const op of OPERATORS) {
      if (this.matchesAt(op)) {
        this.pos += op.length;
        this.push(TokenKind.Operator, start, this.pos, op);
        this.insertSemi = SEMI_AFTER_OPERATORS.has(op);
        return;
      }
    }

    throw new GoSyntaxError(this.source, start, `invalid character ${JSON.stringify(String.fromCharCode(ch))}`);
  }

  private scanNumber(start: number): void {
    let kind = TokenKind.Int;
    let hex = false;
    if (this.bytes[this.pos] === 0x30) {
      const prefix = this.bytes[this.pos + 1];
      if (prefix === 0x78 || prefix === 0x58) {
        hex = true;
        this.pos += 2;
      }
    }

    while (this.pos < this.bytes.length) {
      const c = this.bytes[this.pos];
      const exponent = hex ? c === 0x70 || c === 0x50 : c === 0x65 || c === 0x45;
      if (exponent) {
        kind = TokenKind.Float;
        this.pos++;
        const sign = this.bytes[this.pos];
        if (sign === 0x2b || sign === 0x2d) this.pos++;
        continue;
      }
      if (c === CH_DOT) {
        // `x[1:]...` 之类不会出现；遇到 "..." 则停止
        if (this.bytes[this.pos + 1] === CH_DOT) break;
        kind = TokenKind.Float;
        this.pos++;
        continue;
      }
      if (isLetter(c) || isDigit(c)) {
        this.pos++;
        continue;
      }
      break;
    }

    if (this.bytes[this.pos - 1] === 0x69 && !hex) {
      kind = TokenKind.Imag;
    }
    this.push(kind, start, this.pos, this.source.text(start, this.pos));
    this.insertSemi = true;
  }

  private scanQuoted(start: number, quote: number, kind: TokenKind, unterminated: string): void {
    this.pos++;
    while (true) {
      if (this.pos >= this.bytes.length || this.bytes[this.pos] === CH_NEWLINE) {
        throw new GoSyntaxError(this.source, start, unterminated);
      }
      const c = this.bytes[this.pos];
      if (c === CH_BACKSLASH) {
        this.pos += 2;
        continue;
      }
      this.pos++;
      if (c === quote) break;
    }
    this.push(kind, start, this.pos, this.source.text(start, this.pos));
    this.insertSemi = true;
  }

  private scanRawString(start: number): void {
    const close = this.bytes.indexOf(0x60, start + 1);
    if (close < 0) {
      throw new GoSyntaxError(this.source, start, "raw string literal not terminated");
    }
    this.pos = close + 1;
    this.push(TokenKind.String, start, this.pos, this.source.text(start, this.pos));
    this.insertSemi = true;
  }

  private scanLineComment(): void {
    const start = this.pos;
    const newline = this.bytes.indexOf(CH_NEWLINE, start);
    this.pos = newline < 0 ? this.bytes.length : newline;
    // 行注释相当于换行
    this.autoSemicolon(start);
    if (this.keepComments) {
      this.push(TokenKind.Comment, start, this.pos, this.source.text(start, this.pos));
    }
  }

  private scanBlockComment(): void {
    const start = this.pos;
    const close = this.bytes.indexOf("*/", start + 2);
    if (close < 0) {
      throw new GoSyntaxError(this.source, start, "comment not terminated");
    }
    this.pos = close + 2;
    if (this.bytes.subarray(start, this.pos).includes(CH_NEWLINE)) {
      this.autoSemicolon(start);
    }
    if (this.keepComments) {
      this.push(TokenKind.Comment, start, this.pos, this.source.text(start, this.pos));
    }
  }

  // ===== Helpers =====

  private autoSemicolon(at: number): void {
    if (this.insertSemi) {
      this.push(TokenKind.Semicolon, at, at, "\n");
      this.insertSemi = false;
    }
  }

  private matchesAt(text: string): boolean {
    for (let i = 0; i < text.length; i++) {
      if (this.bytes[this.pos + i] !== text.charCodeAt(i)) return false;
    }
    return true;
  }

  private push(kind: TokenKind, start: number, end: number, value: string): void {
    this.tokens.push({ kind, value, start, end });
  }
}

export function tokenize(source: SourceFile, options: LexerOptions = {}): Token[] {
  return new Lexer(source, options).tokenize();
}

export function isAutoSemicolon(token: Token): boolean {
  return token.kind === TokenKind.Semicolon && token.value === "\n";
}
