/**
 * Go 词法单元定义
 */

export enum TokenKind {
  Ident = "Ident",
  Keyword = "Keyword",
  Int = "Int",
  Float = "Float",
  Imag = "Imag",
  Char = "Char",
  String = "String",
  Operator = "Operator",
  Semicolon = "Semicolon",
  Comment = "Comment",
  Eof = "Eof",
}

export interface Token {
  kind: TokenKind;
  /** 原始文本；自动插入的分号为 "\n" */
  value: string;
  /** 起始字节偏移 */
  start: number;
  /** 结束字节偏移（不含） */
  end: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  "break",
  "case",
  "chan",
  "const",
  "continue",
  "default",
  "defer",
  "else",
  "fallthrough",
  "for",
  "func",
  "go",
  "goto",
  "if",
  "import",
  "interface",
  "map",
  "package",
  "range",
  "return",
  "select",
  "struct",
  "switch",
  "type",
  "var",
]);

// 最长匹配优先
export const OPERATORS: readonly string[] = [
  "<<=",
  ">>=",
  "&^=",
  "...",
  "&&",
  "||",
  "<-",
  "++",
  "--",
  "==",
  "!=",
  "<=",
  ">=",
  ":=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "<<",
  ">>",
  "&^",
  "+",
  "-",
  "*",
  "/",
  "%",
  "&",
  "|",
  "^",
  "<",
  ">",
  "=",
  "!",
  "~",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
  ",",
  ".",
  ":",
];

export const BINARY_PRECEDENCE: ReadonlyMap<string, number> = new Map([
  ["||", 1],
  ["&&", 2],
  ["==", 3],
  ["!=", 3],
  ["<", 3],
  ["<=", 3],
  [">", 3],
  [">=", 3],
  ["+", 4],
  ["-", 4],
  ["|", 4],
  ["^", 4],
  ["*", 5],
  ["/", 5],
  ["%", 5],
  ["<<", 5],
  [">>", 5],
  ["&", 5],
  ["&^", 5],
]);

export const ASSIGN_OPERATORS: ReadonlySet<string> = new Set([
  "=",
  ":=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "<<=",
  ">>=",
  "&^=",
]);

export function isKeyword(token: Token, value: string): boolean {
  return token.kind === TokenKind.Keyword && token.value === value;
}

export function isOperator(token: Token, value: string): boolean {
  return token.kind === TokenKind.Operator && token.value === value;
}
