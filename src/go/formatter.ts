/**
 * Go source formatter
 * 先重新解析（语法无效时抛出 GoSyntaxError），再按 token 重新排版：
 * 制表符缩进、语句块大括号独占行、行内空白折叠为单个空格、最多保留一个空行。
 */

import { inspect } from "./ast";
import type { File } from "./ast";
import { isAutoSemicolon, tokenize } from "./lexer";
import { parseGoFile } from "./parser";
import { SourceFile } from "./source";
import { Token, TokenKind, isKeyword } from "./tokens";

const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS = new Set([")", "]", "}"]);

interface BlockLayout {
  /** 语句块 '{' 偏移 -> '}' 偏移 */
  opens: Map<number, number>;
  /** 语句块 '}' 偏移 -> '{' 偏移 */
  closes: Map<number, number>;
  /** 需要回退一级缩进的行首偏移（case/default 子句、标签） */
  outdents: Set<number>;
}

function collectLayout(file: File): BlockLayout {
  const layout: BlockLayout = { opens: new Map(), closes: new Map(), outdents: new Set() };
  inspect(file, (node) => {
    if (node.kind === "BlockStmt" && !node.synthetic) {
      layout.opens.set(node.start, node.end - 1);
      layout.closes.set(node.end - 1, node.start);
    } else if (
      node.kind === "Opaque" &&
      (node.label === "CaseClause" || node.label === "CommClause" || node.label === "LabeledStmt")
    ) {
      layout.outdents.add(node.start);
    }
  });
  return layout;
}

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === "\n") count++;
  }
  return count;
}

function isBracket(tok: Token, set: Set<string>): boolean {
  return tok.kind === TokenKind.Operator && set.has(tok.value);
}

/**
 * 格式化 Go 源码，返回规范化后的字节
 */
export function formatGoSource(content: Buffer, fileName = "<input>"): Buffer {
  const source = new SourceFile(fileName, content);
  const layout = collectLayout(parseGoFile(source));
  const tokens = tokenize(source, { keepComments: true }).filter(
    (tok) => tok.kind !== TokenKind.Eof && !isAutoSemicolon(tok)
  );

  let out = "";
  // 每个未闭合括号所在行的缩进层级
  const openIndents: number[] = [];
  let lineIndent = 0;
  // 上一个 token 是紧跟块 { 的同行注释, 下一个 token 仍需换行
  let breakAfterComment = false;

  tokens.forEach((tok, index) => {
    const prev = index > 0 ? tokens[index - 1] : undefined;

    if (prev) {
      const gap = source.text(prev.end, tok.start);
      let newlines = countNewlines(gap);

      const prevClose = layout.opens.get(prev.start);
      const sameLineComment = tok.kind === TokenKind.Comment && newlines === 0;
      if ((prevClose !== undefined && tok.start !== prevClose && !sameLineComment) || breakAfterComment) {
        newlines = Math.max(newlines, 1);
      }
      breakAfterComment = prevClose !== undefined && tok.start !== prevClose && sameLineComment;
      const tokOpen = layout.closes.get(tok.start);
      if (tokOpen !== undefined && prev.start !== tokOpen) {
        newlines = Math.max(newlines, 1);
      }
      if (isKeyword(tok, "else")) {
        newlines = 0;
      }

      if (newlines > 0) {
        lineIndent = indentFor(tok, openIndents, layout);
        out += "\n".repeat(Math.min(newlines, 2)) + "\t".repeat(lineIndent);
      } else if (gap.length > 0 || layout.opens.has(tok.start)) {
        out += " ";
      }
    } else {
      lineIndent = 0;
    }

    out += tok.value;

    if (isBracket(tok, OPENERS)) {
      openIndents.push(lineIndent);
    } else if (isBracket(tok, CLOSERS)) {
      openIndents.pop();
    }
  });

  return Buffer.from(out + "\n", "utf8");
}

function indentFor(tok: Token, openIndents: number[], layout: BlockLayout): number {
  const top = openIndents.length ? openIndents[openIndents.length - 1] : -1;
  let indent = isBracket(tok, CLOSERS) ? Math.max(top, 0) : top + 1;
  if (layout.outdents.has(tok.start)) {
    indent = Math.max(indent - 1, 0);
  }
  return indent;
}
