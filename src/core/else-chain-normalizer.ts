/**
 * Else-Chain Normalizer
 *
 * `if a {…} else if b {…}` 中的 `if b` 没有外层语句块，无法在它之前插入多条语句。
 * 这里把源码改写为 `if a {…} else { if b {…} }`，并返回一个新的合成语句块，
 * 供遍历器像普通语句块一样进入；原语法树保持不变。
 */

import type { BlockStmt, IfStmt, Node } from "../go/ast";
import type { EditBuffer } from "./edit-buffer";
import { throwInjectorError } from "./error-handler";
import { NOT_FOUND, findKeyword } from "./text-locator";

const ELSE = "else";

function describeNode(node: Node): string {
  return node.kind === "Opaque" ? node.label : node.kind;
}

/**
 * 返回 else 分支对应的语句块；else-if 链会被改写并包裹为合成块
 */
export function normalizeElseChain(stmt: IfStmt, alternative: Node, edits: EditBuffer): BlockStmt {
  if (alternative.kind === "BlockStmt") {
    return alternative;
  }
  if (alternative.kind !== "IfStmt") {
    throwInjectorError("STRUCT002", [describeNode(alternative), alternative.start], {
      offset: alternative.start,
    });
  }

  const elseOffset = findKeyword(edits.source, stmt.body.end, ELSE);
  if (elseOffset === NOT_FOUND) {
    throwInjectorError("STRUCT001", [ELSE, stmt.body.end], {
      offset: stmt.body.end,
      keyword: ELSE,
    });
  }

  const lbrace = elseOffset + ELSE.length;
  edits.insert(lbrace, "{");
  edits.insert(alternative.end, "}");

  return {
    kind: "BlockStmt",
    start: lbrace,
    end: alternative.end,
    list: [alternative],
    synthetic: true,
  };
}
