/**
 * Guard Visitor
 *
 * 先序遍历语法树，找出形如 `if err != nil` / `if err == nil`（无初始化语句）的 guard，
 * 在语句起始处登记注入代码；else-if 链交给 normalizeElseChain 处理后继续遍历。
 */

import type { Node, IfStmt } from "../go/ast";
import { childrenOf } from "../go/ast";
import type { SourceFile } from "../go/source";
import type { InjectionSite } from "../types";
import { CONFIG_DEFAULTS, NormalizedInjectOptions } from "./config-normalizer";
import type { EditBuffer } from "./edit-buffer";
import { normalizeElseChain } from "./else-chain-normalizer";
import { renderInjection } from "./injection-template";

/**
 * guard 形态判定：无初始化语句，条件恰为 err ==/!= nil
 */
export function matchGuard(stmt: IfStmt): "==" | "!=" | undefined {
  if (stmt.init) return undefined;
  const cond = stmt.cond;
  if (cond.kind !== "BinaryExpr") return undefined;
  if (cond.op !== "==" && cond.op !== "!=") return undefined;
  if (cond.x.kind !== "Ident" || cond.x.name !== CONFIG_DEFAULTS.ERROR_IDENT) return undefined;
  if (cond.y.kind !== "Ident" || cond.y.name !== CONFIG_DEFAULTS.NIL_IDENT) return undefined;
  return cond.op;
}

export class GuardVisitor {
  private readonly sites: InjectionSite[] = [];

  constructor(
    private readonly source: SourceFile,
    private readonly edits: EditBuffer,
    private readonly config: NormalizedInjectOptions
  ) {}

  /**
   * 遍历整棵树，返回按源码顺序排列的注入位置
   */
  walk(root: Node): InjectionSite[] {
    this.visit(root);
    return [...this.sites];
  }

  private visit(node: Node): void {
    if (node.kind === "IfStmt") {
      this.visitIf(node);
      return;
    }
    for (const child of childrenOf(node)) {
      this.visit(child);
    }
  }

  private visitIf(stmt: IfStmt): void {
    if (stmt.init) {
      this.visit(stmt.init);
    }

    const operator = matchGuard(stmt);
    if (operator) {
      const line = this.source.lineAt(stmt.start);
      this.edits.insert(stmt.start, renderInjection(line, this.config));
      this.sites.push({ line, offset: stmt.start, operator });
    }

    this.visit(stmt.cond);
    this.visit(stmt.body);

    if (stmt.else) {
      this.visit(normalizeElseChain(stmt, stmt.else, this.edits));
    }
  }
}
