/**
 * Go 语法树
 *
 * 只对注入引擎需要检查的节点建模；其余语法结构统一表示为 OpaqueNode，
 * 保留标签与按源码顺序排列的子节点，供遍历时统一递归。
 */

export interface BaseNode {
  /** 起始字节偏移 */
  start: number;
  /** 结束字节偏移（不含） */
  end: number;
}

export interface Ident extends BaseNode {
  kind: "Ident";
  name: string;
}

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  x: Node;
  op: string;
  y: Node;
}

export interface FuncLit extends BaseNode {
  kind: "FuncLit";
  type: Node;
  body: BlockStmt;
}

export interface BlockStmt extends BaseNode {
  kind: "BlockStmt";
  list: Node[];
  /** 由 else 链规范化生成，源码中不存在对应的大括号 */
  synthetic?: boolean;
}

export interface IfStmt extends BaseNode {
  kind: "IfStmt";
  init?: Node;
  cond: Node;
  body: BlockStmt;
  else?: Node;
}

export interface OpaqueNode extends BaseNode {
  kind: "Opaque";
  label: string;
  children: Node[];
}

export interface File extends BaseNode {
  kind: "File";
  packageName: Ident;
  decls: Node[];
}

export type Node = Ident | BinaryExpr | FuncLit | BlockStmt | IfStmt | OpaqueNode | File;

export function opaque(label: string, start: number, end: number, children: Node[] = []): OpaqueNode {
  return { kind: "Opaque", label, start, end, children };
}

/**
 * 按源码顺序返回直接子节点
 */
export function childrenOf(node: Node): Node[] {
  switch (node.kind) {
    case "Ident":
      return [];
    case "BinaryExpr":
      return [node.x, node.y];
    case "FuncLit":
      return [node.type, node.body];
    case "BlockStmt":
      return node.list;
    case "IfStmt": {
      const out: Node[] = [];
      if (node.init) out.push(node.init);
      out.push(node.cond, node.body);
      if (node.else) out.push(node.else);
      return out;
    }
    case "Opaque":
      return node.children;
    case "File":
      return [node.packageName, ...node.decls];
  }
}

/**
 * 先序遍历；回调返回 false 时不再进入该节点的子节点
 */
export function inspect(node: Node, visit: (node: Node) => boolean | void): void {
  if (visit(node) === false) return;
  for (const child of childrenOf(node)) {
    inspect(child, visit);
  }
}
