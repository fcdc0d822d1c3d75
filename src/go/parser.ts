/**
 * Go Parser
 *
 * 递归下降解析器。语句语法完整覆盖；结构体、接口、参数列表与类型参数列表
 * 不可能包含语句，按括号配对整体跳过。
 */

import type { BlockStmt, File, Ident, IfStmt, Node, OpaqueNode } from "./ast";
import { opaque } from "./ast";
import { isAutoSemicolon, tokenize } from "./lexer";
import { GoSyntaxError, SourceFile } from "./source";
import {
  ASSIGN_OPERATORS,
  BINARY_PRECEDENCE,
  Token,
  TokenKind,
  isKeyword,
  isOperator,
} from "./tokens";

const UNARY_OPERATORS = new Set(["+", "-", "!", "^", "*", "&", "~"]);
const TYPE_KEYWORDS = new Set(["func", "map", "chan", "struct", "interface"]);
const LITERAL_KINDS = new Set([TokenKind.Int, TokenKind.Float, TokenKind.Imag, TokenKind.Char, TokenKind.String]);

export class Parser {
  private source: SourceFile;
  private tokens: Token[];
  private pos = 0;
  // < 0: 处于控制语句头部，裸类型名后的 '{' 属于语句块而非复合字面量
  private exprLev = 0;

  constructor(source: SourceFile) {
    this.source = source;
    this.tokens = tokenize(source);
  }

  parseFile(): File {
    this.expectKeyword("package");
    const packageName = this.parseIdent();
    this.expectSemi();

    const decls: Node[] = [];
    while (!this.atEnd()) {
      decls.push(this.parseTopLevelDecl());
    }

    return {
      kind: "File",
      start: 0,
      end: this.source.content.length,
      packageName,
      decls,
    };
  }

  // ===========================================================================
  // Token navigation
  // ===========================================================================

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private peekAt(n: number): Token {
    return this.tokens[Math.min(this.pos + n, this.tokens.length - 1)];
  }

  private advance(): Token {
    const tok = this.tokens[this.pos];
    if (tok.kind !== TokenKind.Eof) this.pos++;
    return tok;
  }

  private atEnd(): boolean {
    return this.peek().kind === TokenKind.Eof;
  }

  private isOp(value: string): boolean {
    return isOperator(this.peek(), value);
  }

  private isKw(value: string): boolean {
    return isKeyword(this.peek(), value);
  }

  private isSemi(): boolean {
    return this.peek().kind === TokenKind.Semicolon;
  }

  private expectOp(value: string): Token {
    if (!this.isOp(value)) {
      throw this.error(`expected '${value}', found ${this.describe(this.peek())}`);
    }
    return this.advance();
  }

  private expectKeyword(value: string): Token {
    if (!this.isKw(value)) {
      throw this.error(`expected '${value}', found ${this.describe(this.peek())}`);
    }
    return this.advance();
  }

  /** Go 允许在 ')' 与 '}' 前省略分号 */
  private expectSemi(): void {
    if (this.isSemi()) {
      this.advance();
      return;
    }
    if (this.isOp(")") || this.isOp("}") || this.atEnd()) {
      return;
    }
    throw this.error(`expected ';', found ${this.describe(this.peek())}`);
  }

  private error(message: string, tok: Token = this.peek()): GoSyntaxError {
    return new GoSyntaxError(this.source, tok.start, message);
  }

  private describe(tok: Token): string {
    if (tok.kind === TokenKind.Eof) return "EOF";
    if (isAutoSemicolon(tok)) return "newline";
    return `'${tok.value}'`;
  }

  private parseIdent(): Ident {
    const tok = this.peek();
    if (tok.kind !== TokenKind.Ident) {
      throw this.error(`expected identifier, found ${this.describe(tok)}`);
    }
    this.advance();
    return { kind: "Ident", name: tok.value, start: tok.start, end: tok.end };
  }

  /**
   * 跳过一对配对括号（含嵌套），返回覆盖整段的节点
   */
  private skipBalanced(label: string, open: string, close: string): OpaqueNode {
    const first = this.expectOp(open);
    let depth = 1;
    while (depth > 0) {
      const tok = this.advance();
      if (tok.kind === TokenKind.Eof) {
        throw this.error(`expected '${close}', found EOF`, tok);
      }
      if (isOperator(tok, open)) depth++;
      if (isOperator(tok, close)) depth--;
      if (depth === 0) {
        return opaque(label, first.start, tok.end);
      }
    }
    throw this.error(`expected '${close}'`);
  }

  // ===========================================================================
  // Declarations
  // ===========================================================================

  private parseTopLevelDecl(): Node {
    const tok = this.peek();
    let decl: Node;
    if (isKeyword(tok, "func")) {
      decl = this.parseFuncDecl();
    } else if (
      isKeyword(tok, "import") ||
      isKeyword(tok, "const") ||
      isKeyword(tok, "var") ||
      isKeyword(tok, "type")
    ) {
      decl = this.parseGenDecl();
    } else {
      throw this.error(`non-declaration statement outside function body, found ${this.describe(tok)}`);
    }
    this.expectSemi();
    return decl;
  }

  private parseGenDecl(): OpaqueNode {
    const keyword = this.advance();
    const specs: Node[] = [];
    let end: number;

    if (this.isOp("(")) {
      this.advance();
      while (!this.isOp(")") && !this.atEnd()) {
        specs.push(this.parseSpec(keyword.value));
        this.expectSemi();
      }
      end = this.expectOp(")").end;
    } else {
      const spec = this.parseSpec(keyword.value);
      specs.push(spec);
      end = spec.end;
    }

    return opaque("GenDecl", keyword.start, end, specs);
  }

  private parseSpec(keyword: string): Node {
    const start = this.peek().start;

    if (keyword === "import") {
      const children: Node[] = [];
      if (this.peek().kind === TokenKind.Ident) {
        children.push(this.parseIdent());
      } else if (this.isOp(".")) {
        this.advance();
      }
      const path = this.peek();
      if (path.kind !== TokenKind.String) {
        throw this.error(`expected import path, found ${this.describe(path)}`);
      }
      this.advance();
      return opaque("ImportSpec", start, path.end, children);
    }

    if (keyword === "type") {
      const children: Node[] = [this.parseIdent()];
      if (this.isOp("[") && this.looksLikeTypeParams()) {
        children.push(this.skipBalanced("TypeParams", "[", "]"));
      }
      if (this.isOp("=")) this.advance();
      const type = this.parseType();
      children.push(type);
      return opaque("TypeSpec", start, type.end, children);
    }

    // var / const
    const children: Node[] = [this.parseIdent()];
    while (this.isOp(",")) {
      this.advance();
      children.push(this.parseIdent());
    }
    if (!this.isOp("=") && !this.isSemi() && !this.isOp(")")) {
      children.push(this.parseType());
    }
    if (this.isOp("=")) {
      this.advance();
      children.push(...this.parseExprList());
    }
    return opaque("ValueSpec", start, children[children.length - 1].end, children);
  }

  /** `type A[T any] ...` 与数组类型 `type A [N]int` 的区分 */
  private looksLikeTypeParams(): boolean {
    const first = this.peekAt(1);
    const second = this.peekAt(2);
    if (first.kind !== TokenKind.Ident) return false;
    return (
      second.kind === TokenKind.Ident ||
      isOperator(second, ",") ||
      isOperator(second, "~") ||
      (second.kind === TokenKind.Keyword && TYPE_KEYWORDS.has(second.value))
    );
  }

  private parseFuncDecl(): OpaqueNode {
    const funcTok = this.expectKeyword("func");
    const children: Node[] = [];

    if (this.isOp("(")) {
      children.push(this.skipBalanced("Receiver", "(", ")"));
    }
    children.push(this.parseIdent());
    if (this.isOp("[")) {
      children.push(this.skipBalanced("TypeParams", "[", "]"));
    }
    const signature = this.parseSignature(funcTok.start);
    children.push(signature);

    let end = signature.end;
    if (this.isOp("{")) {
      const body = this.parseBlock();
      children.push(body);
      end = body.end;
    }
    return opaque("FuncDecl", funcTok.start, end, children);
  }

  private parseSignature(start: number): OpaqueNode {
    const params = this.skipBalanced("Params", "(", ")");
    let end = params.end;
    if (this.isOp("(")) {
      end = this.skipBalanced("Results", "(", ")").end;
    } else if (this.startsType(this.peek())) {
      end = this.parseType().end;
    }
    return opaque("FuncType", start, end);
  }

  private startsType(tok: Token): boolean {
    if (tok.kind === TokenKind.Ident) return true;
    if (tok.kind === TokenKind.Keyword) return TYPE_KEYWORDS.has(tok.value);
    return (
      isOperator(tok, "*") ||
      isOperator(tok, "[") ||
      isOperator(tok, "(") ||
      isOperator(tok, "<-")
    );
  }

  // ===========================================================================
  // Types
  // ===========================================================================

  private parseType(): Node {
    const tok = this.peek();

    if (tok.kind === TokenKind.Ident) {
      let type: Node = this.parseIdent();
      if (this.isOp(".")) {
        this.advance();
        const sel = this.parseIdent();
        type = opaque("SelectorExpr", tok.start, sel.end, [type, sel]);
      }
      if (this.isOp("[")) {
        this.advance();
        this.exprLev++;
        const args: Node[] = [type, this.parseType()];
        while (this.isOp(",")) {
          this.advance();
          args.push(this.parseType());
        }
        this.exprLev--;
        const close = this.expectOp("]");
        type = opaque("IndexExpr", tok.start, close.end, args);
      }
      return type;
    }

    if (isOperator(tok, "*")) {
      this.advance();
      const elem = this.parseType();
      return opaque("StarExpr", tok.start, elem.end, [elem]);
    }

    if (isOperator(tok, "(")) {
      this.advance();
      const inner = this.parseType();
      const close = this.expectOp(")");
      return opaque("ParenExpr", tok.start, close.end, [inner]);
    }

    if (isOperator(tok, "[")) {
      this.advance();
      if (this.isOp("]")) {
        this.advance();
        const elem = this.parseType();
        return opaque("SliceType", tok.start, elem.end, [elem]);
      }
      const children: Node[] = [];
      if (this.isOp("...")) {
        this.advance();
      } else {
        this.exprLev++;
        children.push(this.parseExpr());
        this.exprLev--;
      }
      this.expectOp("]");
      const elem = this.parseType();
      children.push(elem);
      return opaque("ArrayType", tok.start, elem.end, children);
    }

    if (isOperator(tok, "<-")) {
      this.advance();
      this.expectKeyword("chan");
      const elem = this.parseType();
      return opaque("ChanType", tok.start, elem.end, [elem]);
    }

    if (tok.kind === TokenKind.Keyword) {
      switch (tok.value) {
        case "map": {
          this.advance();
          this.expectOp("[");
          const key = this.parseType();
          this.expectOp("]");
          const value = this.parseType();
          return opaque("MapType", tok.start, value.end, [key, value]);
        }
        case "chan": {
          this.advance();
          if (this.isOp("<-")) this.advance();
          const elem = this.parseType();
          return opaque("ChanType", tok.start, elem.end, [elem]);
        }
        case "func":
          this.advance();
          return this.parseSignature(tok.start);
        case "struct": {
          this.advance();
          const body = this.skipBalanced("Fields", "{", "}");
          return opaque("StructType", tok.start, body.end);
        }
        case "interface": {
          this.advance();
          const body = this.skipBalanced("Methods", "{", "}");
          return opaque("InterfaceType", tok.start, body.end);
        }
      }
    }

    throw this.error(`expected type, found ${this.describe(tok)}`);
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  private parseExprList(): Node[] {
    const list = [this.parseExpr()];
    while (this.isOp(",")) {
      this.advance();
      list.push(this.parseExpr());
    }
    return list;
  }

  private parseExpr(): Node {
    return this.parseBinary(1);
  }

  private parseBinary(minPrec: number): Node {
    let x = this.parseUnary();
    while (true) {
      const tok = this.peek();
      const prec = tok.kind === TokenKind.Operator ? BINARY_PRECEDENCE.get(tok.value) : undefined;
      if (prec === undefined || prec < minPrec) {
        return x;
      }
      this.advance();
      const y = this.parseBinary(prec + 1);
      x = { kind: "BinaryExpr", x, op: tok.value, y, start: x.start, end: y.end };
    }
  }

  private parseUnary(): Node {
    const tok = this.peek();
    if (tok.kind === TokenKind.Operator && UNARY_OPERATORS.has(tok.value)) {
      this.advance();
      const x = this.parseUnary();
      return opaque("UnaryExpr", tok.start, x.end, [x]);
    }
    if (isOperator(tok, "<-")) {
      if (isKeyword(this.peekAt(1), "chan")) {
        return this.parseType();
      }
      this.advance();
      const x = this.parseUnary();
      return opaque("UnaryExpr", tok.start, x.end, [x]);
    }
    return this.parsePrimaryExpr();
  }

  private parsePrimaryExpr(): Node {
    let x = this.parseOperand();
    while (true) {
      if (this.isOp(".")) {
        this.advance();
        if (this.isOp("(")) {
          this.advance();
          if (this.isKw("type")) {
            this.advance();
            const close = this.expectOp(")");
            x = opaque("TypeSwitchGuard", x.start, close.end, [x]);
          } else {
            const type = this.parseType();
            const close = this.expectOp(")");
            x = opaque("TypeAssertExpr", x.start, close.end, [x, type]);
          }
        } else {
          const sel = this.parseIdent();
          x = opaque("SelectorExpr", x.start, sel.end, [x, sel]);
        }
      } else if (this.isOp("[")) {
        x = this.parseIndexOrSlice(x);
      } else if (this.isOp("(")) {
        x = this.parseCall(x);
      } else if (this.isOp("{") && this.isCompositeLiteralType(x)) {
        const body = this.parseLiteralValue();
        x = opaque("CompositeLit", x.start, body.end, [x, body]);
      } else {
        return x;
      }
    }
  }

  private isCompositeLiteralType(x: Node): boolean {
    if (x.kind === "Ident") return this.exprLev >= 0;
    if (x.kind !== "Opaque") return false;
    switch (x.label) {
      case "SelectorExpr":
      case "IndexExpr":
        return this.exprLev >= 0;
      case "ArrayType":
      case "SliceType":
      case "StructType":
      case "MapType":
        return true;
      default:
        return false;
    }
  }

  private parseOperand(): Node {
    const tok = this.peek();

    if (tok.kind === TokenKind.Ident) {
      return this.parseIdent();
    }
    if (LITERAL_KINDS.has(tok.kind)) {
      this.advance();
      return opaque("BasicLit", tok.start, tok.end);
    }
    if (isOperator(tok, "(")) {
      this.advance();
      this.exprLev++;
      const inner = this.parseExpr();
      this.exprLev--;
      const close = this.expectOp(")");
      return opaque("ParenExpr", tok.start, close.end, [inner]);
    }
    if (isKeyword(tok, "func")) {
      this.advance();
      const type = this.parseSignature(tok.start);
      if (this.isOp("{")) {
        const body = this.parseBlock();
        return { kind: "FuncLit", type, body, start: tok.start, end: body.end };
      }
      return type;
    }
    if (isOperator(tok, "[") || (tok.kind === TokenKind.Keyword && TYPE_KEYWORDS.has(tok.value))) {
      return this.parseType();
    }

    throw this.error(`expected operand, found ${this.describe(tok)}`);
  }

  private parseIndexOrSlice(x: Node): Node {
    this.advance();
    this.exprLev++;
    const children: Node[] = [x];
    while (!this.isOp("]") && !this.atEnd()) {
      if (this.isOp(":") || this.isOp(",")) {
        this.advance();
        continue;
      }
      children.push(this.parseExpr());
    }
    this.exprLev--;
    const close = this.expectOp("]");
    return opaque("IndexExpr", x.start, close.end, children);
  }

  private parseCall(fun: Node): Node {
    this.advance();
    this.exprLev++;
    const children: Node[] = [fun];
    while (!this.isOp(")") && !this.atEnd()) {
      children.push(this.parseExpr());
      if (this.isOp("...")) this.advance();
      if (!this.isOp(",")) break;
      this.advance();
    }
    this.exprLev--;
    const close = this.expectOp(")");
    return opaque("CallExpr", fun.start, close.end, children);
  }

  private parseLiteralValue(): OpaqueNode {
    const open = this.expectOp("{");
    this.exprLev++;
    const elements: Node[] = [];
    while (!this.isOp("}") && !this.atEnd()) {
      elements.push(this.parseElement());
      if (!this.isOp(",")) break;
      this.advance();
    }
    this.exprLev--;
    const close = this.expectOp("}");
    return opaque("LiteralValue", open.start, close.end, elements);
  }

  private parseElement(): Node {
    const key = this.isOp("{") ? this.parseLiteralValue() : this.parseExpr();
    if (!this.isOp(":")) return key;
    this.advance();
    const value = this.isOp("{") ? this.parseLiteralValue() : this.parseExpr();
    return opaque("KeyValueExpr", key.start, value.end, [key, value]);
  }

  // ===========================================================================
  // Statements
  // ===========================================================================

  private parseBlock(): BlockStmt {
    const open = this.expectOp("{");
    const saved = this.exprLev;
    this.exprLev = 0;
    const list = this.parseStmtList();
    this.exprLev = saved;
    const close = this.expectOp("}");
    return { kind: "BlockStmt", start: open.start, end: close.end, list };
  }

  private parseStmtList(): Node[] {
    const list: Node[] = [];
    while (!this.isOp("}") && !this.atEnd() && !this.isKw("case") && !this.isKw("default")) {
      const stmt = this.parseStmt();
      if (stmt) list.push(stmt);
    }
    return list;
  }

  private parseStmt(): Node | undefined {
    const tok = this.peek();

    if (tok.kind === TokenKind.Semicolon) {
      // 空语句
      this.advance();
      return undefined;
    }

    if (isOperator(tok, "{")) {
      const block = this.parseBlock();
      this.expectSemi();
      return block;
    }

    if (tok.kind === TokenKind.Ident && isOperator(this.peekAt(1), ":")) {
      const label = this.parseIdent();
      const colon = this.advance();
      const stmt = this.isOp("}") ? undefined : this.parseStmt();
      return opaque("LabeledStmt", label.start, stmt ? stmt.end : colon.end, stmt ? [label, stmt] : [label]);
    }

    if (tok.kind === TokenKind.Keyword && !TYPE_KEYWORDS.has(tok.value)) {
      const stmt = this.parseKeywordStmt(tok);
      this.expectSemi();
      return stmt;
    }

    const stmt = this.parseSimpleStmt(false);
    this.expectSemi();
    return stmt;
  }

  private parseKeywordStmt(tok: Token): Node {
    switch (tok.value) {
      case "var":
      case "const":
      case "type": {
        const decl = this.parseGenDecl();
        return opaque("DeclStmt", decl.start, decl.end, [decl]);
      }
      case "go":
      case "defer": {
        this.advance();
        const call = this.parseExpr();
        return opaque(tok.value === "go" ? "GoStmt" : "DeferStmt", tok.start, call.end, [call]);
      }
      case "return": {
        this.advance();
        const results = this.isSemi() || this.isOp("}") ? [] : this.parseExprList();
        const end = results.length ? results[results.length - 1].end : tok.end;
        return opaque("ReturnStmt", tok.start, end, results);
      }
      case "break":
      case "continue":
      case "goto": {
        this.advance();
        if (this.peek().kind === TokenKind.Ident) {
          const label = this.parseIdent();
          return opaque("BranchStmt", tok.start, label.end, [label]);
        }
        return opaque("BranchStmt", tok.start, tok.end);
      }
      case "fallthrough":
        this.advance();
        return opaque("BranchStmt", tok.start, tok.end);
      case "if":
        return this.parseIfStmt();
      case "for":
        return this.parseForStmt();
      case "switch":
        return this.parseSwitchStmt();
      case "select": {
        this.advance();
        const body = this.parseCaseBody(true);
        return opaque("SelectStmt", tok.start, body.end, [body]);
      }
    }
    throw this.error(`unexpected ${this.describe(tok)}, expected statement`, tok);
  }

  private parseSimpleStmt(rangeOk: boolean): Node {
    if (rangeOk && this.isKw("range")) {
      const range = this.advance();
      const x = this.parseExpr();
      return opaque("RangeClause", range.start, x.end, [x]);
    }

    const lhs = this.parseExprList();
    const first = lhs[0];
    const tok = this.peek();

    if (tok.kind === TokenKind.Operator && ASSIGN_OPERATORS.has(tok.value)) {
      this.advance();
      if (rangeOk && this.isKw("range") && (tok.value === "=" || tok.value === ":=")) {
        this.advance();
        const x = this.parseExpr();
        return opaque("RangeClause", first.start, x.end, [...lhs, x]);
      }
      const rhs = this.parseExprList();
      const label = tok.value === ":=" ? "DefineStmt" : "AssignStmt";
      return opaque(label, first.start, rhs[rhs.length - 1].end, [...lhs, ...rhs]);
    }

    if (lhs.length > 1) {
      throw this.error(`expected 1 expression, found ${lhs.length}`, tok);
    }

    if (isOperator(tok, "++") || isOperator(tok, "--")) {
      this.advance();
      return opaque("IncDecStmt", first.start, tok.end, [first]);
    }

    if (isOperator(tok, "<-")) {
      this.advance();
      const value = this.parseExpr();
      return opaque("SendStmt", first.start, value.end, [first, value]);
    }

    return opaque("ExprStmt", first.start, first.end, [first]);
  }

  private conditionOf(stmt: Node): Node {
    if (stmt.kind === "Opaque" && stmt.label === "ExprStmt") {
      return stmt.children[0];
    }
    throw this.error("expected boolean expression, found simple statement", this.tokenAt(stmt.start));
  }

  private tokenAt(offset: number): Token {
    return this.tokens.find((tok) => tok.start === offset) ?? this.peek();
  }

  private parseIfStmt(): IfStmt {
    const ifTok = this.expectKeyword("if");
    const saved = this.exprLev;
    this.exprLev = -1;

    let init: Node | undefined;
    let cond: Node;
    if (this.isSemi()) {
      this.advance();
      cond = this.conditionOf(this.parseSimpleStmt(false));
    } else {
      const stmt = this.parseSimpleStmt(false);
      if (this.isSemi()) {
        const semi = this.advance();
        if (isAutoSemicolon(semi)) {
          throw this.error("missing condition in if statement", semi);
        }
        init = stmt;
        cond = this.conditionOf(this.parseSimpleStmt(false));
      } else {
        cond = this.conditionOf(stmt);
      }
    }
    this.exprLev = saved;

    const body = this.parseBlock();
    let alternative: Node | undefined;
    if (this.isKw("else")) {
      this.advance();
      if (this.isKw("if")) {
        alternative = this.parseIfStmt();
      } else if (this.isOp("{")) {
        alternative = this.parseBlock();
      } else {
        throw this.error("else must be followed by if or statement block");
      }
    }

    return {
      kind: "IfStmt",
      start: ifTok.start,
      end: (alternative ?? body).end,
      init,
      cond,
      body,
      else: alternative,
    };
  }

  private parseForStmt(): OpaqueNode {
    const forTok = this.expectKeyword("for");
    const saved = this.exprLev;
    this.exprLev = -1;

    const children: Node[] = [];
    if (!this.isOp("{")) {
      let first: Node | undefined;
      if (!this.isSemi()) {
        first = this.parseSimpleStmt(true);
        children.push(first);
      }
      const isRange = first !== undefined && first.kind === "Opaque" && first.label === "RangeClause";
      if (!isRange && this.isSemi()) {
        this.advance();
        if (!this.isSemi()) {
          children.push(this.parseSimpleStmt(false));
        }
        if (!this.isSemi()) {
          throw this.error(`expected ';', found ${this.describe(this.peek())}`);
        }
        this.advance();
        if (!this.isOp("{")) {
          children.push(this.parseSimpleStmt(false));
        }
      }
    }
    this.exprLev = saved;

    const body = this.parseBlock();
    children.push(body);
    return opaque("ForStmt", forTok.start, body.end, children);
  }

  private parseSwitchStmt(): OpaqueNode {
    const switchTok = this.expectKeyword("switch");
    const saved = this.exprLev;
    this.exprLev = -1;

    const children: Node[] = [];
    if (!this.isOp("{")) {
      let first: Node | undefined;
      if (!this.isSemi()) {
        first = this.parseSimpleStmt(false);
      }
      if (this.isSemi()) {
        this.advance();
        if (first) children.push(first);
        if (!this.isOp("{")) {
          children.push(this.parseSimpleStmt(false));
        }
      } else if (first) {
        children.push(first);
      }
    }
    this.exprLev = saved;

    const body = this.parseCaseBody(false);
    children.push(body);
    return opaque("SwitchStmt", switchTok.start, body.end, children);
  }

  private parseCaseBody(comm: boolean): BlockStmt {
    const open = this.expectOp("{");
    const saved = this.exprLev;
    this.exprLev = 0;
    const clauses: Node[] = [];
    while (this.isKw("case") || this.isKw("default")) {
      clauses.push(this.parseCaseClause(comm));
    }
    this.exprLev = saved;
    const close = this.expectOp("}");
    return { kind: "BlockStmt", start: open.start, end: close.end, list: clauses };
  }

  private parseCaseClause(comm: boolean): OpaqueNode {
    const keyword = this.advance();
    const children: Node[] = [];
    if (keyword.value === "case") {
      if (comm) {
        children.push(this.parseSimpleStmt(false));
      } else {
        children.push(...this.parseExprList());
      }
    }
    const colon = this.expectOp(":");
    const stmts = this.parseStmtList();
    children.push(...stmts);
    const end = stmts.length ? stmts[stmts.length - 1].end : colon.end;
    return opaque(comm ? "CommClause" : "CaseClause", keyword.start, end, children);
  }
}

/**
 * 解析一个完整的 Go 源文件；语法错误抛出 GoSyntaxError
 */
export function parseGoFile(source: SourceFile): File {
  return new Parser(source).parseFile();
}
