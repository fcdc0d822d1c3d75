/**
 * Source file handling
 * 基于字节偏移的行号表，所有位置均为 UTF-8 字节偏移
 */

export interface SourcePosition {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed byte column */
  column: number;
  /** 0-indexed byte offset */
  offset: number;
}

export class SourceFile {
  readonly name: string;
  readonly content: Buffer;
  private lineStarts: number[];

  constructor(name: string, content: Buffer) {
    this.name = name;
    this.content = content;
    this.lineStarts = this.computeLineStarts();
  }

  private computeLineStarts(): number[] {
    const starts = [0];
    for (let i = 0; i < this.content.length; i++) {
      if (this.content[i] === 0x0a) {
        starts.push(i + 1);
      }
    }
    return starts;
  }

  positionAt(offset: number): SourcePosition {
    if (offset < 0) offset = 0;
    if (offset > this.content.length) offset = this.content.length;

    // 二分查找所在行
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return {
      line: low + 1,
      column: offset - this.lineStarts[low] + 1,
      offset,
    };
  }

  lineAt(offset: number): number {
    return this.positionAt(offset).line;
  }

  text(start: number, end: number): string {
    return this.content.toString("utf8", start, end);
  }
}

/**
 * 词法或语法错误，消息格式与 go/scanner 一致: file:line:col: msg
 */
export class GoSyntaxError extends Error {
  readonly fileName: string;
  readonly line: number;
  readonly column: number;
  readonly offset: number;
  readonly reason: string;

  constructor(source: SourceFile, offset: number, reason: string) {
    const pos = source.positionAt(offset);
    super(`${source.name}:${pos.line}:${pos.column}: ${reason}`);
    this.name = "GoSyntaxError";
    this.fileName = source.name;
    this.line = pos.line;
    this.column = pos.column;
    this.offset = pos.offset;
    this.reason = reason;
  }
}
