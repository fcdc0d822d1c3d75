/**
 * Edit Buffer
 * 只插入不删除的文本补丁：所有位置都以原始字节偏移记录，
 * 输出时统一排序拼接，先前的插入不会影响之后记录的偏移。
 */
import type { Edit, Position } from "./types";
import { throwInjectorError } from "./error-handler";

export class EditBuffer {
  private readonly original: Buffer;
  private readonly pending: Edit[] = [];

  constructor(original: Buffer) {
    this.original = original;
  }

  get length(): number {
    return this.original.length;
  }

  get source(): Buffer {
    return this.original;
  }

  /**
   * 在原始偏移 position 处的字节之前插入 text
   */
  insert(position: Position, text: string): void {
    if (!Number.isInteger(position) || position < 0 || position > this.original.length) {
      throwInjectorError("STRUCT003", [position, this.original.length], { offset: position });
    }
    this.pending.push({ position, text, seq: this.pending.length });
  }

  /** 按记录顺序返回全部插入 */
  edits(): readonly Edit[] {
    return [...this.pending];
  }

  /**
   * 生成最终字节：按位置排序，同一位置按记录顺序
   */
  materialize(): Buffer {
    if (!this.pending.length) return Buffer.from(this.original);

    const ordered = [...this.pending].sort((a, b) => a.position - b.position || a.seq - b.seq);
    const parts: Buffer[] = [];
    let cursor = 0;
    for (const edit of ordered) {
      if (edit.position > cursor) {
        parts.push(this.original.subarray(cursor, edit.position));
        cursor = edit.position;
      }
      parts.push(Buffer.from(edit.text, "utf8"));
    }
    parts.push(this.original.subarray(cursor));
    return Buffer.concat(parts);
  }
}
