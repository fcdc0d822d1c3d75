/**
 * 核心改写引擎相关类型定义
 */

/** 原始源码中的字节偏移（0 起） */
export type Position = number;

/**
 * 一次插入：在原始偏移 position 处的字节之前插入 text
 */
export interface Edit {
  position: Position;
  text: string;
  /** 记录顺序，同一位置的插入按此顺序输出 */
  seq: number;
}
