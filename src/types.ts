import type { InjectorError } from "./core/error-handler";

/**
 * 注入选项
 */
export interface InjectOptions {
  /** 写入注入消息的文件名，默认 "<input>"；transformFile 使用实际路径 */
  fileName?: string;
  /** 每个命中位置在运行时注入错误的概率（0-100） */
  errorPercent?: number;
  /** 注入时是否打印 "injected error at file:line" */
  trace?: boolean;
}

/**
 * 一个被注入的 guard 语句
 */
export interface InjectionSite {
  /** guard 语句所在行（1 起） */
  line: number;
  /** guard 语句起始字节偏移 */
  offset: number;
  operator: "==" | "!=";
}

export interface InjectionOutput {
  code: Buffer;
  sites: InjectionSite[];
  /** false 表示格式化失败，code 为未格式化的改写结果 */
  formatted: boolean;
  formatError?: InjectorError;
}

/**
 * transformFile 的结果；error 存在时不产生任何输出
 */
export interface TransformResult {
  filePath: string;
  code?: Buffer;
  sites: InjectionSite[];
  formatted: boolean;
  formatError?: InjectorError;
  error?: InjectorError;
}
