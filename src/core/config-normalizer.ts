/**
 * 配置规范化模块
 * 统一处理注入选项，保证引擎拿到的配置每一项都有确定的值
 */

import type { InjectOptions } from "../types";
import { throwInjectorError } from "./error-handler";

/**
 * 默认值常量 - 集中定义所有默认值
 */
export const CONFIG_DEFAULTS = {
  // 每个命中的 guard 在运行时注入错误的概率（百分比）
  ERROR_PERCENT: 1,
  // 注入时是否打印跟踪信息
  TRACE: true,

  // 只匹配这一种约定写法: if err != nil / if err == nil
  ERROR_IDENT: "err",
  NIL_IDENT: "nil",

  // 注入代码使用的别名导入，避免与用户代码中的同名包冲突
  RAND_PACKAGE_PATH: "math/rand",
  RAND_PACKAGE_NAME: "_guardfault_rand_",
  FMT_PACKAGE_PATH: "fmt",
  FMT_PACKAGE_NAME: "_guardfault_fmt_",
} as const;

/**
 * 规范化的注入选项 - 所有配置项都有确定的值
 */
export interface NormalizedInjectOptions {
  fileName: string;
  errorPercent: number;
  /** 由 errorPercent 推导出的取模分母，始终 >= 1 */
  denominator: number;
  trace: boolean;
}

/**
 * 百分比 -> 取模分母：5% 对应 rand.Int()%20 == 0
 */
export function errorDenominator(percent: number): number {
  const denominator = Number.isFinite(percent) ? Math.trunc(100 / percent) : 0;
  if (!Number.isFinite(denominator) || denominator <= 0) {
    throwInjectorError("CONFIG001", [String(percent)]);
  }
  return denominator;
}

export function normalizeConfig(options: InjectOptions = {}): NormalizedInjectOptions {
  const errorPercent = options.errorPercent ?? CONFIG_DEFAULTS.ERROR_PERCENT;
  return {
    fileName: options.fileName ?? "<input>",
    errorPercent,
    denominator: errorDenominator(errorPercent),
    trace: options.trace ?? CONFIG_DEFAULTS.TRACE,
  };
}
