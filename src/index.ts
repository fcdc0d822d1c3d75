import { transformCode, transformFile } from "./transformer";

// 导出核心模块
export { InjectionProcessor, injectFaults } from "./core/processor";
export { EditBuffer } from "./core/edit-buffer";
export { findKeyword, NOT_FOUND } from "./core/text-locator";
export { GuardVisitor, matchGuard } from "./core/guard-visitor";
export { normalizeElseChain } from "./core/else-chain-normalizer";
export { emit } from "./core/emitter";
export type { EmitResult, Formatter } from "./core/emitter";
export {
  normalizeConfig,
  errorDenominator,
  CONFIG_DEFAULTS,
} from "./core/config-normalizer";
export type { NormalizedInjectOptions } from "./core/config-normalizer";

// 导出错误处理系统
export {
  createInjectorError,
  enhanceError,
  formatError,
  logError,
  ErrorCategory,
  ErrorSeverity,
  FaultInjectionError,
} from "./core/error-handler";
export type { InjectorError } from "./core/error-handler";

// Go 解析与格式化
export { parseGoFile } from "./go/parser";
export { formatGoSource } from "./go/formatter";
export { SourceFile, GoSyntaxError } from "./go/source";

export type { InjectOptions, InjectionSite, InjectionOutput, TransformResult } from "./types";
export { transformCode, transformFile };

export default transformFile;
