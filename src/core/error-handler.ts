/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

import { GoSyntaxError } from "../go/source";

// 错误类别枚举
export enum ErrorCategory {
  CONFIG = "CONFIG", // 配置错误
  PARSING = "PARSING", // 解析错误
  STRUCTURE = "STRUCTURE", // 结构假设被破坏（内部一致性错误）
  FORMATTING = "FORMATTING", // 改写后格式化失败
  FILE_OPERATION = "FILE_OPERATION", // 文件操作错误
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  ERROR = "ERROR", // 错误，输出仍会写出，但本次运行视为失败
  FATAL = "FATAL", // 致命错误，中断整个处理流程且不产生输出
}

// 统一错误接口
export interface InjectorError {
  code: string; // 错误代码，例如 CONFIG001
  category: ErrorCategory;
  message: string;
  details?: string;
  filePath?: string;
  line?: number;
  column?: number;
  offset?: number; // 出错的字节偏移
  keyword?: string; // 未找到的语法标记
  severity: ErrorSeverity;
  suggestion?: string;
  originalError?: Error;
}

interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

const errorDefinitions: Record<string, ErrorDefinition> = {
  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "invalid error percent: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "use a percentage greater than 0 and at most 100",
  },

  PARSING001: {
    code: "PARSING001",
    category: ErrorCategory.PARSING,
    messageTemplate: "failed to parse Go source: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "make sure the file compiles with the Go toolchain before injecting faults",
  },

  STRUCT001: {
    code: "STRUCT001",
    category: ErrorCategory.STRUCTURE,
    messageTemplate: "structural assumption violated: keyword '{0}' not found after offset {1}",
    severity: ErrorSeverity.FATAL,
  },
  STRUCT002: {
    code: "STRUCT002",
    category: ErrorCategory.STRUCTURE,
    messageTemplate: "structural assumption violated: unexpected {0} as else branch at offset {1}",
    severity: ErrorSeverity.FATAL,
  },
  STRUCT003: {
    code: "STRUCT003",
    category: ErrorCategory.STRUCTURE,
    messageTemplate: "structural assumption violated: edit offset {0} outside source of {1} bytes",
    severity: ErrorSeverity.FATAL,
  },

  FORMAT001: {
    code: "FORMAT001",
    category: ErrorCategory.FORMATTING,
    messageTemplate: "code formatting failed with Go parse error: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "the unformatted output was written for inspection",
  },

  FILE001: {
    code: "FILE001",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "failed to read file: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "check that the file exists and is readable",
  },
  FILE002: {
    code: "FILE002",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "failed to create output file: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "check that the target directory exists and is writable",
  },
  FILE003: {
    code: "FILE003",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "failed to write output: {0}",
    severity: ErrorSeverity.FATAL,
  },

  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "unknown error: {0}",
    severity: ErrorSeverity.FATAL,
  },
};

/**
 * 创建格式化的错误对象
 */
export function createInjectorError(
  errorCode: string,
  params: Array<string | number> = [],
  options: {
    filePath?: string;
    line?: number;
    column?: number;
    offset?: number;
    keyword?: string;
    originalError?: Error;
  } = {}
): InjectorError {
  const definition = errorDefinitions[errorCode] || errorDefinitions.GENERAL001;

  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate || "";

  params.forEach((param, index) => {
    message = message.replace(`{${index}}`, String(param));
    suggestion = suggestion.replace(`{${index}}`, String(param));
  });

  let line = options.line;
  let column = options.column;

  if (options.originalError && !line && !column) {
    // file.go:12:5: msg
    const goMatch = options.originalError.message.match(/:(\d+):(\d+):/);
    if (goMatch) {
      line = parseInt(goMatch[1], 10);
      column = parseInt(goMatch[2], 10);
    }
  }

  return {
    code: definition.code,
    category: definition.category,
    message,
    details: options.originalError ? options.originalError.message : undefined,
    filePath: options.filePath,
    line,
    column,
    offset: options.offset,
    keyword: options.keyword,
    severity: definition.severity,
    suggestion: suggestion || undefined,
    originalError: options.originalError,
  };
}

/**
 * 携带 InjectorError 的异常，用于沿正常的错误传播路径中止一次运行
 */
export class FaultInjectionError extends Error {
  readonly info: InjectorError;

  constructor(info: InjectorError) {
    super(`[${info.code}] ${info.message}`);
    this.name = "FaultInjectionError";
    this.info = info;
  }

  get code(): string {
    return this.info.code;
  }
}

export function throwInjectorError(...args: Parameters<typeof createInjectorError>): never {
  throw new FaultInjectionError(createInjectorError(...args));
}

/**
 * 格式化错误为用户可读的消息
 */
export function formatError(error: InjectorError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\n  file: ${error.filePath}`;
    if (error.line) {
      formattedMessage += `:${error.line}`;
      if (error.column) {
        formattedMessage += `:${error.column}`;
      }
    }
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n  details: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n  hint: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误（stderr）
 */
export function logError(error: InjectorError): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    console.warn(formattedError);
  } else {
    console.error(formattedError);
  }
}

/**
 * 将任意异常归类为 InjectorError
 */
export function enhanceError(error: unknown, filePath?: string): InjectorError {
  if (error instanceof FaultInjectionError) {
    return error.info.filePath || !filePath ? error.info : { ...error.info, filePath };
  }

  if (error instanceof GoSyntaxError) {
    return createInjectorError("PARSING001", [error.message], {
      filePath: filePath ?? error.fileName,
      line: error.line,
      column: error.column,
      offset: error.offset,
      originalError: error,
    });
  }

  const original = error instanceof Error ? error : new Error(String(error));
  const errorMessage = original.message;

  if (errorMessage.includes("ENOENT") || errorMessage.includes("EACCES") || errorMessage.includes("EISDIR")) {
    return createInjectorError("FILE001", [filePath || errorMessage], {
      filePath,
      originalError: original,
    });
  }

  return createInjectorError("GENERAL001", [errorMessage], {
    filePath,
    originalError: original,
  });
}
