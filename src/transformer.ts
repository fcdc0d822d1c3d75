/**
 * 文件层
 * 同步读取源文件、调用核心处理器，以及打开和写入输出目标
 */

import fs from "fs";
import type { InjectOptions, TransformResult } from "./types";
import { InjectionProcessor } from "./core/processor";
import { normalizeConfig } from "./core/config-normalizer";
import { createInjectorError, enhanceError, throwInjectorError } from "./core/error-handler";

/**
 * 处理内存中的源码；失败时抛出 FaultInjectionError
 */
export function transformCode(code: Buffer | string, fileName: string, options: InjectOptions = {}) {
  const content = typeof code === "string" ? Buffer.from(code, "utf8") : code;
  return new InjectionProcessor().process(content, { ...options, fileName });
}

/**
 * 处理单个文件；不抛出异常，致命错误通过 error 返回且不带 code
 */
export function transformFile(filePath: string, options: InjectOptions = {}): TransformResult {
  // 配置错误优先于文件错误报告
  try {
    normalizeConfig(options);
  } catch (error) {
    return { filePath, sites: [], formatted: false, error: enhanceError(error, filePath) };
  }

  let content: Buffer;
  try {
    content = fs.readFileSync(filePath);
  } catch (error) {
    const original = error instanceof Error ? error : new Error(String(error));
    return {
      filePath,
      sites: [],
      formatted: false,
      error: createInjectorError("FILE001", [`${filePath}: ${original.message}`], {
        filePath,
        originalError: original,
      }),
    };
  }

  try {
    const output = transformCode(content, filePath, options);
    return { filePath, ...output };
  } catch (error) {
    return { filePath, sites: [], formatted: false, error: enhanceError(error, filePath) };
  }
}

export interface OutputTarget {
  write(content: Buffer): void;
  close(): void;
}

/**
 * 打开输出目标；未指定路径时写到标准输出。打开失败抛出 FILE002
 */
export function openOutput(outputPath?: string): OutputTarget {
  if (!outputPath) {
    return {
      write: (content) => {
        process.stdout.write(content);
      },
      close: () => {},
    };
  }

  let fd: number;
  try {
    fd = fs.openSync(outputPath, "w");
  } catch (error) {
    const original = error instanceof Error ? error : new Error(String(error));
    throwInjectorError("FILE002", [`${outputPath}: ${original.message}`], {
      filePath: outputPath,
      originalError: original,
    });
  }

  return {
    write: (content) => {
      try {
        let written = 0;
        while (written < content.length) {
          written += fs.writeSync(fd, content, written);
        }
      } catch (error) {
        const original = error instanceof Error ? error : new Error(String(error));
        throwInjectorError("FILE003", [`${outputPath}: ${original.message}`], {
          filePath: outputPath,
          originalError: original,
        });
      }
    },
    close: () => fs.closeSync(fd),
  };
}
