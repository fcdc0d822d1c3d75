/**
 * Emitter
 * 应用全部插入、追加引用声明并格式化；格式化失败时返回未格式化结果并单独报告
 */

import { formatGoSource } from "../go/formatter";
import { GoSyntaxError } from "../go/source";
import type { EditBuffer } from "./edit-buffer";
import { InjectorError, createInjectorError } from "./error-handler";
import { renderReferenceDecls } from "./injection-template";

export type Formatter = (content: Buffer, fileName: string) => Buffer;

export interface EmitResult {
  code: Buffer;
  formatted: boolean;
  formatError?: InjectorError;
}

export function emit(edits: EditBuffer, fileName: string, format: Formatter = formatGoSource): EmitResult {
  const raw = Buffer.concat([edits.materialize(), Buffer.from(renderReferenceDecls(), "utf8")]);

  try {
    return { code: format(raw, fileName), formatted: true };
  } catch (error) {
    if (!(error instanceof GoSyntaxError)) throw error;
    return {
      code: raw,
      formatted: false,
      formatError: createInjectorError("FORMAT001", [error.message], {
        filePath: fileName,
        originalError: error,
      }),
    };
  }
}
