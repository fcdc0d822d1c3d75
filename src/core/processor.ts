/**
 * 核心处理器
 * read → parse → 遍历登记插入 → 输出并格式化，一次调用处理一个源文件
 */

import { parseGoFile } from "../go/parser";
import { GoSyntaxError, SourceFile } from "../go/source";
import type { File } from "../go/ast";
import type { InjectOptions, InjectionOutput } from "../types";
import { normalizeConfig } from "./config-normalizer";
import { EditBuffer } from "./edit-buffer";
import { Formatter, emit } from "./emitter";
import { FaultInjectionError, enhanceError } from "./error-handler";
import { GuardVisitor } from "./guard-visitor";
import { renderImportHeader } from "./injection-template";

export class InjectionProcessor {
  private readonly format?: Formatter;

  constructor(format?: Formatter) {
    this.format = format;
  }

  /**
   * 解析失败、结构假设被破坏或配置无效时抛出 FaultInjectionError；
   * 格式化失败不抛出，而是通过 formatted/formatError 返回
   */
  process(content: Buffer, options: InjectOptions = {}): InjectionOutput {
    const config = normalizeConfig(options);
    const source = new SourceFile(config.fileName, content);
    const file = this.parse(source);

    const edits = new EditBuffer(content);
    edits.insert(file.packageName.end, renderImportHeader());

    const sites = new GuardVisitor(source, edits, config).walk(file);
    const result = emit(edits, config.fileName, this.format);

    return { ...result, sites };
  }

  private parse(source: SourceFile): File {
    try {
      return parseGoFile(source);
    } catch (error) {
      if (error instanceof GoSyntaxError) {
        throw new FaultInjectionError(enhanceError(error, source.name));
      }
      throw error;
    }
  }
}

export function injectFaults(content: Buffer | string, options: InjectOptions = {}): InjectionOutput {
  const bytes = typeof content === "string" ? Buffer.from(content, "utf8") : content;
  return new InjectionProcessor().process(bytes, options);
}
