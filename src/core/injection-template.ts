/**
 * 注入模板
 * 每个命中位置生成的 Go 代码片段，以及让别名导入保持被引用的声明
 */

import { CONFIG_DEFAULTS, NormalizedInjectOptions } from "./config-normalizer";

const RAND = CONFIG_DEFAULTS.RAND_PACKAGE_NAME;
const FMT = CONFIG_DEFAULTS.FMT_PACKAGE_NAME;

/** Go 解释型字符串字面量；JSON 的转义序列都是合法的 Go 转义 */
export function goQuote(text: string): string {
  return JSON.stringify(text);
}

export function injectionMessage(fileName: string, line: number): string {
  return `injected error at ${fileName}:${line}`;
}

/**
 * 插入到 guard 语句之前的代码块
 */
export function renderInjection(line: number, config: NormalizedInjectOptions): string {
  const message = injectionMessage(config.fileName, line);
  const lines = [`if ${RAND}.Int()%${config.denominator} == 0 {`];
  if (config.trace) {
    lines.push(`\t${FMT}.Println(${goQuote(message)})`);
  }
  // Errorf 的格式串中 % 需要转义
  lines.push(`\t${CONFIG_DEFAULTS.ERROR_IDENT} = ${FMT}.Errorf(${goQuote(message.replace(/%/g, "%%"))})`);
  lines.push("}");
  return lines.join("\n") + "\n";
}

/**
 * 紧跟在 package 名之后插入的别名导入
 */
export function renderImportHeader(): string {
  return (
    `\nimport ${RAND} ${goQuote(CONFIG_DEFAULTS.RAND_PACKAGE_PATH)}` +
    `\nimport ${FMT} ${goQuote(CONFIG_DEFAULTS.FMT_PACKAGE_PATH)}\n`
  );
}

/**
 * 追加到文件末尾、无副作用的引用，避免 "imported and not used"
 */
export function renderReferenceDecls(): string {
  return `\nvar _ = ${RAND}.Int\nvar _ = ${FMT}.Println\n`;
}
