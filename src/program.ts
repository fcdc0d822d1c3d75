import { Command } from 'commander';
import { transformFile, openOutput, OutputTarget } from './transformer';
import { CONFIG_DEFAULTS } from './core/config-normalizer';
import { FaultInjectionError, logError } from './core/error-handler';

export interface CliOptions {
  output?: string;
  errorPercent: number;
  trace: boolean;
  verbose?: boolean;
}

export type CliAction = (file: string, options: CliOptions) => number;

/**
 * 执行一次注入并返回进程退出码
 */
export function runInjection(file: string, options: CliOptions): number {
  const result = transformFile(file, {
    errorPercent: options.errorPercent,
    trace: options.trace,
  });

  if (result.error || !result.code) {
    if (result.error) logError(result.error);
    return 1;
  }

  let target: OutputTarget;
  try {
    target = openOutput(options.output);
  } catch (error) {
    if (!(error instanceof FaultInjectionError)) throw error;
    logError(error.info);
    return 1;
  }

  try {
    target.write(result.code);
  } catch (error) {
    if (!(error instanceof FaultInjectionError)) throw error;
    logError(error.info);
    return 1;
  } finally {
    target.close();
  }

  if (options.verbose) {
    for (const site of result.sites) {
      console.error(`guardfault: ${file}:${site.line}: injected before err ${site.operator} nil`);
    }
    console.error(`guardfault: ${result.sites.length} site(s) in ${file}`);
  }

  if (result.formatError) {
    // 未格式化的输出已写出，但本次运行视为失败
    logError(result.formatError);
    return 1;
  }
  return 0;
}

const LONG_FLAGS = ['output', 'error-percent', 'no-trace', 'verbose', 'help', 'version'];

// 带值的短选项, Go flag 允许写成 -o=out.go
const SHORT_VALUE_FLAGS: Record<string, string> = { o: 'output', e: 'error-percent' };

/**
 * 兼容 Go flag 风格的单横线长选项: -error-percent 5 / -output=out.go / -o=out.go
 */
export function normalizeFlagStyle(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      out.push(...argv.slice(i));
      break;
    }
    const short = /^-([a-z])=(.*)$/.exec(arg);
    if (short && short[1] in SHORT_VALUE_FLAGS) {
      out.push(`--${SHORT_VALUE_FLAGS[short[1]]}=${short[2]}`);
      continue;
    }
    const match = /^-([a-z][a-z-]+)(=.*)?$/.exec(arg);
    out.push(match && LONG_FLAGS.includes(match[1]) ? `-${arg}` : arg);
  }
  return out;
}

export function createProgram(action: CliAction = runInjection): Command {
  const program = new Command();

  program
    .name('guardfault')
    .description('Randomly inject errors before `if err != nil` guards in a Go file')
    .version('1.0.0')
    .argument('<file>', 'Go source file to transform')
    .option('-o, --output <path>', 'file for output (default: stdout)')
    .option(
      '-e, --error-percent <percent>',
      'percent error likelihood per guard',
      (value: string) => Number(value),
      CONFIG_DEFAULTS.ERROR_PERCENT
    )
    .option('--no-trace', 'do not print a trace line when an error is injected')
    .option('-v, --verbose', 'report every injection site on stderr')
    .showHelpAfterError()
    .action((file: string, cmdOptions: CliOptions) => {
      process.exitCode = action(file, cmdOptions);
    });

  return program;
}
