/**
 * Bump command - 默认命令：递增（或跳过 / 覆盖）版本并同步到目标文件。
 *
 * Core exports:
 * - bumpCommand: 执行一次版本运行并输出结果
 * - resolveBumpMode: 由命令行选项得到 BumpMode
 * - resolveTargetSelection: 由命令行选项得到 TargetSelection
 */

import chalk from 'chalk';
import { ConfigurationError } from '../../common/errors.ts';
import type { TargetSelection } from '../../targets/writer-registry.ts';
import type { BumpMode } from '../../version/types.ts';
import { formatRunResult, toRunReport } from '../output.ts';
import type { CommandDeps, GlobalOptions } from './types.ts';

export interface BumpCommandOptions extends GlobalOptions {
  skipBump?: boolean;
  versionOverride?: string;
  updateAll?: boolean;
  only?: string;
  skipGit?: boolean;
  json?: boolean;
}

/**
 * --version-override 优先于 --skip-bump
 */
export function resolveBumpMode(options: BumpCommandOptions): BumpMode {
  if (options.versionOverride !== undefined) {
    return { kind: 'override', text: options.versionOverride };
  }
  return options.skipBump ? { kind: 'skip' } : { kind: 'increment' };
}

export function resolveTargetSelection(options: BumpCommandOptions): TargetSelection {
  if (options.updateAll && options.only !== undefined) {
    throw new ConfigurationError('--update-all and --only cannot be used together');
  }
  if (options.only !== undefined) {
    return { kind: 'only', id: options.only };
  }
  return options.updateAll ? { kind: 'all' } : { kind: 'required' };
}

export async function bumpCommand(options: BumpCommandOptions, deps: CommandDeps): Promise<void> {
  const mode = resolveBumpMode(options);
  const targets = resolveTargetSelection(options);

  if (mode.kind === 'override') {
    console.error(chalk.yellow(`Using version override ${mode.text}; the counter may move backward`));
  }

  const engine = await deps.createEngine(options);
  const result = await engine.run({ mode, targets, skipCommit: options.skipGit });

  if (options.json) {
    console.log(JSON.stringify(toRunReport(result, engine.config.rootDir), null, 2));
    return;
  }
  console.log(formatRunResult(result, engine.config.rootDir));
}
