/**
 * Init command - 创建版本状态文件。
 *
 * 默认 build 为 0，第一次递增得到 `<year>.1`。
 */

import chalk from 'chalk';
import { ConfigurationError } from '../../common/errors.ts';
import { renderVersion } from '../../version/deriver.ts';
import type { CommandDeps, GlobalOptions } from './types.ts';

export interface InitCommandOptions extends GlobalOptions {
  year?: string;
  build?: string;
}

function parseNonNegativeInt(value: string | undefined, fallback: number, flag: string): number {
  if (value === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${flag} must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

export async function initCommand(options: InitCommandOptions, deps: CommandDeps, now: () => Date = () => new Date()): Promise<void> {
  const state = {
    year: parseNonNegativeInt(options.year, now().getFullYear(), '--year'),
    build: parseNonNegativeInt(options.build, 0, '--build'),
  };

  const engine = await deps.createEngine(options);
  await engine.initialize(state);
  console.log(`${chalk.green('Created')} ${engine.store.filePath} ${chalk.gray(`(${renderVersion(state, 'bare')})`)}`);
}
