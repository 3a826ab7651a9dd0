/**
 * Current command - 输出当前版本，不修改任何文件。
 *
 * 输出只有版本文本本身，供构建脚本读取。
 */

import type { VersionFormat } from '../../version/types.ts';
import type { CommandDeps, GlobalOptions } from './types.ts';

export interface CurrentCommandOptions extends GlobalOptions {
  format?: VersionFormat;
}

export async function currentCommand(options: CurrentCommandOptions, deps: CommandDeps): Promise<void> {
  const engine = await deps.createEngine(options);
  console.log(await engine.currentVersionText(options.format ?? 'bare'));
}
