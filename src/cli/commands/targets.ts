/**
 * Targets command - 列出配置的目标 writer 及各文件中当前的版本。
 */

import * as path from 'node:path';
import chalk from 'chalk';
import type { CommandDeps, GlobalOptions } from './types.ts';

export async function targetsCommand(options: GlobalOptions, deps: CommandDeps): Promise<void> {
  const engine = await deps.createEngine(options);
  const { rootDir, configPath, source } = engine.config;

  console.log(chalk.blue.bold('Configured targets'));
  console.log(chalk.gray(source === 'file' ? `from ${configPath}` : 'built-in defaults'));
  console.log('');

  for (const writer of engine.writers) {
    const flags = [writer.kind, writer.format, writer.required ? 'required' : 'optional'].join(', ');
    console.log(`${chalk.cyan(writer.id)} ${chalk.gray(`(${flags})`)}`);

    for (const detected of await writer.detect()) {
      const file = path.relative(rootDir, detected.file) || detected.file;
      const version = detected.version ?? chalk.yellow('not found');
      console.log(`  ${file}: ${version}`);
    }
  }
}
