/**
 * CLI 入口文件
 *
 * 功能：定义命令行接口，处理命令参数和选项
 *
 * 命令：
 * - stampver [options]: 递增版本并同步目标文件（默认命令）
 * - stampver current: 输出当前版本
 * - stampver init: 创建状态文件
 * - stampver targets: 列出目标及其当前版本
 *
 * 核心导出：
 * - createProgram(): 构建 commander 程序（测试中注入依赖）
 * - main(): 主函数，启动 CLI 应用
 */

import { Command, Option } from 'commander';
import { getProjectVersion } from '../config/version.ts';
import { VERSION_FORMATS } from '../version/types.ts';
import { bumpCommand, type BumpCommandOptions } from './commands/bump.ts';
import { currentCommand, type CurrentCommandOptions } from './commands/current.ts';
import { initCommand, type InitCommandOptions } from './commands/init.ts';
import { targetsCommand } from './commands/targets.ts';
import { createCommandDeps, type CommandDeps, type GlobalOptions } from './commands/types.ts';

export function createProgram(deps: CommandDeps = createCommandDeps()): Command {
  const program = new Command();

  program
    .name('stampver')
    .description('Bump the year.build counter and stamp it into every dependent file')
    .version(getProjectVersion())
    .option('--root <dir>', 'Project root (default: STAMPVER_ROOT or the current directory)')
    .option('--config <file>', 'Config file (default: <root>/stampver.config.json)')
    .option('-v, --verbose', 'Show detailed output');

  // 默认命令：bump
  program
    .option('--skip-bump', 'Reuse the current version instead of incrementing it')
    .option('--version-override <version>', 'Set the version explicitly (YEAR.BUILD); may move it backward')
    .option('--update-all', 'Update every configured target')
    .option('--only <target>', 'Update only the named target')
    .option('--skip-git', 'Do not commit the modified files')
    .option('--json', 'Print the run result as JSON')
    .action(async () => {
      const options: BumpCommandOptions = program.opts();
      await bumpCommand(options, deps);
    });

  program
    .command('current')
    .description('Print the current version without changing anything')
    .addOption(new Option('--format <format>', 'Version rendering').choices(VERSION_FORMATS).default('bare'))
    .action(async (_options, command: Command) => {
      const options: CurrentCommandOptions = command.optsWithGlobals();
      await currentCommand(options, deps);
    });

  program
    .command('init')
    .description('Create the version state file')
    .option('--year <year>', 'Initial year (default: current year)')
    .option('--build <build>', 'Initial build number', '0')
    .action(async (_options, command: Command) => {
      const options: InitCommandOptions = command.optsWithGlobals();
      await initCommand(options, deps);
    });

  program
    .command('targets')
    .description('List configured targets and the version found in each file')
    .action(async (_options, command: Command) => {
      const options: GlobalOptions = command.optsWithGlobals();
      await targetsCommand(options, deps);
    });

  return program;
}

/**
 * Main function to run the CLI
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
