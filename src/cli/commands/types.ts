/**
 * CLI 命令的共享类型定义
 *
 * 核心导出：
 * - GlobalOptions: 所有命令共享的全局选项
 * - CommandDeps: 命令依赖（测试中注入自定义引擎工厂）
 * - createCommandDeps: 默认依赖
 */

import { configureRootLogger } from '../../common/logger.ts';
import { VersionEngine } from '../../engine/version-engine.ts';
import type { GitExec } from '../../git/commit-gate.ts';
import { setVerboseErrors } from '../output.ts';

export interface GlobalOptions {
  root?: string;
  config?: string;
  verbose?: boolean;
}

export interface CommandDeps {
  createEngine: (options: GlobalOptions) => Promise<VersionEngine>;
}

export interface CommandDepsOptions {
  now?: () => Date;
  gitExec?: GitExec;
}

export function createCommandDeps(options: CommandDepsOptions = {}): CommandDeps {
  return {
    createEngine: async (globals) => {
      if (globals.verbose) {
        // 必须在引擎创建子日志之前切换级别
        configureRootLogger({ level: 'debug' });
        setVerboseErrors(true);
      }
      return VersionEngine.create({
        rootDir: globals.root,
        configPath: globals.config,
        now: options.now,
        gitExec: options.gitExec,
      });
    },
  };
}
