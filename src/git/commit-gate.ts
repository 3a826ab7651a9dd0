/**
 * Commit Gate — 将本次运行修改的文件提交到 git
 *
 * 只暂存并提交 ChangeTracker 中记录的文件（`git commit -- <files>`，不会带上
 * 其他已暂存内容），提交信息包含新版本和抑制 CI 递归触发的标记。
 * 任一 git 命令失败抛出 CommitFailedError；已写入的文件不回滚。
 *
 * 核心导出：
 * - CommitGate: 提交门
 * - GitExec: git 命令执行函数类型（测试中替换为进程内实现）
 * - CommitOutcome: 提交结果
 */

import { execFile } from 'node:child_process';
import * as path from 'node:path';
import { promisify } from 'node:util';
import { createChildLogger, getRootLogger, type Logger } from '../common/logger.ts';
import { CommitFailedError } from '../common/errors.ts';
import type { CommitSettings } from '../config/config-schema.ts';
import { VERSION_PLACEHOLDER } from '../config/config-schema.ts';
import { getErrorMessage } from '../utils/error.ts';

const execFileAsync = promisify(execFile);

export interface GitExecOptions {
  cwd: string;
  timeout: number;
}

export type GitExec = (args: string[], options: GitExecOptions) => Promise<{ stdout: string; stderr: string }>;

export type CommitOutcome =
  | { committed: true; message: string; files: string[] }
  | { committed: false; reason: 'skipped' | 'no-changes' };

export interface CommitGateOptions {
  /** 自定义 git 执行（默认 execFile git） */
  exec?: GitExec;
  logger?: Logger;
}

export interface CommitRequest {
  /** 修改过的文件（绝对路径或相对项目根目录） */
  files: readonly string[];
  /** 新版本 bare 文本 */
  version: string;
  skip?: boolean;
}

const defaultGitExec: GitExec = async (args, options) => {
  const { stdout, stderr } = await execFileAsync('git', args, {
    cwd: options.cwd,
    timeout: options.timeout,
    encoding: 'utf-8',
  });
  return { stdout, stderr };
};

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string' && error.stderr) {
    return error.stderr;
  }
  return getErrorMessage(error);
}

export class CommitGate {
  private readonly exec: GitExec;
  private readonly logger: Logger;

  constructor(
    private readonly rootDir: string,
    private readonly settings: CommitSettings,
    options: CommitGateOptions = {},
  ) {
    this.exec = options.exec ?? defaultGitExec;
    this.logger = options.logger ?? createChildLogger(getRootLogger(), 'commit-gate');
  }

  formatMessage(version: string): string {
    return this.settings.messageTemplate
      .split(VERSION_PLACEHOLDER)
      .join(version)
      .split('{marker}')
      .join(this.settings.marker)
      .replace(/\s+/g, ' ')
      .trim();
  }

  async commit(request: CommitRequest): Promise<CommitOutcome> {
    if (request.skip) {
      this.logger.info('Skipping git commit as requested');
      return { committed: false, reason: 'skipped' };
    }

    if (request.files.length === 0) {
      this.logger.info('No files modified, skipping git commit');
      return { committed: false, reason: 'no-changes' };
    }

    const files = request.files.map((file) => this.toRepoPath(file));
    const message = this.formatMessage(request.version);
    this.logger.info({ files }, `Committing ${files.length} file(s)`);

    if (this.settings.authorName) {
      await this.git(['config', 'user.name', this.settings.authorName]);
    }
    if (this.settings.authorEmail) {
      await this.git(['config', 'user.email', this.settings.authorEmail]);
    }
    await this.git(['add', '--', ...files]);
    await this.git(['commit', '-m', message, '--', ...files]);

    this.logger.info(`Committed version bump to ${request.version}`);
    return { committed: true, message, files };
  }

  private toRepoPath(file: string): string {
    return path.isAbsolute(file) ? path.relative(this.rootDir, file) : file;
  }

  private async git(args: string[]): Promise<void> {
    const command = `git ${args.join(' ')}`;
    this.logger.debug({ command }, 'Running git');
    try {
      await this.exec(args, { cwd: this.rootDir, timeout: this.settings.timeoutMs });
    } catch (error) {
      throw new CommitFailedError(command, stderrOf(error), { cause: error });
    }
  }
}
