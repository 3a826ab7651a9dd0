/**
 * 测试工作区工具 — 临时项目目录、静默日志和进程内 git 替身。
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createLogger, type Logger } from '../../src/common/logger.ts';
import type { GitExec, GitExecOptions } from '../../src/git/commit-gate.ts';

export function silentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

export function createWorkspace(files: Record<string, string> = {}): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'stampver-test-'));
  writeFiles(root, files);
  return root;
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
  }
}

export function readFile(root: string, relativePath: string): string {
  return fs.readFileSync(path.join(root, relativePath), 'utf-8');
}

export function removeWorkspace(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export interface GitCall {
  args: string[];
  options: GitExecOptions;
}

/**
 * 记录调用的 git 替身；failOn 命中子命令时抛出带 stderr 的错误
 */
export function createFakeGit(failOn?: string): { exec: GitExec; calls: GitCall[] } {
  const calls: GitCall[] = [];
  const exec: GitExec = async (args, options) => {
    calls.push({ args, options });
    if (failOn !== undefined && args[0] === failOn) {
      throw Object.assign(new Error(`git ${failOn} failed`), { stderr: `fatal: ${failOn} rejected\n` });
    }
    return { stdout: '', stderr: '' };
  };
  return { exec, calls };
}
