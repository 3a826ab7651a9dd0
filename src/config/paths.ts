/**
 * stampver 路径解析
 *
 * 功能：集中解析项目根目录、配置文件和状态文件路径，支持环境变量覆盖。
 *
 * 核心导出：
 * - resolveProjectRoot: 项目根目录（--root > STAMPVER_ROOT > cwd）
 * - resolveConfigPath: 配置文件路径（--config > STAMPVER_CONFIG > <root>/stampver.config.json）
 * - resolveInRoot: 将配置中的相对路径解析到项目根目录下
 * - lockPathFor: 状态文件对应的锁文件路径
 */

import * as path from 'node:path';
import { DEFAULT_CONFIG_FILE } from '../common/constants.ts';
import { parseEnvOptionalString } from '../utils/env.ts';

export function resolveProjectRoot(explicit?: string): string {
  const root = explicit ?? parseEnvOptionalString(process.env.STAMPVER_ROOT) ?? process.cwd();
  return path.resolve(root);
}

export function resolveConfigPath(rootDir: string, explicit?: string): string {
  const configured = explicit ?? parseEnvOptionalString(process.env.STAMPVER_CONFIG);
  if (configured) {
    return path.resolve(configured);
  }
  return path.join(rootDir, DEFAULT_CONFIG_FILE);
}

export function resolveInRoot(rootDir: string, relativePath: string): string {
  return path.resolve(rootDir, relativePath);
}

export function lockPathFor(statePath: string): string {
  return `${statePath}.lock`;
}
