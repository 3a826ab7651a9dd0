/**
 * 全局常量定义 — 运行参数支持环境变量覆盖。
 *
 * 核心导出:
 * - DEFAULT_LOG_LEVEL: 默认日志级别
 * - DEFAULT_STATE_FILE: 默认状态文件名
 * - DEFAULT_CONFIG_FILE: 默认配置文件名
 * - DEFAULT_GIT_TIMEOUT_MS: git 命令超时时间
 * - DEFAULT_LOCK_STALE_MS: 状态锁过期时间
 * - DEFAULT_COMMIT_MARKER: 提交信息中抑制 CI 递归触发的标记
 */

import { parseEnvPositiveInt } from '../utils/env.ts';

/** 默认日志级别 */
export const DEFAULT_LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

/** 默认状态文件（相对项目根目录） */
export const DEFAULT_STATE_FILE = '.build_meta.json';

/** 默认配置文件（相对项目根目录） */
export const DEFAULT_CONFIG_FILE = 'stampver.config.json';

/** git 命令超时时间（毫秒） */
export const DEFAULT_GIT_TIMEOUT_MS = parseEnvPositiveInt(
  process.env.STAMPVER_GIT_TIMEOUT_MS,
  30000,
);

/** 状态锁超过该时长视为遗留锁（毫秒） */
export const DEFAULT_LOCK_STALE_MS = parseEnvPositiveInt(
  process.env.STAMPVER_LOCK_STALE_MS,
  10 * 60 * 1000,
);

export const DEFAULT_COMMIT_MARKER = '[skip ci]';

export const DEFAULT_COMMIT_MESSAGE_TEMPLATE = 'Bump version to {version} {marker}';
