/**
 * Config Loader
 *
 * 读取并校验 stampver.config.json。文件不存在时使用默认配置；
 * JSON 语法错误或字段不合法时抛出 ConfigurationError，并指出文件和字段路径。
 *
 * 核心导出：
 * - loadConfig: 读取配置
 * - LoadedConfig: 解析后的配置及其来源
 */

import { promises as fsp } from 'node:fs';
import { createChildLogger, getRootLogger, type Logger } from '../common/logger.ts';
import { ConfigurationError } from '../common/errors.ts';
import { isNodeError } from '../utils/error.ts';
import { StampverConfigSchema, type StampverConfig } from './config-schema.ts';
import { resolveConfigPath, resolveInRoot, resolveProjectRoot } from './paths.ts';

export interface LoadConfigOptions {
  rootDir?: string;
  configPath?: string;
  logger?: Logger;
}

export interface LoadedConfig {
  rootDir: string;
  configPath: string;
  /** 配置来自文件还是内置默认值 */
  source: 'file' | 'defaults';
  statePath: string;
  settings: StampverConfig;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const logger = options.logger ?? createChildLogger(getRootLogger(), 'config');
  const rootDir = resolveProjectRoot(options.rootDir);
  const configPath = resolveConfigPath(rootDir, options.configPath);

  let raw: string | null = null;
  try {
    raw = await fsp.readFile(configPath, 'utf-8');
  } catch (error) {
    if (!isNodeError(error, 'ENOENT')) {
      throw new ConfigurationError(`Failed to read config file ${configPath}`, { cause: error });
    }
    // 显式指定的配置文件必须存在
    if (options.configPath) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, { cause: error });
    }
    logger.debug({ configPath }, 'No config file, using defaults');
  }

  let parsed: unknown = {};
  if (raw !== null) {
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`Config file ${configPath} is not valid JSON`, { cause: error });
    }
  }

  const result = StampverConfigSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${configPath}: ${details}`);
  }

  const settings = result.data;
  return {
    rootDir,
    configPath,
    source: raw === null ? 'defaults' : 'file',
    statePath: resolveInRoot(rootDir, settings.stateFile),
    settings,
  };
}
