/**
 * Configuration Module
 *
 * Core Exports:
 * - loadConfig: 读取并校验 stampver.config.json
 * - StampverConfigSchema / StampverConfig: 配置结构与类型
 * - resolveProjectRoot / resolveConfigPath / resolveInRoot / lockPathFor: 路径函数
 */

export { loadConfig, type LoadConfigOptions, type LoadedConfig } from './config-loader.ts';
export {
  StampverConfigSchema,
  TargetConfigSchema,
  SourceConstantTargetSchema,
  ManifestFieldTargetSchema,
  JsonManifestTargetSchema,
  CommitSettingsSchema,
  LockSettingsSchema,
  DEFAULT_TARGETS,
  DEFAULT_CONSTANT_TEMPLATE,
  VERSION_PLACEHOLDER,
  type StampverConfig,
  type TargetConfig,
  type TargetKind,
  type SourceConstantTargetConfig,
  type ManifestFieldTargetConfig,
  type JsonManifestTargetConfig,
  type CommitSettings,
  type LockSettings,
} from './config-schema.ts';
export { resolveProjectRoot, resolveConfigPath, resolveInRoot, lockPathFor } from './paths.ts';
