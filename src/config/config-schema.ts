/**
 * 配置结构定义
 *
 * 功能：stampver.config.json 的 zod 校验结构。所有字段都有默认值，
 *       缺少配置文件时等价于 `{}`。
 *
 * 核心导出：
 * - TargetConfigSchema: 目标文件配置（按 kind 区分的联合类型）
 * - StampverConfigSchema: 主配置结构
 * - DEFAULT_TARGETS: 默认目标列表
 * - DEFAULT_CONSTANT_TEMPLATE: 源码常量文件默认模板
 */

import { z } from 'zod';
import {
  DEFAULT_COMMIT_MARKER,
  DEFAULT_COMMIT_MESSAGE_TEMPLATE,
  DEFAULT_GIT_TIMEOUT_MS,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_STATE_FILE,
} from '../common/constants.ts';

/** 版本占位符 */
export const VERSION_PLACEHOLDER = '{version}';

export const DEFAULT_CONSTANT_TEMPLATE = 'pub const VERSION: &str = "{version}";\n';

const targetId = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9._-]+$/, 'Target id may only contain letters, digits, ".", "_" and "-"');

const relativePath = z.string().min(1);

const VersionFormatSchema = z.enum(['bare', 'semver', 'installer']);

/**
 * 源码常量文件：整文件覆盖为单条声明
 */
export const SourceConstantTargetSchema = z.object({
  kind: z.literal('source-constant'),
  id: targetId,
  path: relativePath,
  template: z
    .string()
    .includes(VERSION_PLACEHOLDER, { message: `Template must contain ${VERSION_PLACEHOLDER}` })
    .default(DEFAULT_CONSTANT_TEMPLATE),
  format: VersionFormatSchema.default('bare'),
  /** 文件缺失时创建（含父目录）；关闭后缺失的必需目标视为致命错误 */
  createIfMissing: z.boolean().default(true),
  required: z.boolean().default(true),
});

/**
 * 清单字段：按模式定位 `version = "..."` 并只替换引号内的值
 */
export const ManifestFieldTargetSchema = z.object({
  kind: z.literal('manifest-field'),
  id: targetId,
  path: relativePath,
  format: VersionFormatSchema.default('semver'),
  /** 额外需要更新 version 字段的表名，如 `package.metadata.bundle` */
  sections: z.array(z.string().min(1)).default([]),
  /** 字段缺失时在文件开头插入版本行 */
  prependIfAbsent: z.boolean().default(false),
  /** 写在版本值之后的行尾注释，如 `# Updated by stampver` */
  annotation: z.string().min(1).optional(),
  required: z.boolean().default(false),
});

/**
 * 结构化文档：解析 JSON 清单、设置 version 键后重新序列化。
 * 同一目标可以覆盖多个目录下的同名清单。
 */
export const JsonManifestTargetSchema = z.object({
  kind: z.literal('json-manifest'),
  id: targetId,
  dirs: z.array(relativePath).min(1),
  fileName: z.string().min(1).default('package.json'),
  format: VersionFormatSchema.default('semver'),
  required: z.boolean().default(false),
});

export const TargetConfigSchema = z.discriminatedUnion('kind', [
  SourceConstantTargetSchema,
  ManifestFieldTargetSchema,
  JsonManifestTargetSchema,
]);

export type SourceConstantTargetConfig = z.infer<typeof SourceConstantTargetSchema>;
export type ManifestFieldTargetConfig = z.infer<typeof ManifestFieldTargetSchema>;
export type JsonManifestTargetConfig = z.infer<typeof JsonManifestTargetSchema>;
export type TargetConfig = z.infer<typeof TargetConfigSchema>;
export type TargetKind = TargetConfig['kind'];

export const CommitSettingsSchema = z.object({
  /** 下游自动化据此跳过由版本提交触发的构建 */
  marker: z.string().default(DEFAULT_COMMIT_MARKER),
  messageTemplate: z
    .string()
    .includes(VERSION_PLACEHOLDER, { message: `Commit message template must contain ${VERSION_PLACEHOLDER}` })
    .default(DEFAULT_COMMIT_MESSAGE_TEMPLATE),
  /** 设置后会在提交前写入 git config user.name / user.email */
  authorName: z.string().min(1).optional(),
  authorEmail: z.string().email().optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_GIT_TIMEOUT_MS),
});

export type CommitSettings = z.infer<typeof CommitSettingsSchema>;

export const LockSettingsSchema = z.object({
  staleMs: z.number().int().positive().default(DEFAULT_LOCK_STALE_MS),
});

export type LockSettings = z.infer<typeof LockSettingsSchema>;

export const DEFAULT_TARGETS: z.input<typeof TargetConfigSchema>[] = [
  {
    kind: 'source-constant',
    id: 'version-constant',
    path: 'src/version.rs',
  },
  {
    kind: 'manifest-field',
    id: 'cargo',
    path: 'Cargo.toml',
    format: 'semver',
    sections: ['package.metadata.bundle'],
  },
  {
    kind: 'json-manifest',
    id: 'editor-extensions',
    dirs: ['vscode-extension', 'vscode-wfl', 'editors/vscode-wfl'],
  },
  {
    kind: 'manifest-field',
    id: 'wix',
    path: 'wix.toml',
    format: 'installer',
    prependIfAbsent: true,
    annotation: '# Updated by stampver',
  },
];

export const StampverConfigSchema = z
  .object({
    stateFile: relativePath.default(DEFAULT_STATE_FILE),
    commit: CommitSettingsSchema.default({}),
    lock: LockSettingsSchema.default({}),
    targets: z.array(TargetConfigSchema).default(DEFAULT_TARGETS),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.targets.forEach((target, index) => {
      if (seen.has(target.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['targets', index, 'id'],
          message: `Duplicate target id "${target.id}"`,
        });
      }
      seen.add(target.id);
    });
  });

export type StampverConfig = z.infer<typeof StampverConfigSchema>;
