/**
 * 文件功能说明：
 * - 根据配置中的 kind 创建对应的 TargetWriter，并按调用方的选择筛选本次要执行的 writer。
 *
 * 核心导出列表：
 * - `createTargetWriter`：由单个目标配置创建 writer
 * - `createTargetWriters`：由目标配置列表创建 writer
 * - `selectWriters`：按 TargetSelection 筛选 writer
 * - `TargetSelection`：writer 选择方式
 */

import { UnknownTargetError } from '../common/errors.ts';
import type { TargetConfig } from '../config/config-schema.ts';
import { JsonManifestWriter } from './json-manifest-writer.ts';
import { ManifestFieldWriter } from './manifest-field-writer.ts';
import { SourceConstantWriter } from './source-constant-writer.ts';
import type { TargetWriter, WriterContext } from './types.ts';

/**
 * - required: 只执行必需目标（默认路径）
 * - all: 执行全部目标
 * - only: 只执行指定 id 的目标
 */
export type TargetSelection =
  | { kind: 'required' }
  | { kind: 'all' }
  | { kind: 'only'; id: string };

export function createTargetWriter(config: TargetConfig, context: WriterContext): TargetWriter {
  switch (config.kind) {
    case 'source-constant':
      return new SourceConstantWriter(config, context);
    case 'manifest-field':
      return new ManifestFieldWriter(config, context);
    case 'json-manifest':
      return new JsonManifestWriter(config, context);
  }
}

export function createTargetWriters(configs: readonly TargetConfig[], context: WriterContext): TargetWriter[] {
  return configs.map((config) => createTargetWriter(config, context));
}

/**
 * 按选择筛选 writer，保持配置顺序
 *
 * @throws UnknownTargetError only 指定的 id 不存在
 */
export function selectWriters(writers: readonly TargetWriter[], selection: TargetSelection): TargetWriter[] {
  switch (selection.kind) {
    case 'all':
      return [...writers];
    case 'required':
      return writers.filter((writer) => writer.required);
    case 'only': {
      const writer = writers.find((candidate) => candidate.id === selection.id);
      if (!writer) {
        throw new UnknownTargetError(selection.id, writers.map((candidate) => candidate.id));
      }
      return [writer];
    }
  }
}
