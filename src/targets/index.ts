/**
 * Target Writers 模块
 *
 * 核心导出:
 * - SourceConstantWriter / ManifestFieldWriter / JsonManifestWriter: 三类目标 writer
 * - ChangeTracker: 本次运行的修改文件集合
 * - createTargetWriters / selectWriters: 按配置创建并筛选 writer
 */

export { ChangeTracker } from './change-tracker.ts';
export { BaseTargetWriter } from './base-writer.ts';
export { SourceConstantWriter } from './source-constant-writer.ts';
export {
  ManifestFieldWriter,
  updateManifestContent,
  type ManifestUpdateOptions,
  type ManifestUpdate,
} from './manifest-field-writer.ts';
export {
  JsonManifestWriter,
  setDocumentVersion,
  detectJsonStyle,
  type JsonStyle,
} from './json-manifest-writer.ts';
export {
  createTargetWriter,
  createTargetWriters,
  selectWriters,
  type TargetSelection,
} from './writer-registry.ts';
export type {
  TargetWriter,
  WriteResult,
  WriteStatus,
  SkipReason,
  DetectedVersion,
  WriterContext,
} from './types.ts';
