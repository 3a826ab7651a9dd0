/**
 * Target Writer 共享类型
 *
 * 核心导出：
 * - TargetWriter: 所有目标 writer 的统一接口
 * - WriteResult / WriteStatus / SkipReason: 单个文件的写入结果
 * - DetectedVersion: 目标文件中检测到的现有版本
 * - WriterContext: 构造 writer 所需的上下文
 */

import type { Logger } from '../common/logger.ts';
import type { TargetKind } from '../config/config-schema.ts';
import type { VersionFormat, VersionStrings } from '../version/types.ts';
import type { ChangeTracker } from './change-tracker.ts';

/**
 * - updated: 替换了已有内容
 * - created: 新建了文件
 * - unchanged: 已是目标版本，未写入
 * - skipped: 未处理（见 reason）
 */
export type WriteStatus = 'updated' | 'created' | 'unchanged' | 'skipped';

/**
 * - missing: 可选目标文件不存在
 * - invalid: 文件无法解析
 * - no-field: 文件中没有版本字段且不允许插入
 */
export type SkipReason = 'missing' | 'invalid' | 'no-field';

export interface WriteResult {
  targetId: string;
  file: string;
  status: WriteStatus;
  /** 写入（或应写入）的版本文本 */
  version: string;
  reason?: SkipReason;
}

export interface DetectedVersion {
  file: string;
  /** 文件缺失或没有版本字段时为 undefined */
  version: string | undefined;
}

export interface WriterContext {
  rootDir: string;
  logger: Logger;
}

export interface TargetWriter {
  readonly id: string;
  readonly kind: TargetKind;
  readonly format: VersionFormat;
  /** 必需目标缺失时中止运行，可选目标缺失时跳过 */
  readonly required: boolean;

  /** 该 writer 负责的文件（绝对路径） */
  files(): string[];

  /** 读取目标文件中现有的版本 */
  detect(): Promise<DetectedVersion[]>;

  /**
   * 将版本写入目标文件，内容实际变化的文件会记录到 tracker。
   * 对同一版本重复调用时第二次返回 unchanged。
   */
  apply(strings: VersionStrings, tracker: ChangeTracker): Promise<WriteResult[]>;
}
