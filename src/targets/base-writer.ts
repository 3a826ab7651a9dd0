/**
 * BaseTargetWriter — 目标 writer 的公共基类
 *
 * 提供读取（缺失返回 null）、原子写入并记录变更、处理缺失文件等共用逻辑，
 * 子类只需实现各自格式的检测与替换。
 *
 * 核心导出：
 * - BaseTargetWriter
 */

import { promises as fsp } from 'node:fs';
import * as path from 'node:path';
import type { Logger } from '../common/logger.ts';
import { MissingOptionalTargetError, MissingRequiredTargetError } from '../common/errors.ts';
import type { TargetKind } from '../config/config-schema.ts';
import type { VersionFormat, VersionStrings } from '../version/types.ts';
import { isNodeError, getErrorMessage } from '../utils/error.ts';
import { writeFileAtomic } from '../utils/atomic-write.ts';
import type { ChangeTracker } from './change-tracker.ts';
import type { DetectedVersion, TargetWriter, WriteResult, WriterContext } from './types.ts';

export abstract class BaseTargetWriter implements TargetWriter {
  abstract readonly kind: TargetKind;

  protected readonly rootDir: string;
  protected readonly logger: Logger;

  protected constructor(
    public readonly id: string,
    public readonly format: VersionFormat,
    public readonly required: boolean,
    context: WriterContext,
  ) {
    this.rootDir = context.rootDir;
    this.logger = context.logger.child({ target: id });
  }

  abstract files(): string[];

  abstract detect(): Promise<DetectedVersion[]>;

  abstract apply(strings: VersionStrings, tracker: ChangeTracker): Promise<WriteResult[]>;

  /** 项目根目录下的相对路径，用于日志与提示 */
  protected display(filePath: string): string {
    return path.relative(this.rootDir, filePath) || filePath;
  }

  protected async readText(filePath: string): Promise<string | null> {
    try {
      return await fsp.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error, 'ENOENT')) {
        return null;
      }
      throw new Error(`Failed to read ${filePath}: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * 内容变化时原子写入并记录到 tracker
   */
  protected async commitContent(
    filePath: string,
    previous: string | null,
    next: string,
    version: string,
    tracker: ChangeTracker,
  ): Promise<WriteResult> {
    if (previous === next) {
      this.logger.debug({ file: this.display(filePath) }, 'Already at target version');
      return this.result(filePath, 'unchanged', version);
    }

    if (previous === null) {
      await fsp.mkdir(path.dirname(filePath), { recursive: true });
    }
    await writeFileAtomic(filePath, next);
    tracker.record(filePath);

    const status = previous === null ? 'created' : 'updated';
    this.logger.info({ file: this.display(filePath), version }, `${status === 'created' ? 'Created' : 'Updated'} ${this.display(filePath)}`);
    return this.result(filePath, status, version);
  }

  /**
   * 处理缺失文件：必需目标抛错，可选目标记录日志并跳过
   */
  protected missing(filePath: string, version: string): WriteResult {
    if (this.required) {
      throw new MissingRequiredTargetError(this.id, filePath);
    }
    const notice = new MissingOptionalTargetError(this.id, this.display(filePath));
    this.logger.warn({ code: notice.code }, notice.message);
    return this.result(filePath, 'skipped', version, 'missing');
  }

  protected result(
    filePath: string,
    status: WriteResult['status'],
    version: string,
    reason?: WriteResult['reason'],
  ): WriteResult {
    return reason
      ? { targetId: this.id, file: filePath, status, version, reason }
      : { targetId: this.id, file: filePath, status, version };
  }
}
