/**
 * SourceConstantWriter — 生成的源码常量文件
 *
 * 整个文件覆盖为模板渲染出的单条声明（从不做局部编辑），
 * 默认在文件缺失时连同父目录一起创建。
 *
 * 核心导出：
 * - SourceConstantWriter
 */

import type { SourceConstantTargetConfig } from '../config/config-schema.ts';
import { VERSION_PLACEHOLDER } from '../config/config-schema.ts';
import { resolveInRoot } from '../config/paths.ts';
import type { VersionStrings } from '../version/types.ts';
import { BaseTargetWriter } from './base-writer.ts';
import type { ChangeTracker } from './change-tracker.ts';
import type { DetectedVersion, WriteResult, WriterContext } from './types.ts';

/** 从常量声明中提取第一个引号内的值 */
const QUOTED_VALUE = /["']([^"'\r\n]*)["']/;

export class SourceConstantWriter extends BaseTargetWriter {
  readonly kind = 'source-constant' as const;

  private readonly filePath: string;
  private readonly template: string;
  private readonly createIfMissing: boolean;

  constructor(config: SourceConstantTargetConfig, context: WriterContext) {
    super(config.id, config.format, config.required, context);
    this.filePath = resolveInRoot(context.rootDir, config.path);
    this.template = config.template;
    this.createIfMissing = config.createIfMissing;
  }

  files(): string[] {
    return [this.filePath];
  }

  render(version: string): string {
    return this.template.split(VERSION_PLACEHOLDER).join(version);
  }

  async detect(): Promise<DetectedVersion[]> {
    const content = await this.readText(this.filePath);
    const match = content === null ? null : QUOTED_VALUE.exec(content);
    return [{ file: this.filePath, version: match?.[1] }];
  }

  async apply(strings: VersionStrings, tracker: ChangeTracker): Promise<WriteResult[]> {
    const version = strings[this.format];
    const previous = await this.readText(this.filePath);

    if (previous === null && !this.createIfMissing) {
      return [this.missing(this.filePath, version)];
    }

    return [await this.commitContent(this.filePath, previous, this.render(version), version, tracker)];
  }
}
