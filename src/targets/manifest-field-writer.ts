/**
 * ManifestFieldWriter — 清单文件中的 `version = "..."` 字段
 *
 * 按模式定位字段，只替换引号内的值，其余内容逐字节保留：
 * - 主字段：文件中第一个独占一行的 version 赋值（内联表中的 version 不会被匹配）
 * - sections：额外更新指定 `[table]` 内的第一个 version 字段
 * - prependIfAbsent：找不到主字段时在文件开头插入版本行
 * - annotation：替换版本值后该行的行尾内容
 *
 * 核心导出：
 * - ManifestFieldWriter
 * - updateManifestContent(): 纯文本层面的版本替换
 */

import type { ManifestFieldTargetConfig } from '../config/config-schema.ts';
import { resolveInRoot } from '../config/paths.ts';
import type { VersionStrings } from '../version/types.ts';
import { BaseTargetWriter } from './base-writer.ts';
import type { ChangeTracker } from './change-tracker.ts';
import type { DetectedVersion, WriteResult, WriterContext } from './types.ts';

const FIELD_SOURCE = String.raw`^([ \t]*version[ \t]*=[ \t]*)"([^"\r\n]*)"([^\r\n]*)$`;
const HEADER_PATTERN = /^[ \t]*\[/gm;

interface FieldMatch {
  start: number;
  end: number;
  prefix: string;
  value: string;
  suffix: string;
}

export interface ManifestUpdateOptions {
  sections?: readonly string[];
  prependIfAbsent?: boolean;
  annotation?: string;
}

export interface ManifestUpdate {
  content: string;
  /** 是否找到（或插入了）主版本字段 */
  found: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** 在 [from, to) 范围内查找第一个 version 字段 */
function locateField(content: string, from: number, to: number): FieldMatch | undefined {
  const pattern = new RegExp(FIELD_SOURCE, 'gm');
  pattern.lastIndex = from;
  const match = pattern.exec(content);
  if (!match || match.index >= to) {
    return undefined;
  }
  return {
    start: match.index,
    end: match.index + match[0].length,
    prefix: match[1] ?? '',
    value: match[2] ?? '',
    suffix: match[3] ?? '',
  };
}

/** 返回表头之后到下一个表头之前的范围 */
function sectionRange(content: string, section: string): { from: number; to: number } | undefined {
  const header = new RegExp(String.raw`^[ \t]*\[${escapeRegExp(section)}\][ \t]*(#[^\r\n]*)?$`, 'm');
  const match = header.exec(content);
  if (!match) {
    return undefined;
  }

  const from = match.index + match[0].length;
  const next = new RegExp(HEADER_PATTERN.source, 'gm');
  next.lastIndex = from;
  const following = next.exec(content);
  return { from, to: following ? following.index : content.length };
}

function renderLine(field: FieldMatch, version: string, annotation: string | undefined): string {
  const suffix = annotation === undefined ? field.suffix : ` ${annotation}`;
  return `${field.prefix}"${version}"${suffix}`;
}

export function updateManifestContent(
  content: string,
  version: string,
  options: ManifestUpdateOptions = {},
): ManifestUpdate {
  const primary = locateField(content, 0, content.length);

  if (!primary) {
    if (!options.prependIfAbsent) {
      return { content, found: false };
    }
    const annotation = options.annotation ? ` ${options.annotation}` : '';
    const newline = content.includes('\r\n') ? '\r\n' : '\n';
    return { content: `version = "${version}"${annotation}${newline}${newline}${content}`, found: true };
  }

  const fields = new Map<number, FieldMatch>([[primary.start, primary]]);
  for (const section of options.sections ?? []) {
    const range = sectionRange(content, section);
    const field = range ? locateField(content, range.from, range.to) : undefined;
    if (field) {
      fields.set(field.start, field);
    }
  }

  // 从后往前替换，保持前面的偏移有效
  let updated = content;
  const ordered = [...fields.values()].sort((a, b) => b.start - a.start);
  for (const field of ordered) {
    updated = updated.slice(0, field.start) + renderLine(field, version, options.annotation) + updated.slice(field.end);
  }
  return { content: updated, found: true };
}

export class ManifestFieldWriter extends BaseTargetWriter {
  readonly kind = 'manifest-field' as const;

  private readonly filePath: string;
  private readonly options: ManifestUpdateOptions;

  constructor(config: ManifestFieldTargetConfig, context: WriterContext) {
    super(config.id, config.format, config.required, context);
    this.filePath = resolveInRoot(context.rootDir, config.path);
    this.options = {
      sections: config.sections,
      prependIfAbsent: config.prependIfAbsent,
      annotation: config.annotation,
    };
  }

  files(): string[] {
    return [this.filePath];
  }

  async detect(): Promise<DetectedVersion[]> {
    const content = await this.readText(this.filePath);
    const field = content === null ? undefined : locateField(content, 0, content.length);
    return [{ file: this.filePath, version: field?.value }];
  }

  async apply(strings: VersionStrings, tracker: ChangeTracker): Promise<WriteResult[]> {
    const version = strings[this.format];
    const previous = await this.readText(this.filePath);
    if (previous === null) {
      return [this.missing(this.filePath, version)];
    }

    const update = updateManifestContent(previous, version, this.options);
    if (!update.found) {
      this.logger.warn({ file: this.display(this.filePath) }, `No version field found in ${this.display(this.filePath)}, leaving it untouched`);
      return [this.result(this.filePath, 'skipped', version, 'no-field')];
    }

    return [await this.commitContent(this.filePath, previous, update.content, version, tracker)];
  }
}
