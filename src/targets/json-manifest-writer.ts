/**
 * JsonManifestWriter — 结构化文档（package.json 风格的扩展清单）
 *
 * 解析为对象、设置 version 键、按原文件的缩进和换行风格重新序列化。
 * 一个目标可覆盖多个目录下的同名清单，逐个处理：
 * - 目录中没有清单：跳过（必需目标则报错）
 * - 清单无法解析：告警并跳过
 * - version 已是目标值：不重写，避免格式被规范化
 *
 * 核心导出：
 * - JsonManifestWriter
 * - setDocumentVersion(): 在保持键顺序的前提下设置 version
 * - detectJsonStyle(): 检测缩进与换行风格
 */

import * as path from 'node:path';
import type { JsonManifestTargetConfig } from '../config/config-schema.ts';
import { resolveInRoot } from '../config/paths.ts';
import type { VersionStrings } from '../version/types.ts';
import { BaseTargetWriter } from './base-writer.ts';
import type { ChangeTracker } from './change-tracker.ts';
import type { DetectedVersion, WriteResult, WriterContext } from './types.ts';

type JsonObject = Record<string, unknown>;

export interface JsonStyle {
  indent: string;
  newline: '\n' | '\r\n';
  trailingNewline: boolean;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function detectJsonStyle(text: string): JsonStyle {
  const indentMatch = /^([ \t]+)\S/m.exec(text);
  return {
    indent: indentMatch?.[1] ?? '  ',
    newline: text.includes('\r\n') ? '\r\n' : '\n',
    trailingNewline: /\r?\n$/.test(text),
  };
}

/**
 * 设置 version 键。已存在时原位替换；不存在时插在 name 之后（没有 name 则放在最前）。
 */
export function setDocumentVersion(document: JsonObject, version: string): JsonObject {
  if ('version' in document) {
    return { ...document, version };
  }

  const entries = Object.entries(document);
  const nameIndex = entries.findIndex(([key]) => key === 'name');
  entries.splice(nameIndex + 1, 0, ['version', version]);
  return Object.fromEntries(entries);
}

function serialize(document: JsonObject, style: JsonStyle): string {
  let text = JSON.stringify(document, null, style.indent);
  if (style.newline === '\r\n') {
    text = text.replace(/\n/g, '\r\n');
  }
  return style.trailingNewline ? text + style.newline : text;
}

export class JsonManifestWriter extends BaseTargetWriter {
  readonly kind = 'json-manifest' as const;

  private readonly manifestPaths: string[];

  constructor(config: JsonManifestTargetConfig, context: WriterContext) {
    super(config.id, config.format, config.required, context);
    this.manifestPaths = config.dirs.map((dir) => resolveInRoot(context.rootDir, path.join(dir, config.fileName)));
  }

  files(): string[] {
    return [...this.manifestPaths];
  }

  async detect(): Promise<DetectedVersion[]> {
    const detected: DetectedVersion[] = [];
    for (const filePath of this.manifestPaths) {
      const document = this.parse(await this.readText(filePath));
      const version = document?.version;
      detected.push({ file: filePath, version: typeof version === 'string' ? version : undefined });
    }
    return detected;
  }

  async apply(strings: VersionStrings, tracker: ChangeTracker): Promise<WriteResult[]> {
    const version = strings[this.format];
    const results: WriteResult[] = [];

    for (const filePath of this.manifestPaths) {
      results.push(await this.applyOne(filePath, version, tracker));
    }
    return results;
  }

  private async applyOne(filePath: string, version: string, tracker: ChangeTracker): Promise<WriteResult> {
    const previous = await this.readText(filePath);
    if (previous === null) {
      return this.missing(filePath, version);
    }

    const document = this.parse(previous);
    if (!document) {
      this.logger.warn({ file: this.display(filePath) }, `${this.display(filePath)} is not a valid JSON object, skipping`);
      return this.result(filePath, 'skipped', version, 'invalid');
    }

    if (document.version === version) {
      this.logger.debug({ file: this.display(filePath) }, 'Already at target version');
      return this.result(filePath, 'unchanged', version);
    }

    const next = serialize(setDocumentVersion(document, version), detectJsonStyle(previous));
    return this.commitContent(filePath, previous, next, version, tracker);
  }

  private parse(text: string | null): JsonObject | undefined {
    if (text === null) {
      return undefined;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return isJsonObject(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }
}
