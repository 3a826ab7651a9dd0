/**
 * Version State Store
 *
 * 持有权威计数器 (year, build) 的唯一数据源，持久化为 JSON 文档（默认 .build_meta.json）。
 * 文档中除 year/build 以外的字段在保存时原样保留。
 *
 * 核心导出：
 * - VersionStateStore: 状态文件的读取、原子写入与初始化
 * - VersionStateSchema: 状态文档的 zod 校验结构
 * - serializeState(): 状态文档的规范序列化
 */

import { promises as fsp } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { createChildLogger, getRootLogger, type Logger } from '../common/logger.ts';
import { ConfigurationError, CorruptStateError, MissingStateError } from '../common/errors.ts';
import { isNodeError, getErrorMessage } from '../utils/error.ts';
import { writeFileAtomic } from '../utils/atomic-write.ts';
import { renderVersion } from './deriver.ts';
import type { VersionState } from './types.ts';

/**
 * 状态文档结构，允许携带额外字段。
 * build 允许为 0：`stampver init` 的初始值，第一次 increment 后为 1；
 * 此时 `current` 输出 `YYYY.0`。
 */
export const VersionStateSchema = z
  .object({
    year: z.number().int().nonnegative(),
    build: z.number().int().nonnegative(),
  })
  .passthrough();

type StateDocument = z.infer<typeof VersionStateSchema>;

export interface VersionStateStoreOptions {
  logger?: Logger;
}

export function serializeState(document: Record<string, unknown>): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * VersionStateStore - 版本状态存储
 *
 * Usage:
 * ```typescript
 * const store = new VersionStateStore('/repo/.build_meta.json');
 * const state = await store.load();
 * await store.save({ year: state.year, build: state.build + 1 });
 * ```
 */
export class VersionStateStore {
  private readonly logger: Logger;

  constructor(
    public readonly filePath: string,
    options: VersionStateStoreOptions = {},
  ) {
    this.logger = options.logger ?? createChildLogger(getRootLogger(), 'state-store');
  }

  async exists(): Promise<boolean> {
    try {
      await fsp.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * 读取当前状态
   *
   * @throws MissingStateError 文件不存在
   * @throws CorruptStateError 非 JSON 或缺少整数 year/build
   */
  async load(): Promise<VersionState> {
    const document = await this.readDocument();
    return { year: document.year, build: document.build };
  }

  /**
   * 原子写入完整状态。内容与磁盘一致时不写入。
   *
   * @returns 文件内容是否发生变化
   */
  async save(state: VersionState): Promise<boolean> {
    const existing = await this.readRaw();
    let base: Record<string, unknown> = {};
    if (existing !== null) {
      base = this.parseDocument(existing);
    }

    const content = serializeState({ ...base, year: state.year, build: state.build });
    if (content === existing) {
      this.logger.debug({ file: this.filePath }, 'Version state unchanged');
      return false;
    }

    await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, content);
    this.logger.debug({ file: this.filePath, year: state.year, build: state.build }, 'Version state saved');
    return true;
  }

  /**
   * 返回当前版本的 bare 文本（不修改状态）
   */
  async currentVersionText(): Promise<string> {
    return renderVersion(await this.load(), 'bare');
  }

  /**
   * 创建状态文件，已存在时报错
   */
  async initialize(state: VersionState): Promise<void> {
    if (await this.exists()) {
      throw new ConfigurationError(`Version state file already exists: ${this.filePath}`);
    }
    await this.save(state);
    this.logger.info({ file: this.filePath }, `Initialized version state at ${renderVersion(state, 'bare')}`);
  }

  // --- 内部方法 ---

  private async readRaw(): Promise<string | null> {
    try {
      return await fsp.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error, 'ENOENT')) {
        return null;
      }
      throw new Error(`Failed to read ${this.filePath}: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  private async readDocument(): Promise<StateDocument> {
    const raw = await this.readRaw();
    if (raw === null) {
      throw new MissingStateError(this.filePath);
    }
    return this.parseDocument(raw);
  }

  private parseDocument(raw: string): StateDocument {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CorruptStateError(this.filePath, 'not valid JSON', undefined, { cause: error });
    }

    const result = VersionStateSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
      throw new CorruptStateError(this.filePath, issue?.message ?? 'invalid shape', field);
    }
    return result.data;
  }
}
