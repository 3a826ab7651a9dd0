/**
 * Version Engine — 版本递增流水线
 *
 * 严格顺序执行：获取状态锁 → 读取状态 → Bump Policy → 保存状态 → 派生版本文本
 * → 依次执行选中的 writer（显式传入 ChangeTracker）→ 释放锁 → Commit Gate。
 * 中途失败时已完成的 writer 修改保留在磁盘上，没有全局事务。
 *
 * 核心导出：
 * - VersionEngine: 流水线入口（run / currentVersionText / initialize）
 * - RunOptions / RunResult: 单次运行的输入与结果
 */

import { randomUUID } from 'node:crypto';
import { createChildLogger, getRootLogger, withCorrelationId, type Logger } from '../common/logger.ts';
import { loadConfig, type LoadConfigOptions, type LoadedConfig } from '../config/config-loader.ts';
import { lockPathFor } from '../config/paths.ts';
import { CommitGate, type CommitOutcome, type GitExec } from '../git/commit-gate.ts';
import { ChangeTracker } from '../targets/change-tracker.ts';
import type { TargetWriter, WriteResult } from '../targets/types.ts';
import { createTargetWriters, selectWriters, type TargetSelection } from '../targets/writer-registry.ts';
import { bump, describeMode, isBackward } from '../version/bump-policy.ts';
import { deriveVersionStrings, renderVersion } from '../version/deriver.ts';
import { StateLock } from '../version/state-lock.ts';
import { VersionStateStore } from '../version/state-store.ts';
import type { BumpMode, VersionFormat, VersionState, VersionStrings } from '../version/types.ts';

export interface VersionEngineOptions {
  config: LoadedConfig;
  logger?: Logger;
  /** 用于测试固定时间 */
  now?: () => Date;
  /** 自定义 git 执行 */
  gitExec?: GitExec;
}

export interface RunOptions {
  mode: BumpMode;
  /** 默认只执行必需目标 */
  targets?: TargetSelection;
  skipCommit?: boolean;
}

export interface RunResult {
  runId: string;
  mode: BumpMode;
  previous: VersionState;
  state: VersionState;
  strings: VersionStrings;
  /** 新版本低于旧版本：显式覆盖，或存储的年份晚于当前时钟时的 increment */
  backward: boolean;
  results: WriteResult[];
  /** 按修改顺序排列；状态文件变化时排在第一位 */
  modifiedFiles: string[];
  commit: CommitOutcome;
}

/**
 * VersionEngine - 版本递增流水线
 *
 * Usage:
 * ```typescript
 * const engine = await VersionEngine.create({ rootDir: '/repo' });
 * const result = await engine.run({ mode: { kind: 'increment' }, targets: { kind: 'all' } });
 * console.log(result.strings.bare);
 * ```
 */
export class VersionEngine {
  readonly config: LoadedConfig;
  readonly store: VersionStateStore;
  readonly writers: readonly TargetWriter[];

  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly lock: StateLock;
  private readonly gate: CommitGate;

  /**
   * 读取配置并创建引擎
   */
  static async create(
    options: LoadConfigOptions & Omit<VersionEngineOptions, 'config'> = {},
  ): Promise<VersionEngine> {
    const config = await loadConfig(options);
    return new VersionEngine({ ...options, config });
  }

  constructor(options: VersionEngineOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createChildLogger(getRootLogger(), 'engine');
    this.now = options.now ?? (() => new Date());

    const { settings, rootDir, statePath } = this.config;
    this.store = new VersionStateStore(statePath, { logger: this.logger.child({ component: 'state-store' }) });
    this.lock = new StateLock(lockPathFor(statePath), {
      staleMs: settings.lock.staleMs,
      logger: this.logger.child({ component: 'state-lock' }),
      now: this.now,
    });
    this.writers = createTargetWriters(settings.targets, {
      rootDir,
      logger: this.logger.child({ component: 'writer' }),
    });
    this.gate = new CommitGate(rootDir, settings.commit, {
      exec: options.gitExec,
      logger: this.logger.child({ component: 'commit-gate' }),
    });
  }

  /**
   * 当前版本文本（不修改任何文件）
   */
  async currentVersionText(format: VersionFormat = 'bare'): Promise<string> {
    return renderVersion(await this.store.load(), format);
  }

  /**
   * 创建状态文件
   */
  async initialize(state: VersionState): Promise<void> {
    await this.lock.withLock(() => this.store.initialize(state));
  }

  async run(options: RunOptions): Promise<RunResult> {
    const runId = randomUUID().slice(0, 8);
    return withCorrelationId(runId, () => this.execute(runId, options));
  }

  private async execute(runId: string, options: RunOptions): Promise<RunResult> {
    const { mode } = options;
    const writers = selectWriters(this.writers, options.targets ?? { kind: 'required' });
    const tracker = new ChangeTracker();

    this.logger.debug({ mode: describeMode(mode), targets: writers.map((writer) => writer.id) }, 'Starting version run');

    const { previous, state, strings, results } = await this.lock.withLock(async () => {
      const previous = await this.store.load();
      const state = bump(previous, mode, this.now());

      if (mode.kind === 'skip') {
        this.logger.info(`Using current version: ${renderVersion(state, 'bare')}`);
      } else {
        if (await this.store.save(state)) {
          tracker.record(this.store.filePath);
        }
        this.logger.info(`Bumped version: ${renderVersion(previous, 'bare')} -> ${renderVersion(state, 'bare')}`);
      }

      const strings = deriveVersionStrings(state);
      const results: WriteResult[] = [];
      for (const writer of writers) {
        results.push(...(await writer.apply(strings, tracker)));
      }
      return { previous, state, strings, results };
    });

    const backward = isBackward(previous, state);
    if (backward) {
      const transition = `${renderVersion(previous, 'bare')} -> ${strings.bare}`;
      this.logger.warn(
        mode.kind === 'override'
          ? `Version override moved the counter backward: ${transition}`
          : `Stored year is ahead of the clock, counter reset backward: ${transition}`,
      );
    }

    const modifiedFiles = tracker.list();
    const commit = await this.gate.commit({
      files: modifiedFiles,
      version: strings.bare,
      skip: options.skipCommit,
    });

    return { runId, mode, previous, state, strings, backward, results, modifiedFiles, commit };
  }
}
