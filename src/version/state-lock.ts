/**
 * State Lock — 状态文件的独占锁
 *
 * 功能：以 O_EXCL 方式创建 `<state>.lock`，在 load → bump → save → 写目标文件
 *       整个序列期间持有，避免两个并发运行互相覆盖递增结果。
 *       超过 staleMs 的遗留锁会被告警后移走清除（先 rename 再核对内容）。
 *
 * 核心导出：
 * - StateLock: 独占锁
 * - StateLockOptions: 锁配置选项
 */

import { promises as fsp } from 'node:fs';
import { z } from 'zod';
import { createChildLogger, getRootLogger, type Logger } from '../common/logger.ts';
import { StateLockedError } from '../common/errors.ts';
import { DEFAULT_LOCK_STALE_MS } from '../common/constants.ts';
import { isNodeError } from '../utils/error.ts';

const LockInfoSchema = z.object({
  pid: z.number().int(),
  acquiredAt: z.string(),
});

type LockInfo = z.infer<typeof LockInfoSchema>;

function parseHolder(raw: string | undefined): LockInfo | undefined {
  if (raw === undefined) {
    return undefined;
  }
  try {
    const result = LockInfoSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : undefined;
  } catch {
    // 内容不完整（写入中途）时持有者未知
    return undefined;
  }
}

export interface StateLockOptions {
  staleMs?: number;
  logger?: Logger;
  /** 用于测试固定时间 */
  now?: () => Date;
}

export class StateLock {
  private readonly staleMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private held = false;

  constructor(
    public readonly lockPath: string,
    options: StateLockOptions = {},
  ) {
    this.staleMs = options.staleMs ?? DEFAULT_LOCK_STALE_MS;
    this.logger = options.logger ?? createChildLogger(getRootLogger(), 'state-lock');
    this.now = options.now ?? (() => new Date());
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * 获取锁
   *
   * @throws StateLockedError 锁被其他进程持有且未过期
   */
  async acquire(): Promise<void> {
    if (await this.tryCreate()) {
      return;
    }

    const observed = await this.readRaw();
    const holder = parseHolder(observed);
    if (await this.isStale()) {
      this.logger.warn({ lock: this.lockPath, holderPid: holder?.pid }, 'Breaking stale version state lock');
      if ((await this.moveAside(observed)) && (await this.tryCreate())) {
        return;
      }
    }

    throw new StateLockedError(this.lockPath, holder?.pid);
  }

  async release(): Promise<void> {
    if (!this.held) return;
    await fsp.rm(this.lockPath, { force: true });
    this.held = false;
    this.logger.debug({ lock: this.lockPath }, 'Version state lock released');
  }

  /**
   * 在持有锁期间执行 fn，结束后总是释放
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  // --- 内部方法 ---

  private async tryCreate(): Promise<boolean> {
    const info: LockInfo = { pid: process.pid, acquiredAt: this.now().toISOString() };
    try {
      await fsp.writeFile(this.lockPath, JSON.stringify(info), { encoding: 'utf-8', flag: 'wx' });
      this.held = true;
      this.logger.debug({ lock: this.lockPath }, 'Version state lock acquired');
      return true;
    } catch (error) {
      if (isNodeError(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }
  }

  private async readRaw(): Promise<string | undefined> {
    try {
      return await fsp.readFile(this.lockPath, 'utf-8');
    } catch (error) {
      // 锁在检查期间已被释放
      if (isNodeError(error, 'ENOENT')) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * 把判定为过期的锁 rename 到一旁再删除。只有移走的内容与判定时读到的一致才算成功；
   * 否则移走的是其他进程刚创建的新锁，需要放回原处。
   *
   * @returns 原位置是否已空出
   */
  private async moveAside(observed: string | undefined): Promise<boolean> {
    const aside = `${this.lockPath}.stale-${process.pid}-${Math.random().toString(36).slice(2, 8)}`;
    try {
      await fsp.rename(this.lockPath, aside);
    } catch (error) {
      if (isNodeError(error, 'ENOENT')) {
        return true;
      }
      throw error;
    }

    try {
      const moved = await fsp.readFile(aside, 'utf-8');
      if (moved === observed) {
        return true;
      }
      this.logger.debug({ lock: this.lockPath }, 'Lock was renewed while breaking it, restoring');
      try {
        await fsp.link(aside, this.lockPath);
      } catch (error) {
        // EEXIST: 又有新的持有者，锁同样被占用
        if (!isNodeError(error, 'EEXIST')) {
          throw error;
        }
      }
      return false;
    } finally {
      await fsp.rm(aside, { force: true });
    }
  }

  private async isStale(): Promise<boolean> {
    try {
      const stats = await fsp.stat(this.lockPath);
      return this.now().getTime() - stats.mtimeMs > this.staleMs;
    } catch (error) {
      // 锁在检查期间已被释放，视为可重试
      if (isNodeError(error, 'ENOENT')) {
        return true;
      }
      throw error;
    }
  }
}
