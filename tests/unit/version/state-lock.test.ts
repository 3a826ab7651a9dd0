/**
 * State Lock Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { StateLock } from '../../../src/version/state-lock.ts';
import { StateLockedError } from '../../../src/common/errors.ts';
import { createWorkspace, removeWorkspace, silentLogger } from '../../fixtures/workspace.ts';

describe('StateLock', () => {
  let root: string;
  let lockPath: string;

  beforeEach(() => {
    root = createWorkspace();
    lockPath = path.join(root, '.build_meta.json.lock');
  });

  afterEach(() => {
    removeWorkspace(root);
  });

  it('should create the lock file with the holder pid', async () => {
    const lock = new StateLock(lockPath, { logger: silentLogger() });
    await lock.acquire();

    expect(lock.isHeld).toBe(true);
    expect(JSON.parse(fs.readFileSync(lockPath, 'utf-8'))).toMatchObject({ pid: process.pid });

    await lock.release();
    expect(fs.existsSync(lockPath)).toBe(false);
    expect(lock.isHeld).toBe(false);
  });

  it('should fail when another holder has a fresh lock', async () => {
    fs.writeFileSync(lockPath, JSON.stringify({ pid: 4242, acquiredAt: new Date().toISOString() }));
    const lock = new StateLock(lockPath, { logger: silentLogger() });

    await expect(lock.acquire()).rejects.toBeInstanceOf(StateLockedError);
    await expect(lock.acquire()).rejects.toMatchObject({ lockPath, holderPid: 4242 });
    // 不应删除他人的锁
    expect(fs.existsSync(lockPath)).toBe(true);
  });

  it('should break a stale lock', async () => {
    fs.writeFileSync(lockPath, JSON.stringify({ pid: 4242, acquiredAt: '2020-01-01T00:00:00.000Z' }));
    const lock = new StateLock(lockPath, {
      logger: silentLogger(),
      staleMs: 1000,
      now: () => new Date(Date.now() + 60_000),
    });

    await lock.acquire();
    expect(JSON.parse(fs.readFileSync(lockPath, 'utf-8'))).toMatchObject({ pid: process.pid });
    await lock.release();
  });

  it('should let only one of two concurrent breakers take over a stale lock', async () => {
    fs.writeFileSync(lockPath, JSON.stringify({ pid: 4242, acquiredAt: '2020-01-01T00:00:00.000Z' }));
    // 两者都把任何现有锁视为过期，后到的 breaker 会移走先到者的新锁
    const options = { logger: silentLogger(), staleMs: 1000, now: () => new Date(Date.now() + 60_000) };
    const first = new StateLock(lockPath, options);
    const second = new StateLock(lockPath, options);

    const outcomes = await Promise.allSettled([first.acquire(), second.acquire()]);

    expect(outcomes.filter((outcome) => outcome.status === 'fulfilled')).toHaveLength(1);
    const rejected = outcomes.find((outcome) => outcome.status === 'rejected');
    expect(rejected?.status === 'rejected' ? rejected.reason : undefined).toBeInstanceOf(StateLockedError);
    expect([first.isHeld, second.isHeld].filter(Boolean)).toHaveLength(1);
    expect(JSON.parse(fs.readFileSync(lockPath, 'utf-8'))).toMatchObject({ pid: process.pid });
    expect(fs.readdirSync(root)).toEqual(['.build_meta.json.lock']);

    await first.release();
    await second.release();
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should release the lock after withLock even when the callback throws', async () => {
    const lock = new StateLock(lockPath, { logger: silentLogger() });

    await expect(lock.withLock(async () => {
      expect(fs.existsSync(lockPath)).toBe(true);
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should return the callback result from withLock', async () => {
    const lock = new StateLock(lockPath, { logger: silentLogger() });
    await expect(lock.withLock(async () => 42)).resolves.toBe(42);
  });

  it('should make a second concurrent holder fail', async () => {
    const first = new StateLock(lockPath, { logger: silentLogger() });
    const second = new StateLock(lockPath, { logger: silentLogger() });

    await first.acquire();
    await expect(second.acquire()).rejects.toBeInstanceOf(StateLockedError);
    await first.release();
    await expect(second.acquire()).resolves.toBeUndefined();
    await second.release();
  });
});
