/**
 * Bump Policy — 根据当前状态、当前年份和调用意图计算下一个版本状态。
 *
 * 纯函数，不做任何 I/O；"当前时间" 由调用方注入以便测试。
 *
 * 核心导出：
 * - bump(): 计算下一个 VersionState
 * - parseOverride(): 解析 `YEAR.BUILD` 覆盖文本
 * - isBackward(): 判断一次状态转换是否让计数器回退
 * - describeMode(): 生成模式的可读描述（日志用）
 */

import { InvalidOverrideFormatError } from '../common/errors.ts';
import type { BumpMode, VersionState } from './types.ts';

const OVERRIDE_PATTERN = /^(\d+)\.(\d+)$/;

/**
 * 解析覆盖文本，必须恰好是两个以点分隔的非负整数
 */
export function parseOverride(text: string): VersionState {
  const match = OVERRIDE_PATTERN.exec(text);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw new InvalidOverrideFormatError(text);
  }

  const year = Number(match[1]);
  const build = Number(match[2]);
  if (!Number.isSafeInteger(year) || !Number.isSafeInteger(build)) {
    throw new InvalidOverrideFormatError(text);
  }

  return { year, build };
}

/**
 * 计算下一个版本状态。
 *
 * - skip: 原样返回
 * - increment: 年份变化时重置为 `{ year: 当前年, build: 1 }`，否则 build + 1
 * - override: 原样采用解析结果，不保证单调
 */
export function bump(state: VersionState, mode: BumpMode, now: Date = new Date()): VersionState {
  switch (mode.kind) {
    case 'skip':
      return state;

    case 'increment': {
      const currentYear = now.getFullYear();
      if (currentYear !== state.year) {
        return { year: currentYear, build: 1 };
      }
      return { year: state.year, build: state.build + 1 };
    }

    case 'override':
      return parseOverride(mode.text);
  }
}

export function isBackward(previous: VersionState, next: VersionState): boolean {
  if (next.year !== previous.year) {
    return next.year < previous.year;
  }
  return next.build < previous.build;
}

export function describeMode(mode: BumpMode): string {
  switch (mode.kind) {
    case 'skip':
      return 'skip';
    case 'increment':
      return 'increment';
    case 'override':
      return `override(${mode.text})`;
  }
}
