/**
 * 版本核心模块
 *
 * 核心导出:
 * - VersionStateStore / StateLock: 状态持久化与独占锁
 * - bump / parseOverride / isBackward: 递增策略
 * - renderVersion / deriveVersionStrings: 版本文本派生
 */

export {
  VersionStateStore,
  VersionStateSchema,
  serializeState,
  type VersionStateStoreOptions,
} from './state-store.ts';
export { StateLock, type StateLockOptions } from './state-lock.ts';
export { bump, parseOverride, isBackward, describeMode } from './bump-policy.ts';
export { renderVersion, deriveVersionStrings } from './deriver.ts';
export {
  VERSION_FORMATS,
  type VersionState,
  type VersionFormat,
  type VersionStrings,
  type BumpMode,
} from './types.ts';
