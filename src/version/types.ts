/**
 * 版本领域类型定义
 *
 * 核心导出：
 * - VersionState: 权威计数器 (year, build)
 * - VersionFormat: 目标文件所需的版本文本形态
 * - VersionStrings: 由 VersionState 派生的各形态文本
 * - BumpMode: 递增策略（跳过 / 递增 / 显式覆盖）
 */

export interface VersionState {
  year: number;
  build: number;
}

/**
 * - bare: `YYYY.N`，源码常量
 * - semver: `YYYY.N.0`，打包清单 / 扩展清单
 * - installer: `YYYY.N.0.0`，安装包清单
 */
export type VersionFormat = 'bare' | 'semver' | 'installer';

export const VERSION_FORMATS: readonly VersionFormat[] = ['bare', 'semver', 'installer'];

export type VersionStrings = Readonly<Record<VersionFormat, string>>;

export type BumpMode =
  | { kind: 'skip' }
  | { kind: 'increment' }
  /** 显式覆盖：绕过单调性，可能让计数器回退 */
  | { kind: 'override'; text: string };
