/**
 * Version Deriver — 将 VersionState 渲染为各目标格式的文本。
 *
 * 核心导出：
 * - renderVersion(): 渲染单个格式
 * - deriveVersionStrings(): 一次渲染所有格式
 */

import type { VersionFormat, VersionState, VersionStrings } from './types.ts';

export function renderVersion(state: VersionState, format: VersionFormat): string {
  const bare = `${state.year}.${state.build}`;
  switch (format) {
    case 'bare':
      return bare;
    case 'semver':
      return `${bare}.0`;
    case 'installer':
      // MSI 等安装包版本需要四段
      return `${bare}.0.0`;
  }
}

export function deriveVersionStrings(state: VersionState): VersionStrings {
  return {
    bare: renderVersion(state, 'bare'),
    semver: renderVersion(state, 'semver'),
    installer: renderVersion(state, 'installer'),
  };
}
