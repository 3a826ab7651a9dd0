/**
 * 模块依赖方向测试 — 通过静态分析各模块的 import 语句，确保依赖保持单向：
 *   utils ← common ← version / config ← targets / git ← engine ← cli ← entrypoints
 *
 * 核心导出:
 * - getModuleImports(): 扫描指定模块目录引用的其他顶层模块
 */

import { describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const SRC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../src');

/**
 * 键为模块名，值为该模块允许依赖的模块列表
 */
const ALLOWED_DEPENDENCIES: Record<string, string[]> = {
  utils: [],
  common: ['utils'],
  version: ['common', 'utils'],
  config: ['common', 'utils'],
  targets: ['common', 'config', 'utils', 'version'],
  git: ['common', 'config', 'utils'],
  engine: ['common', 'config', 'git', 'targets', 'utils', 'version'],
  cli: ['common', 'config', 'engine', 'git', 'targets', 'utils', 'version'],
  entrypoints: ['cli', 'common'],
};

function collectTsFiles(dir: string): string[] {
  const result: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      result.push(...collectTsFiles(fullPath));
    } else if (entry.isFile() && entry.name.endsWith('.ts')) {
      result.push(fullPath);
    }
  }
  return result;
}

/**
 * 从文件内容中提取所有相对 import 路径
 */
function extractImports(fileContent: string): string[] {
  return [...fileContent.matchAll(/from\s+['"](\.[^'"]+)['"]/g)].flatMap((match) => (match[1] ? [match[1]] : []));
}

function getModuleImports(moduleName: string): { file: string; importedModule: string }[] {
  const imports: { file: string; importedModule: string }[] = [];

  for (const file of collectTsFiles(path.join(SRC_DIR, moduleName))) {
    for (const importPath of extractImports(fs.readFileSync(file, 'utf-8'))) {
      const relative = path.relative(SRC_DIR, path.resolve(path.dirname(file), importPath));
      const importedModule = relative.split(path.sep)[0];
      // 同模块内部导入和 src/ 顶层文件不计
      if (!importedModule || importedModule === moduleName || !relative.includes(path.sep)) continue;
      imports.push({ file: path.relative(SRC_DIR, file), importedModule });
    }
  }
  return imports;
}

describe('Module Dependency Direction', () => {
  const existingModules = fs
    .readdirSync(SRC_DIR, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name);

  it('every top-level module has a dependency rule', () => {
    expect(existingModules.filter((name) => ALLOWED_DEPENDENCIES[name] === undefined)).toEqual([]);
  });

  for (const moduleName of existingModules) {
    const allowed = ALLOWED_DEPENDENCIES[moduleName] ?? [];

    it(`${moduleName}/ 只能依赖 [${allowed.join(', ') || '无'}]`, () => {
      const illegal = getModuleImports(moduleName).filter((entry) => !allowed.includes(entry.importedModule));
      expect(illegal).toEqual([]);
    });
  }
});
