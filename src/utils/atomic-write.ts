/**
 * 原子文件写入
 *
 * 功能：先写同目录下的临时文件再 rename 覆盖目标，
 *       保证并发读者不会看到写了一半的文件。
 *
 * 核心导出：
 * - writeFileAtomic(): 原子写入文本文件
 */

import { promises as fsp } from 'node:fs';
import { getErrorMessage } from './error.ts';

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp-${process.pid}-${Math.random().toString(36).slice(2, 8)}`;
  try {
    await fsp.writeFile(tempPath, content, 'utf-8');
    await fsp.rename(tempPath, filePath);
  } catch (error) {
    await fsp.rm(tempPath, { force: true });
    throw new Error(`Failed to write ${filePath}: ${getErrorMessage(error)}`, { cause: error });
  }
}
