/**
 * Change Tracker — 记录本次运行实际修改过的文件。
 *
 * 每次运行创建一个新实例，显式传给每个 writer，最后交给 Commit Gate 消费。
 * 保持插入顺序，同一文件只记录一次。
 *
 * 核心导出：
 * - ChangeTracker
 */

export class ChangeTracker {
  private readonly files = new Set<string>();

  /**
   * 记录一个被修改的文件
   *
   * @returns 是否为首次记录
   */
  record(filePath: string): boolean {
    if (this.files.has(filePath)) {
      return false;
    }
    this.files.add(filePath);
    return true;
  }

  has(filePath: string): boolean {
    return this.files.has(filePath);
  }

  get size(): number {
    return this.files.size;
  }

  isEmpty(): boolean {
    return this.files.size === 0;
  }

  /** 按记录顺序返回文件列表（副本） */
  list(): string[] {
    return [...this.files];
  }
}
