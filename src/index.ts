/**
 * stampver 库入口
 *
 * 构建启动器等外部工具通过这里调用：
 * - VersionEngine.currentVersionText(): 读取当前版本
 * - VersionEngine.run(): 递增 / 覆盖版本并同步目标文件
 */

export * from './common/index.ts';
export * from './config/index.ts';
export * from './version/index.ts';
export * from './targets/index.ts';
export { CommitGate, type CommitGateOptions, type CommitOutcome, type CommitRequest, type GitExec, type GitExecOptions } from './git/commit-gate.ts';
export * from './engine/index.ts';
