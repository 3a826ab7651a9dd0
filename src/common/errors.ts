/**
 * 统一错误类型体系 — 定义 stampver 所有自定义错误类型。
 * 每种错误类型对应特定的故障场景，携带结构化的上下文信息（文件、字段、期望格式）。
 *
 * 核心导出:
 * - StampverError: 基础错误类（含 code 和 recoverable 属性）
 * - MissingStateError: 状态文件不存在
 * - CorruptStateError: 状态文件无法解析
 * - InvalidOverrideFormatError: 版本覆盖参数格式错误
 * - MissingRequiredTargetError: 必需目标文件不存在
 * - MissingOptionalTargetError: 可选目标文件不存在（可恢复）
 * - CommitFailedError: git 暂存或提交失败
 * - StateLockedError: 状态锁被其他进程持有
 * - ConfigurationError: 配置错误
 * - UnknownTargetError: 未知的目标名称
 * - isStampverError: 类型守卫函数
 */

/** 状态文件的期望格式，用于错误提示 */
export const EXPECTED_STATE_SHAPE = '{"year": <integer>, "build": <integer>}';

/** 版本覆盖参数的期望格式 */
export const EXPECTED_OVERRIDE_SHAPE = 'YEAR.BUILD (two dot-separated non-negative integers, e.g. 2031.7)';

/** 基础错误类，所有 stampver 错误的父类 */
export class StampverError extends Error {
  public readonly code: string;
  /** 该错误是否可恢复（可恢复错误记录日志后跳过，不终止本次运行） */
  public readonly recoverable: boolean;

  constructor(message: string, code: string, options?: ErrorOptions & { recoverable?: boolean }) {
    super(message, options);
    this.name = 'StampverError';
    this.code = code;
    this.recoverable = options?.recoverable ?? false;
  }
}

/**
 * 类型守卫：检查是否为 StampverError 实例
 */
export function isStampverError(error: unknown): error is StampverError {
  return error instanceof StampverError;
}

/** 状态文件不存在，无法确定安全的计数器值 */
export class MissingStateError extends StampverError {
  public readonly filePath: string;

  constructor(filePath: string, options?: ErrorOptions) {
    super(
      `Version state file not found: ${filePath} (run "stampver init" to create it)`,
      'MISSING_STATE',
      options,
    );
    this.name = 'MissingStateError';
    this.filePath = filePath;
  }
}

/** 状态文件存在但内容无法解析为 {year, build} */
export class CorruptStateError extends StampverError {
  public readonly filePath: string;
  /** 出错的字段（JSON 语法错误时为 undefined） */
  public readonly field: string | undefined;

  constructor(filePath: string, detail: string, field?: string, options?: ErrorOptions) {
    super(
      `Version state file ${filePath} is corrupt${field ? ` (field "${field}")` : ''}: ${detail}. Expected ${EXPECTED_STATE_SHAPE}`,
      'CORRUPT_STATE',
      options,
    );
    this.name = 'CorruptStateError';
    this.filePath = filePath;
    this.field = field;
  }
}

/** --version-override 参数不是 YEAR.BUILD */
export class InvalidOverrideFormatError extends StampverError {
  public readonly input: string;

  constructor(input: string) {
    super(
      `Invalid version override "${input}": expected ${EXPECTED_OVERRIDE_SHAPE}`,
      'INVALID_OVERRIDE_FORMAT',
    );
    this.name = 'InvalidOverrideFormatError';
    this.input = input;
  }
}

/** 必需目标文件（如源码常量文件所在目录）缺失 */
export class MissingRequiredTargetError extends StampverError {
  public readonly targetId: string;
  public readonly filePath: string;

  constructor(targetId: string, filePath: string, options?: ErrorOptions) {
    super(
      `Required target "${targetId}" is missing: ${filePath}`,
      'MISSING_REQUIRED_TARGET',
      options,
    );
    this.name = 'MissingRequiredTargetError';
    this.targetId = targetId;
    this.filePath = filePath;
  }
}

/** 可选目标文件缺失：记录日志后跳过 */
export class MissingOptionalTargetError extends StampverError {
  public readonly targetId: string;
  public readonly filePath: string;

  constructor(targetId: string, filePath: string) {
    super(
      `Optional target "${targetId}" not found, skipping: ${filePath}`,
      'MISSING_OPTIONAL_TARGET',
      { recoverable: true },
    );
    this.name = 'MissingOptionalTargetError';
    this.targetId = targetId;
    this.filePath = filePath;
  }
}

/** git add / git commit 失败；此时文件修改已经落盘 */
export class CommitFailedError extends StampverError {
  public readonly command: string;
  public readonly stderr: string;

  constructor(command: string, stderr: string, options?: ErrorOptions) {
    const detail = stderr.trim();
    super(
      `Git command failed: ${command}${detail ? `\n${detail}` : ''}\nFile edits from this run were kept and are not rolled back.`,
      'COMMIT_FAILED',
      options,
    );
    this.name = 'CommitFailedError';
    this.command = command;
    this.stderr = stderr;
  }
}

/** 另一个进程正在持有状态锁 */
export class StateLockedError extends StampverError {
  public readonly lockPath: string;
  public readonly holderPid: number | undefined;

  constructor(lockPath: string, holderPid?: number) {
    super(
      `Version state is locked by ${holderPid ? `process ${holderPid}` : 'another process'}: ${lockPath}`,
      'STATE_LOCKED',
    );
    this.name = 'StateLockedError';
    this.lockPath = lockPath;
    this.holderPid = holderPid;
  }
}

/** 配置错误 */
export class ConfigurationError extends StampverError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.name = 'ConfigurationError';
  }
}

/** --only 指定的目标不存在 */
export class UnknownTargetError extends StampverError {
  public readonly targetId: string;
  public readonly available: string[];

  constructor(targetId: string, available: string[]) {
    super(
      `Unknown target: "${targetId}". Available: [${available.join(', ')}]`,
      'UNKNOWN_TARGET',
    );
    this.name = 'UnknownTargetError';
    this.targetId = targetId;
    this.available = available;
  }
}
