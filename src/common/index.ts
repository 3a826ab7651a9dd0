/**
 * 公共工具模块 — 提供跨模块共享的基础设施。
 *
 * 核心导出:
 * - Logger / createLogger: 基于 pino 的结构化日志工具
 * - StampverError 及其子类: 统一错误类型体系
 * - 常量定义
 */

export {
  type Logger,
  type LoggerOptions,
  createLogger,
  createChildLogger,
  getRootLogger,
  configureRootLogger,
  withCorrelationId,
  getCorrelationId,
} from './logger.ts';
export {
  StampverError,
  MissingStateError,
  CorruptStateError,
  InvalidOverrideFormatError,
  MissingRequiredTargetError,
  MissingOptionalTargetError,
  CommitFailedError,
  StateLockedError,
  ConfigurationError,
  UnknownTargetError,
  isStampverError,
  EXPECTED_STATE_SHAPE,
  EXPECTED_OVERRIDE_SHAPE,
} from './errors.ts';
export {
  DEFAULT_LOG_LEVEL,
  DEFAULT_STATE_FILE,
  DEFAULT_CONFIG_FILE,
  DEFAULT_GIT_TIMEOUT_MS,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_COMMIT_MARKER,
  DEFAULT_COMMIT_MESSAGE_TEMPLATE,
} from './constants.ts';
