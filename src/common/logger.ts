/**
 * 日志基础设施 — 基于 pino 的结构化日志工具。
 * 支持 JSON（生产）和人类可读（开发）两种输出格式，日志统一写到 stderr，
 * stdout 留给命令输出；通过 AsyncLocalStorage 传播运行 ID。
 *
 * 核心导出:
 * - Logger: pino Logger 类型别名
 * - createLogger: 创建根日志实例
 * - createChildLogger: 创建带模块上下文的子日志实例
 * - getRootLogger / configureRootLogger: 进程级根日志实例
 * - withCorrelationId / getCorrelationId: 运行 ID 上下文
 */

import pino from 'pino';
import pretty from 'pino-pretty';
import { AsyncLocalStorage } from 'node:async_hooks';
import { DEFAULT_LOG_LEVEL } from './constants.ts';

// 关联 ID 上下文存储
const correlationStore = new AsyncLocalStorage<string>();

/** pino Logger 类型别名 */
export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  name?: string;
}

let rootLogger: Logger | null = null;

/** 获取当前关联 ID */
export function getCorrelationId(): string | undefined {
  return correlationStore.getStore();
}

/** 在关联 ID 上下文中执行函数 */
export function withCorrelationId<T>(correlationId: string, fn: () => T): T {
  return correlationStore.run(correlationId, fn);
}

/**
 * 创建根日志实例。
 * 非 production 环境使用 pino-pretty 同步格式化输出，production 输出 JSON。
 */
export function createLogger(options?: LoggerOptions): Logger {
  const isDev = process.env.NODE_ENV !== 'production';
  const level = options?.level ?? process.env.LOG_LEVEL ?? DEFAULT_LOG_LEVEL;

  const pinoOptions: pino.LoggerOptions = {
    name: options?.name ?? 'stampver',
    level,
    // 注入关联 ID 到每条日志
    mixin() {
      const correlationId = getCorrelationId();
      return correlationId ? { correlationId } : {};
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const stream = isDev
    ? pretty({
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,name',
        destination: 2,
        sync: true,
      })
    : pino.destination({ dest: 2, sync: true });

  return pino(pinoOptions, stream);
}

/**
 * 创建带模块上下文的子日志实例。
 * 子日志继承父日志配置，并自动附加模块名。
 */
export function createChildLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}

/** 进程级根日志（首次访问时按环境变量创建） */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

/**
 * 重新配置根日志（CLI 解析 --verbose 后调用）。
 * 已创建的子日志不会跟随变化，因此应在构造引擎之前调用。
 */
export function configureRootLogger(options: LoggerOptions): Logger {
  rootLogger = createLogger(options);
  return rootLogger;
}
