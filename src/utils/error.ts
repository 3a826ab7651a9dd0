/**
 * 方法说明：读取并返回错误信息文本。
 * @param error 错误对象。
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 判断是否为带 code 的 Node 系统错误（如 ENOENT）
 */
export function isNodeError(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return code === undefined || error.code === code;
}
