/**
 * API 错误类型
 *
 * 请求管线的所有失败都归入以下五类，会话状态据此统一处理：
 * - InvalidArgumentError: 调用方违反约定（如同时提供文件路径和字节数据）
 * - AuthError: 需要认证的请求缺少令牌
 * - HttpError: 服务器返回非 2xx 状态码
 * - NetworkError: 传输层失败（超时、DNS、连接重置）
 * - DecodeError: 响应体不是合法 JSON 或结构不符
 */

export type ApiErrorCode =
  | 'INVALID_ARGUMENT'
  | 'AUTH_REQUIRED'
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'DECODE_ERROR';

/** 所有 API 错误的基类 */
export abstract class ApiError extends Error {
  abstract readonly code: ApiErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends ApiError {
  readonly code = 'INVALID_ARGUMENT';
}

export class AuthError extends ApiError {
  readonly code = 'AUTH_REQUIRED';

  constructor(message = '未登录，缺少会话令牌') {
    super(message);
  }
}

export class HttpError extends ApiError {
  readonly code = 'HTTP_ERROR';

  constructor(
    readonly status: number,
    /** 响应体（能解析为 JSON 时为对象，否则为原始文本） */
    readonly body: unknown,
  ) {
    super(extractServerMessage(body) ?? `HTTP ${status}`);
  }
}

export class NetworkError extends ApiError {
  readonly code = 'NETWORK_ERROR';

  constructor(
    message: string,
    /** 是否因超时中止 */
    readonly timedOut: boolean,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class DecodeError extends ApiError {
  readonly code = 'DECODE_ERROR';
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * 从错误响应体中取出服务器给出的提示
 *
 * 后端使用 error / message / detail 三种字段名
 */
function extractServerMessage(body: unknown): string | null {
  if (typeof body !== 'object' || body === null) {
    return null;
  }

  for (const field of ['error', 'message', 'detail']) {
    const value: unknown = Reflect.get(body, field);
    if (typeof value === 'string' && value) {
      return value;
    }
  }
  return null;
}
