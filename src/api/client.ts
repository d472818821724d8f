/**
 * API 客户端
 *
 * 提供绑定了 baseUrl 和令牌来源的请求方法：
 * - fetchData: JSON 请求
 * - uploadImage: multipart 上传（文本字段 + 一个二进制字段）
 *
 * 两种请求共用同一套认证头处理和错误分类（见 ./errors）
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { z } from 'zod';
import type { BinarySource, UploadFields } from '../types/upload';
import {
  AuthError,
  DecodeError,
  HttpError,
  InvalidArgumentError,
  NetworkError,
} from './errors';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/** 响应校验器 */
export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ApiClientConfig {
  /** 服务器 URL */
  baseUrl: string;
  /** 令牌来源，每次认证请求时调用 */
  getToken: () => string | null | Promise<string | null>;
  /** 请求超时（毫秒） */
  timeoutMs?: number;
  /** Authorization 头前缀，null 时发送裸令牌 */
  authScheme?: string | null;
}

export interface FetchOptions {
  /** HTTP 方法 */
  method?: HttpMethod;
  /** 是否需要认证，默认 true */
  requiresAuth?: boolean;
  /** 请求体，序列化为 JSON */
  body?: Record<string, unknown>;
  /** 指定本次请求使用的令牌，不经过 getToken */
  token?: string;
}

export interface UploadOptions {
  /** 文本字段 */
  fields: UploadFields;
  /** 二进制数据来源 */
  source: BinarySource;
  /** 二进制字段名 */
  fieldName: string;
  /** HTTP 方法，默认 PUT */
  method?: HttpMethod;
  requiresAuth?: boolean;
}

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.heic': 'image/heic',
};

/**
 * 创建 API 客户端
 */
export function createApiClient(config: ApiClientConfig) {
  const { baseUrl, getToken, timeoutMs = 30_000, authScheme = 'Bearer' } = config;

  /**
   * 生成认证头
   *
   * @throws AuthError 需要认证但没有令牌
   */
  async function authorize(
    requiresAuth: boolean,
    explicitToken?: string,
  ): Promise<Record<string, string>> {
    if (!requiresAuth) {
      return {};
    }

    const token = explicitToken ?? await getToken();
    if (!token) {
      throw new AuthError();
    }
    return { Authorization: authScheme ? `${authScheme} ${token}` : token };
  }

  /**
   * 发送请求并解析 JSON 响应
   */
  async function send(
    method: HttpMethod,
    endpoint: string,
    headers: Record<string, string>,
    body?: string | FormData,
  ): Promise<unknown> {
    let response: Response;
    let text: string;
    try {
      response = await fetch(`${baseUrl}${endpoint}`, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      // AbortSignal.timeout 触发时抛出的是 name 为 TimeoutError 的 DOMException
      const timedOut = typeof error === 'object' && error !== null
        && 'name' in error && error.name === 'TimeoutError';
      throw new NetworkError(
        timedOut
          ? `${method} ${endpoint} 超时（${timeoutMs}ms）`
          : `${method} ${endpoint} 网络错误: ${error instanceof Error ? error.message : String(error)}`,
        timedOut,
        error,
      );
    }

    if (!response.ok) {
      throw new HttpError(response.status, parseLoose(text));
    }

    if (response.status === 204) {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new DecodeError(`${method} ${endpoint} 响应不是合法 JSON`, { cause: error });
    }
  }

  function decodeWith<T>(decoder: Decoder<T>, data: unknown, endpoint: string): T {
    const result = decoder.safeParse(data);
    if (!result.success) {
      throw new DecodeError(`${endpoint} 响应结构不符: ${result.error.message}`, {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * JSON 请求
   *
   * 传入 decoder 时用其校验响应，否则返回未校验的数据
   */
  async function fetchData(endpoint: string, options?: FetchOptions): Promise<unknown>;
  async function fetchData<T>(endpoint: string, options: FetchOptions, decoder: Decoder<T>): Promise<T>;
  async function fetchData<T>(
    endpoint: string,
    options: FetchOptions = {},
    decoder?: Decoder<T>,
  ): Promise<unknown> {
    const { method = 'GET', requiresAuth = true, body, token } = options;

    const headers = await authorize(requiresAuth, token);
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const data = await send(
      method,
      endpoint,
      headers,
      body !== undefined ? JSON.stringify(body) : undefined,
    );
    return decoder ? decodeWith(decoder, data, endpoint) : data;
  }

  /**
   * multipart 上传
   *
   * Content-Type（含 boundary）由 FormData 生成，不手动设置
   */
  async function uploadImage(endpoint: string, options: UploadOptions): Promise<unknown>;
  async function uploadImage<T>(endpoint: string, options: UploadOptions, decoder: Decoder<T>): Promise<T>;
  async function uploadImage<T>(
    endpoint: string,
    options: UploadOptions,
    decoder?: Decoder<T>,
  ): Promise<unknown> {
    const { fields, source, fieldName, method = 'PUT', requiresAuth = true } = options;

    assertBinarySource(source);
    if (!fieldName) {
      throw new InvalidArgumentError('上传字段名不能为空');
    }

    const headers = await authorize(requiresAuth);

    const formData = new FormData();
    for (const [name, value] of Object.entries(fields)) {
      formData.append(name, value);
    }

    const { data, filename, contentType } = await loadBinary(source);
    formData.append(fieldName, new Blob([data], { type: contentType }), filename);

    const result = await send(method, endpoint, headers, formData);
    return decoder ? decodeWith(decoder, result, endpoint) : result;
  }

  return {
    fetchData,
    uploadImage,

    /**
     * 获取当前 baseUrl
     */
    getBaseUrl(): string {
      return baseUrl;
    },
  };
}

/** API 客户端类型 */
export type ApiClient = ReturnType<typeof createApiClient>;

// ============================================
// 二进制来源
// ============================================

/**
 * 由旧式的两个可选参数得到 BinarySource
 *
 * @returns 都未提供时返回 null
 * @throws InvalidArgumentError 同时提供文件路径和字节数据
 */
export function resolveBinarySource(
  filePath: string | undefined,
  bytes: Uint8Array | undefined,
): BinarySource | null {
  if (filePath !== undefined && bytes !== undefined) {
    throw new InvalidArgumentError('文件路径和字节数据只能提供一个');
  }
  if (filePath !== undefined) {
    return { kind: 'file', path: filePath };
  }
  if (bytes !== undefined) {
    return { kind: 'bytes', data: bytes };
  }
  return null;
}

function assertBinarySource(source: BinarySource | undefined): void {
  if (!source) {
    throw new InvalidArgumentError('缺少上传数据');
  }
  if (source.kind === 'file' && !source.path) {
    throw new InvalidArgumentError('文件路径不能为空');
  }
  if (source.kind === 'bytes' && !(source.data instanceof Uint8Array)) {
    throw new InvalidArgumentError('字节数据必须是 Uint8Array');
  }
}

async function loadBinary(
  source: BinarySource,
): Promise<{ data: Uint8Array; filename: string; contentType: string }> {
  if (source.kind === 'bytes') {
    const filename = source.filename ?? 'upload.bin';
    return {
      data: source.data,
      filename,
      contentType: source.contentType ?? guessContentType(filename),
    };
  }

  let data: Uint8Array;
  try {
    data = await readFile(source.path);
  } catch (error) {
    throw new InvalidArgumentError(`无法读取文件 ${source.path}`, { cause: error });
  }
  const filename = source.filename ?? basename(source.path);
  return {
    data,
    filename,
    contentType: source.contentType ?? guessContentType(filename),
  };
}

function guessContentType(filename: string): string {
  return MIME_TYPES[extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

/** 错误响应体尽量按 JSON 解析，失败时保留原文 */
function parseLoose(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
