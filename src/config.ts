/**
 * 客户端配置
 *
 * 集中管理会话核心的配置，包括：
 * - 服务器地址与各接口路径
 * - 请求超时
 * - 令牌持久化目录
 *
 * 优先级：显式传入 > 环境变量 > 默认值
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { InvalidArgumentError } from './api/errors';

// ============================================
// 接口路径
// ============================================

export const API_ENDPOINTS = {
  AUTH_LOGIN: '/auth/login',
  AUTH_LOGOUT: '/auth/logout',
  AUTH_REGISTER: '/auth/register',
  AUTH_VALIDATE_TOKEN: '/auth/validate-token',
  USER_PROFILE: '/user/profile',
  AUTO_REPLY_SETTINGS: '/user/settings/auto-reply',
  FONT_SETTINGS: '/user/settings/font',
  DARK_MODE: '/user/settings/dark-mode',
  TWO_FACTOR_SETUP: '/user/two-factor',
  EMAIL_SEND: '/emails/send',
  EMAIL_SEARCH: '/emails/search',
} as const;

// ============================================
// 默认值
// ============================================

/** 默认服务器地址（本地开发） */
export const DEFAULT_BASE_URL = 'http://localhost:8000/api';

/** 单次请求超时（毫秒） */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Authorization 头前缀，null 表示直接发送裸令牌 */
export const DEFAULT_AUTH_SCHEME = 'Bearer';

/** 令牌存储域名和键名 */
export const TOKEN_STORE_DOMAIN = 'mail_client';
export const SESSION_TOKEN_KEY = 'session_token';

/** 头像上传字段名 */
export const PROFILE_PICTURE_FIELD = 'profile_picture';

// ============================================
// 配置解析
// ============================================

export interface ClientConfig {
  baseUrl: string;
  timeoutMs: number;
  authScheme: string | null;
  /** 令牌文件所在目录 */
  dataDir: string;
}

const envSchema = z.object({
  MAIL_API_BASE_URL: z.string().url().optional(),
  MAIL_API_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  // 设为 "none" 时发送裸令牌
  MAIL_API_AUTH_SCHEME: z.string().min(1).optional(),
  MAIL_DATA_DIR: z.string().min(1).optional(),
});

/**
 * 解析客户端配置
 *
 * @param overrides - 显式指定的配置项
 * @param env - 环境变量来源，测试时可传入普通对象
 * @throws InvalidArgumentError 环境变量格式不正确时
 */
export function resolveClientConfig(
  overrides: Partial<ClientConfig> = {},
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(
      `环境变量 ${issue?.path.join('.') ?? ''} 无效: ${issue?.message ?? parsed.error.message}`,
    );
  }
  const fromEnv = parsed.data;

  let envScheme: string | null | undefined;
  if (fromEnv.MAIL_API_AUTH_SCHEME !== undefined) {
    envScheme = fromEnv.MAIL_API_AUTH_SCHEME.toLowerCase() === 'none'
      ? null
      : fromEnv.MAIL_API_AUTH_SCHEME;
  }

  const baseUrl = overrides.baseUrl ?? fromEnv.MAIL_API_BASE_URL ?? DEFAULT_BASE_URL;

  return {
    // 去掉末尾斜杠，接口路径都以 / 开头
    baseUrl: baseUrl.replace(/\/+$/, ''),
    timeoutMs: overrides.timeoutMs ?? fromEnv.MAIL_API_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    authScheme: overrides.authScheme !== undefined
      ? overrides.authScheme
      : envScheme !== undefined ? envScheme : DEFAULT_AUTH_SCHEME,
    dataDir: overrides.dataDir
      ?? fromEnv.MAIL_DATA_DIR?.replace(/^~/, homedir())
      ?? join(homedir(), '.mail-client'),
  };
}
