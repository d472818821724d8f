/**
 * 认证 API 封装
 *
 * 调用服务器格式使用下划线 "_"
 */

import { z } from 'zod';
import { API_ENDPOINTS } from '../config';
import {
  AccountSchema,
  LoginResponseSchema,
  ValidateTokenResponseSchema,
  type Account,
  type LoginResponse,
  type RegisterData,
  type ValidateTokenResponse,
} from '../types/account';
import type { ApiClient } from './client';

const LogoutResponseSchema = z.object({ message: z.string().optional() }).passthrough();

/**
 * 用户登录
 */
export function login(
  api: ApiClient,
  phoneNumber: string,
  password: string,
): Promise<LoginResponse> {
  return api.fetchData(API_ENDPOINTS.AUTH_LOGIN, {
    method: 'POST',
    requiresAuth: false,
    body: {
      phone_number: phoneNumber,
      password,
    },
  }, LoginResponseSchema);
}

/**
 * 用户登出
 *
 * 传入的令牌同时用于认证头和请求体，服务器两处都会查找。
 * 未传入时使用客户端当前的令牌。
 */
export async function logout(api: ApiClient, sessionToken: string | null): Promise<void> {
  await api.fetchData(API_ENDPOINTS.AUTH_LOGOUT, {
    method: 'POST',
    body: sessionToken ? { session_token: sessionToken } : {},
    token: sessionToken ?? undefined,
  }, LogoutResponseSchema);
}

/**
 * 用户注册
 *
 * 用户名即手机号
 */
export function register(api: ApiClient, data: RegisterData): Promise<Account> {
  return api.fetchData(API_ENDPOINTS.AUTH_REGISTER, {
    method: 'POST',
    requiresAuth: false,
    body: {
      username: data.phoneNumber,
      first_name: data.firstName,
      last_name: data.lastName,
      email: data.email,
      phone_number: data.phoneNumber,
      password: data.password,
      password2: data.password2,
    },
  }, AccountSchema);
}

/**
 * 校验会话令牌
 *
 * 不走认证头，令牌放在请求体中
 */
export function validateToken(
  api: ApiClient,
  sessionToken: string,
): Promise<ValidateTokenResponse> {
  return api.fetchData(API_ENDPOINTS.AUTH_VALIDATE_TOKEN, {
    method: 'POST',
    requiresAuth: false,
    body: { session_token: sessionToken },
  }, ValidateTokenResponseSchema);
}
