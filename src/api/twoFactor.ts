/**
 * 两步验证 API 封装
 *
 * 流程：申请验证码 → 提交验证码开启
 */

import { API_ENDPOINTS } from '../config';
import {
  TwoFactorCodeResponseSchema,
  TwoFactorEnableResponseSchema,
  type TwoFactorCodeResponse,
} from '../types/account';
import { InvalidArgumentError } from './errors';
import type { ApiClient } from './client';

/** 验证码为 6 位数字 */
const VERIFICATION_CODE_PATTERN = /^\d{6}$/;

/**
 * 申请验证码
 */
export function requestTwoFactorCode(api: ApiClient): Promise<TwoFactorCodeResponse> {
  return api.fetchData(API_ENDPOINTS.TWO_FACTOR_SETUP, {
    method: 'POST',
  }, TwoFactorCodeResponseSchema);
}

/**
 * 提交验证码，开启两步验证
 *
 * @returns 服务器返回的提示信息
 * @throws InvalidArgumentError 验证码格式不对（不发请求）
 */
export async function enableTwoFactor(api: ApiClient, verificationCode: string): Promise<string> {
  const code = verificationCode.trim();
  if (!VERIFICATION_CODE_PATTERN.test(code)) {
    throw new InvalidArgumentError('验证码必须是 6 位数字');
  }

  const { message } = await api.fetchData(API_ENDPOINTS.TWO_FACTOR_SETUP, {
    method: 'PUT',
    body: { verification_code: code },
  }, TwoFactorEnableResponseSchema);
  return message;
}
