/**
 * 账号相关类型定义
 *
 * 本地调用格式使用驼峰
 * 调用服务器格式使用下划线 "_"
 *
 * 服务器返回的数据一律经 zod 校验后再进入会话状态
 */

import { z } from 'zod';

// ============================================
// 服务器数据结构
// ============================================

/** 账号身份信息 */
export const AccountSchema = z.object({
  id: z.union([z.number(), z.string()]),
  username: z.string().optional(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  phone_number: z.string(),
});

export type Account = Readonly<z.infer<typeof AccountSchema>>;

/** 个人资料（与账号一对一） */
export const UserProfileSchema = z.object({
  bio: z.string().nullish(),
  /** yyyy-MM-dd */
  birthdate: z.string().nullish(),
  /** 头像地址 */
  profile_picture: z.string().nullish(),
  two_factor_enabled: z.boolean().optional(),
});

export type UserProfile = Readonly<z.infer<typeof UserProfileSchema>>;

// ============================================
// 接口响应
// ============================================

/** 登录响应 */
export const LoginResponseSchema = z.object({
  user: AccountSchema,
  session_token: z.string().min(1),
});

export type LoginResponse = z.infer<typeof LoginResponseSchema>;

/** 令牌校验响应 */
export const ValidateTokenResponseSchema = z.object({
  user: AccountSchema,
  message: z.string().optional(),
});

export type ValidateTokenResponse = z.infer<typeof ValidateTokenResponseSchema>;

/**
 * 资料更新响应
 *
 * 资料可能嵌套在 user_profile / profile 下，也可能与 user 平铺在同一层，
 * 原始对象保留下来由调用方按顺序挑选
 */
export const ProfileUpdateResponseSchema = z.object({
  user: AccountSchema,
  user_profile: z.unknown().optional(),
  profile: z.unknown().optional(),
}).passthrough();

export type ProfileUpdateResponse = z.infer<typeof ProfileUpdateResponseSchema>;

// ============================================
// 请求数据
// ============================================

/** 注册数据 */
export interface RegisterData {
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  password: string;
  /** 确认密码，由服务器比对 */
  password2: string;
}

/** 资料更新中的标量字段 */
export interface ProfileFields {
  firstName: string;
  lastName: string;
  email: string;
  /** 不传或 null 时不发送，避免覆盖服务器已有值 */
  bio?: string | null;
  /** Date 会格式化为 yyyy-MM-dd */
  birthdate?: Date | string | null;
}

// ============================================
// 两步验证
// ============================================

/** 申请验证码响应（开发环境下服务器会直接返回验证码） */
export const TwoFactorCodeResponseSchema = z.object({
  message: z.string(),
  verification_code: z.string().optional(),
});

export type TwoFactorCodeResponse = z.infer<typeof TwoFactorCodeResponseSchema>;

/** 开启两步验证响应 */
export const TwoFactorEnableResponseSchema = z.object({
  message: z.string(),
});
