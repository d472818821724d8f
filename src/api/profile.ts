/**
 * 个人资料 API 封装
 *
 * 使用会话 Store 提供的 API 客户端
 */

import { API_ENDPOINTS, PROFILE_PICTURE_FIELD } from '../config';
import {
  ProfileUpdateResponseSchema,
  UserProfileSchema,
  type Account,
  type ProfileFields,
  type UserProfile,
} from '../types/account';
import type { BinarySource, UploadFields } from '../types/upload';
import { DecodeError } from './errors';
import type { ApiClient } from './client';

/** 资料更新结果 */
export interface ProfileUpdateResult {
  account: Account;
  profile: UserProfile;
}

/**
 * 获取个人资料
 */
export function getProfile(api: ApiClient): Promise<UserProfile> {
  return api.fetchData(API_ENDPOINTS.USER_PROFILE, {}, UserProfileSchema);
}

/**
 * 更新个人资料
 *
 * 有头像时走 multipart 上传，否则走 JSON PUT
 */
export async function updateProfile(
  api: ApiClient,
  fields: ProfileFields,
  picture: BinarySource | null,
): Promise<ProfileUpdateResult> {
  const payload = buildProfilePayload(fields);

  const response = picture
    ? await api.uploadImage(API_ENDPOINTS.USER_PROFILE, {
      fields: payload,
      source: picture,
      fieldName: PROFILE_PICTURE_FIELD,
    }, ProfileUpdateResponseSchema)
    : await api.fetchData(API_ENDPOINTS.USER_PROFILE, {
      method: 'PUT',
      body: payload,
    }, ProfileUpdateResponseSchema);

  // 资料可能在 user_profile、profile 下，也可能直接平铺
  const rawProfile = response.user_profile ?? response.profile ?? response;
  const profile = UserProfileSchema.safeParse(rawProfile);
  if (!profile.success) {
    throw new DecodeError(`资料更新响应中的资料无效: ${profile.error.message}`, {
      cause: profile.error,
    });
  }

  return { account: response.user, profile: profile.data };
}

/**
 * 生成资料更新请求字段
 *
 * bio、birthdate 为空时不发送，避免覆盖服务器已有值
 */
export function buildProfilePayload(fields: ProfileFields): UploadFields {
  const payload: UploadFields = {
    first_name: fields.firstName,
    last_name: fields.lastName,
    email: fields.email,
  };

  if (fields.bio !== undefined && fields.bio !== null) {
    payload.bio = fields.bio;
  }
  if (fields.birthdate !== undefined && fields.birthdate !== null) {
    payload.birthdate = formatBirthdate(fields.birthdate);
  }

  return payload;
}

/**
 * 格式化生日为 yyyy-MM-dd（按本地日期）
 */
export function formatBirthdate(value: Date | string): string {
  if (typeof value === 'string') {
    return value;
  }
  const year = String(value.getFullYear()).padStart(4, '0');
  const month = String(value.getMonth() + 1).padStart(2, '0');
  const day = String(value.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
