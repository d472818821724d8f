/**
 * 会话相关类型定义
 *
 * 用于管理登录后的会话状态
 */

import type { ApiClient } from '../api/client';
import type { Account, ProfileFields, RegisterData, UserProfile } from './account';
import type { BinarySource } from './upload';

/**
 * 会话状态
 *
 * account 与 token 同时存在或同时为空
 */
export interface SessionState {
  /** 当前账号（null 表示未登录） */
  account: Account | null;
  /** 个人资料，登录后按需获取 */
  profile: UserProfile | null;
  /** 会话令牌 */
  token: string | null;
}

/** 资料更新参数 */
export interface UpdateProfileInput extends ProfileFields {
  /** 新头像 */
  picture?: BinarySource;
  /** 头像文件路径（旧接口，与 pictureBytes 互斥） */
  profilePicture?: string;
  /** 头像字节数据（旧接口，与 profilePicture 互斥） */
  pictureBytes?: Uint8Array;
}

/** 会话操作 */
export interface SessionActions {
  /** 登录，成功后先通知订阅者再调用 onSuccess */
  login: (phoneNumber: string, password: string, onSuccess?: () => void) => Promise<void>;
  /** 登出，本地状态总会被清除 */
  logout: () => Promise<void>;
  /** 注册，不会自动登录 */
  register: (data: RegisterData) => Promise<Account>;
  /** 获取个人资料 */
  fetchUserProfile: () => Promise<void>;
  /** 更新账号和个人资料 */
  updateProfile: (input: UpdateProfileInput) => Promise<void>;
  /** 启动时校验已保存的令牌 */
  isSessionValid: () => Promise<boolean>;
  /** 设置当前账号（仅在已登录时生效） */
  setCurrentAccount: (account: Account) => void;
  /** 设置个人资料 */
  setUserProfile: (profile: UserProfile) => void;
  /** 清除会话和已保存的令牌 */
  clearCurrentAccount: () => Promise<void>;
}

export type SessionStore = SessionState & SessionActions & {
  /** 绑定了当前会话令牌的 API 客户端 */
  api: ApiClient;
};
