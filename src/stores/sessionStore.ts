/**
 * 会话状态 Store (Zustand)
 *
 * 管理当前登录的账号、个人资料和会话令牌：
 * - 登录 / 登出 / 注册
 * - 启动时校验已保存的令牌（单飞：并发调用共享同一个请求）
 * - 获取和更新个人资料（含头像上传）
 *
 * 每个操作只调用一次 set，订阅者不会看到更新了一半的状态。
 * Store 由 createSessionStore 显式创建并向下传递，不使用全局单例。
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import * as authApi from '../api/auth';
import * as profileApi from '../api/profile';
import { createApiClient, resolveBinarySource, type ApiClientConfig } from '../api/client';
import { InvalidArgumentError, isApiError } from '../api/errors';
import type { TokenStore } from '../services/tokenStore';
import type { BinarySource } from '../types/upload';
import type { SessionState, SessionStore, UpdateProfileInput } from '../types/session';

// ============================================
// 类型定义
// ============================================

export interface SessionStoreOptions {
  /** 令牌持久化 */
  tokenStore: TokenStore;
  /** 请求配置，令牌来源由 Store 提供 */
  client: Omit<ApiClientConfig, 'getToken'>;
}

export type SessionStoreApi = StoreApi<SessionStore>;

const EMPTY_SESSION: SessionState = {
  account: null,
  profile: null,
  token: null,
};

// ============================================
// Store 实现
// ============================================

export function createSessionStore(options: SessionStoreOptions): SessionStoreApi {
  const { tokenStore, client } = options;

  // 进行中的令牌校验
  let validation: Promise<boolean> | null = null;
  // 会话代数，每次登录或清除会话时加一
  let generation = 0;

  return createStore<SessionStore>()((set, get) => {
    // 认证请求只使用内存中的令牌，未登录时直接抛出 AuthError
    const api = createApiClient({
      ...client,
      getToken: () => get().token,
    });

    /**
     * 请求期间会话被清除或切换时，丢弃返回的结果
     */
    function isSameSession(startGeneration: number, startToken: string | null): boolean {
      const { token } = get();
      return generation === startGeneration && token !== null && token === startToken;
    }

    async function validateStoredToken(): Promise<boolean> {
      const startGeneration = generation;
      try {
        const storedToken = await tokenStore.get();
        if (!storedToken) {
          return false;
        }

        const { user } = await authApi.validateToken(api, storedToken);
        if (generation !== startGeneration) {
          console.warn('[Session] 会话已变化，丢弃令牌校验结果');
          return false;
        }
        set({ account: user, token: storedToken });
        return true;
      } catch (error) {
        // 校验失败可能只是暂时离线，不清除令牌
        console.warn('[Session] 令牌校验失败:', isApiError(error) ? error.code : 'UNKNOWN', error);
        return false;
      }
    }

    return {
      ...EMPTY_SESSION,
      api,

      login: async (phoneNumber, password, onSuccess) => {
        const { user, session_token: sessionToken } = await authApi.login(api, phoneNumber, password);

        await tokenStore.set(sessionToken);
        generation += 1;
        // 上一个账号的资料不再有效，需重新获取
        set({ account: user, token: sessionToken, profile: null });

        onSuccess?.();
      },

      logout: async () => {
        try {
          // 启动后尚未校验时，用已保存的令牌通知服务器
          await authApi.logout(api, get().token ?? await tokenStore.get());
        } catch (error) {
          console.warn('[Session] 登出请求失败:', error);
        } finally {
          await get().clearCurrentAccount();
        }
      },

      register: (data) => authApi.register(api, data),

      fetchUserProfile: async () => {
        const startGeneration = generation;
        const startToken = get().token;
        const profile = await profileApi.getProfile(api);

        if (!isSameSession(startGeneration, startToken)) {
          console.warn('[Session] 会话已变化，丢弃个人资料');
          return;
        }
        set({ profile });
      },

      updateProfile: async (input) => {
        const picture = pickPicture(input);
        const startGeneration = generation;
        const startToken = get().token;

        const { account, profile } = await profileApi.updateProfile(api, input, picture);

        if (!isSameSession(startGeneration, startToken)) {
          console.warn('[Session] 会话已变化，丢弃资料更新结果');
          return;
        }
        set({ account, profile });
      },

      isSessionValid: () => {
        if (!validation) {
          validation = validateStoredToken().finally(() => {
            validation = null;
          });
        }
        return validation;
      },

      setCurrentAccount: (account) => {
        if (get().token === null) {
          console.warn('[Session] 未登录，忽略 setCurrentAccount');
          return;
        }
        set({ account });
      },

      setUserProfile: (profile) => {
        set({ profile });
      },

      clearCurrentAccount: async () => {
        generation += 1;
        try {
          await tokenStore.remove();
        } catch (error) {
          console.warn('[Session] 删除已保存的令牌失败:', error);
        }
        set({ ...EMPTY_SESSION });
      },
    };
  });
}

/**
 * 取出头像来源
 *
 * picture 与旧参数 profilePicture / pictureBytes 只能提供一个
 */
function pickPicture(input: UpdateProfileInput): BinarySource | null {
  const legacy = resolveBinarySource(input.profilePicture, input.pictureBytes);
  if (input.picture && legacy) {
    throw new InvalidArgumentError('头像只能提供一个来源');
  }
  return input.picture ?? legacy;
}

// ============================================
// 选择器
// ============================================

export const selectIsAuthenticated = (state: SessionStore): boolean =>
  state.account !== null && state.token !== null;

export const selectAccount = (state: SessionStore) => state.account;

export const selectProfile = (state: SessionStore) => state.profile;
