/**
 * 邮件客户端会话核心
 *
 * createMailClient 在启动时调用一次，返回的句柄向下传递给需要会话的模块
 *
 * @example
 * ```ts
 * const { session } = createMailClient({ baseUrl: 'https://mail.example.com/api' });
 *
 * session.subscribe((state) => render(state));
 *
 * if (!(await session.getState().isSessionValid())) {
 *   await session.getState().login('+15550001', 'password', () => showInbox());
 * }
 * ```
 */

import { resolveClientConfig, type ClientConfig } from './config';
import { createFileTokenStore, type TokenStore } from './services/tokenStore';
import { createSessionStore, type SessionStoreApi } from './stores';

export interface MailClient {
  config: ClientConfig;
  tokenStore: TokenStore;
  session: SessionStoreApi;
}

export interface MailClientOptions extends Partial<ClientConfig> {
  /** 自定义令牌存储，默认写入 dataDir 下的文件 */
  tokenStore?: TokenStore;
}

/**
 * 创建客户端句柄
 */
export function createMailClient(options: MailClientOptions = {}): MailClient {
  const { tokenStore: customStore, ...overrides } = options;
  const config = resolveClientConfig(overrides);
  const tokenStore = customStore ?? createFileTokenStore({ dataDir: config.dataDir });

  const session = createSessionStore({
    tokenStore,
    client: {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      authScheme: config.authScheme,
    },
  });

  return { config, tokenStore, session };
}

export * from './config';
export * from './api/errors';
export { createApiClient, resolveBinarySource, type ApiClient, type ApiClientConfig, type Decoder, type FetchOptions, type HttpMethod, type UploadOptions } from './api/client';
export * as authApi from './api/auth';
export * as emailApi from './api/emails';
export * as profileApi from './api/profile';
export * as settingsApi from './api/settings';
export * as twoFactorApi from './api/twoFactor';
export { createFileTokenStore, createMemoryTokenStore, type FileTokenStoreOptions, type TokenStore } from './services/tokenStore';
export * from './stores';
export * from './types/account';
export * from './types/email';
export type * from './types/session';
export * from './types/settings';
export type * from './types/upload';
