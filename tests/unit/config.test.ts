/**
 * 客户端配置单元测试
 *
 * 优先级：显式传入 > 环境变量 > 默认值
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  resolveClientConfig,
} from '../../src/config';
import { InvalidArgumentError } from '../../src/api/errors';

describe('客户端配置 (resolveClientConfig)', () => {
  it('无环境变量时使用默认值', () => {
    expect(resolveClientConfig({}, {})).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      authScheme: 'Bearer',
      dataDir: join(homedir(), '.mail-client'),
    });
  });

  it('读取环境变量', () => {
    const config = resolveClientConfig({}, {
      MAIL_API_BASE_URL: 'https://mail.example.com/api/',
      MAIL_API_TIMEOUT_MS: '5000',
      MAIL_API_AUTH_SCHEME: 'Token',
      MAIL_DATA_DIR: '/var/lib/mail',
    });

    expect(config).toEqual({
      baseUrl: 'https://mail.example.com/api',
      timeoutMs: 5000,
      authScheme: 'Token',
      dataDir: '/var/lib/mail',
    });
  });

  it('MAIL_API_AUTH_SCHEME=none 时发送裸令牌', () => {
    expect(resolveClientConfig({}, { MAIL_API_AUTH_SCHEME: 'none' }).authScheme).toBeNull();
  });

  it('MAIL_DATA_DIR 中的 ~ 展开为主目录', () => {
    expect(resolveClientConfig({}, { MAIL_DATA_DIR: '~/mail' }).dataDir).toBe(`${homedir()}/mail`);
  });

  it('显式传入的配置优先于环境变量', () => {
    const config = resolveClientConfig(
      { baseUrl: 'http://10.0.0.2:8000/api', authScheme: null, timeoutMs: 100 },
      { MAIL_API_BASE_URL: 'https://mail.example.com/api', MAIL_API_AUTH_SCHEME: 'Token' },
    );

    expect(config.baseUrl).toBe('http://10.0.0.2:8000/api');
    expect(config.authScheme).toBeNull();
    expect(config.timeoutMs).toBe(100);
  });

  it('超时不是正整数时抛出 InvalidArgumentError', () => {
    expect(() => resolveClientConfig({}, { MAIL_API_TIMEOUT_MS: 'soon' }))
      .toThrow(InvalidArgumentError);
  });

  it('服务器地址不是 URL 时抛出 InvalidArgumentError', () => {
    expect(() => resolveClientConfig({}, { MAIL_API_BASE_URL: 'mail server' }))
      .toThrow(InvalidArgumentError);
  });
});
