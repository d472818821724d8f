/**
 * 会话令牌持久化服务
 *
 * 将唯一的会话令牌保存在本地，进程重启后仍可读取
 *
 * ## 工作原理
 * 1. 登录成功后，将令牌写入 `<dataDir>/<domain>.json`
 * 2. 应用启动时读取令牌并向服务器校验
 * 3. 登出时删除令牌
 *
 * ## 存储格式
 * - 一个 JSON 对象，键名固定为 session_token
 * - 写入先落到临时文件再重命名，避免进程中断留下半个文件
 * - 同一实例的读写按调用顺序串行执行，临时文件名每次不同
 *
 * @module services/tokenStore
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SESSION_TOKEN_KEY, TOKEN_STORE_DOMAIN } from '../config';

/** 令牌存储接口 */
export interface TokenStore {
  /** 读取令牌，读取失败视为没有令牌 */
  get(): Promise<string | null>;
  /** 保存令牌（覆盖旧值） */
  set(token: string): Promise<void>;
  /** 删除令牌 */
  remove(): Promise<void>;
}

export interface FileTokenStoreOptions {
  /** 存储目录 */
  dataDir: string;
  /** 存储域名，决定文件名 */
  domain?: string;
  /** 键名 */
  key?: string;
}

/**
 * 创建基于文件的令牌存储
 *
 * @example
 * ```ts
 * const store = createFileTokenStore({ dataDir: config.dataDir });
 * await store.set('tok123');
 * await store.get(); // 'tok123'
 * ```
 */
export function createFileTokenStore(options: FileTokenStoreOptions): TokenStore {
  const { dataDir, domain = TOKEN_STORE_DOMAIN, key = SESSION_TOKEN_KEY } = options;
  const filePath = join(dataDir, `${domain}.json`);

  async function readEntries(): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`${filePath} 不是 JSON 对象`);
    }
    return { ...parsed };
  }

  // 串行队列，前一个操作失败不影响后续操作
  let queue: Promise<unknown> = Promise.resolve();

  function enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = queue.then(operation, operation);
    queue = run.catch(() => undefined);
    return run;
  }

  async function writeEntries(entries: Record<string, unknown>): Promise<void> {
    await mkdir(dataDir, { recursive: true });
    const tmpFile = `${filePath}.${randomUUID()}.tmp`;
    await writeFile(tmpFile, JSON.stringify(entries, null, 2), { mode: 0o600 });
    await rename(tmpFile, filePath);
  }

  return {
    get: () => enqueue(async () => {
      try {
        const value = (await readEntries())[key];
        return typeof value === 'string' && value ? value : null;
      } catch (error) {
        console.warn('[TokenStore] 读取令牌失败:', error);
        return null;
      }
    }),

    set: (token) => enqueue(async () => {
      let entries: Record<string, unknown> = {};
      try {
        entries = await readEntries();
      } catch (error) {
        // 文件损坏时直接覆盖
        console.warn('[TokenStore] 旧存储不可读，将被覆盖:', error);
      }
      entries[key] = token;
      await writeEntries(entries);
    }),

    remove: () => enqueue(async () => {
      let entries: Record<string, unknown>;
      try {
        entries = await readEntries();
      } catch (error) {
        console.warn('[TokenStore] 旧存储不可读，将被重置:', error);
        await writeEntries({});
        return;
      }
      if (!(key in entries)) {
        return;
      }
      delete entries[key];
      await writeEntries(entries);
    }),
  };
}

/**
 * 创建内存令牌存储
 *
 * 不落盘，用于测试或临时会话
 */
export function createMemoryTokenStore(initial: string | null = null): TokenStore {
  let token = initial;

  return {
    get: () => Promise.resolve(token),
    set: (value) => {
      token = value;
      return Promise.resolve();
    },
    remove: () => {
      token = null;
      return Promise.resolve();
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
