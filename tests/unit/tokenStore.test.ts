/**
 * 令牌持久化服务单元测试
 *
 * 使用临时目录测试文件存储：
 * 1. 读写删除
 * 2. 跨实例（模拟进程重启）读取
 * 3. 文件损坏时视为没有令牌
 */

import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createFileTokenStore, createMemoryTokenStore } from '../../src/services/tokenStore';

describe('令牌持久化服务 (tokenStore)', () => {
  describe('createFileTokenStore', () => {
    let dataDir: string;

    beforeEach(async () => {
      dataDir = await mkdtemp(join(tmpdir(), 'mail-token-'));
    });

    afterEach(async () => {
      await rm(dataDir, { recursive: true, force: true });
    });

    it('没有存储文件时返回 null', async () => {
      const store = createFileTokenStore({ dataDir });

      await expect(store.get()).resolves.toBeNull();
    });

    it('写入后可读取，文件中以 session_token 为键', async () => {
      const store = createFileTokenStore({ dataDir });

      await store.set('tok123');

      await expect(store.get()).resolves.toBe('tok123');
      const content = JSON.parse(await readFile(join(dataDir, 'mail_client.json'), 'utf8'));
      expect(content).toEqual({ session_token: 'tok123' });
    });

    it('新实例能读到之前写入的令牌', async () => {
      await createFileTokenStore({ dataDir }).set('tok123');

      const restarted = createFileTokenStore({ dataDir });

      await expect(restarted.get()).resolves.toBe('tok123');
    });

    it('再次写入覆盖旧令牌', async () => {
      const store = createFileTokenStore({ dataDir });

      await store.set('first');
      await store.set('second');

      await expect(store.get()).resolves.toBe('second');
    });

    it('删除只移除令牌键，保留同域其他数据', async () => {
      await writeFile(
        join(dataDir, 'mail_client.json'),
        JSON.stringify({ session_token: 'tok123', locale: 'zh-CN' }),
      );
      const store = createFileTokenStore({ dataDir });

      await store.remove();

      await expect(store.get()).resolves.toBeNull();
      const content = JSON.parse(await readFile(join(dataDir, 'mail_client.json'), 'utf8'));
      expect(content).toEqual({ locale: 'zh-CN' });
    });

    it('没有令牌时删除不报错', async () => {
      const store = createFileTokenStore({ dataDir });

      await expect(store.remove()).resolves.toBeUndefined();
    });

    it('文件损坏时读取返回 null，写入会覆盖', async () => {
      await writeFile(join(dataDir, 'mail_client.json'), '{not json');
      const store = createFileTokenStore({ dataDir });

      await expect(store.get()).resolves.toBeNull();

      await store.set('fresh');
      await expect(store.get()).resolves.toBe('fresh');
    });

    it('令牌不是字符串时视为没有令牌', async () => {
      await writeFile(join(dataDir, 'mail_client.json'), JSON.stringify({ session_token: 42 }));

      await expect(createFileTokenStore({ dataDir }).get()).resolves.toBeNull();
    });

    it('不同域名互不影响', async () => {
      const first = createFileTokenStore({ dataDir, domain: 'account_a' });
      const second = createFileTokenStore({ dataDir, domain: 'account_b' });

      await first.set('tok-a');

      await expect(second.get()).resolves.toBeNull();
      await expect(first.get()).resolves.toBe('tok-a');
    });

    it('并发写入和删除按调用顺序生效且都成功', async () => {
      const store = createFileTokenStore({ dataDir });

      const results = await Promise.allSettled([
        store.set('a'),
        store.set('b'),
        store.remove(),
        store.set('c'),
      ]);

      expect(results.map((result) => result.status)).toEqual([
        'fulfilled',
        'fulfilled',
        'fulfilled',
        'fulfilled',
      ]);
      await expect(store.get()).resolves.toBe('c');
      expect(await readdir(dataDir)).toEqual(['mail_client.json']);
    });

    it('两个实例同时写入同一文件都成功', async () => {
      const first = createFileTokenStore({ dataDir });
      const second = createFileTokenStore({ dataDir });

      const results = await Promise.allSettled([first.set('from-first'), second.set('from-second')]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled']);
      expect(['from-first', 'from-second']).toContain(await first.get());
    });

    it('目录不存在时写入会自动创建', async () => {
      const nestedDir = join(dataDir, 'nested', 'dir');
      const store = createFileTokenStore({ dataDir: nestedDir });

      await store.set('tok123');

      await expect(store.get()).resolves.toBe('tok123');
    });
  });

  describe('createMemoryTokenStore', () => {
    it('支持初始值、覆盖和删除', async () => {
      const store = createMemoryTokenStore('initial');

      await expect(store.get()).resolves.toBe('initial');
      await store.set('next');
      await expect(store.get()).resolves.toBe('next');
      await store.remove();
      await expect(store.get()).resolves.toBeNull();
    });
  });
});
