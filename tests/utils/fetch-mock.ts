/**
 * fetch 测试工具
 *
 * 替换 globalThis.fetch，按 "METHOD URL" 分发到对应的处理函数
 */

import { vi, type Mock } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

export type RouteHandler = (init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * 安装 fetch mock（setup.ts 会在每个用例后还原）
 */
export function installFetchMock(): FetchMock {
  const mockFetch: FetchMock = vi.fn<typeof fetch>();
  globalThis.fetch = mockFetch;
  return mockFetch;
}

/**
 * 按路由分发请求，未匹配的请求视为网络错误
 */
export function routeFetch(mockFetch: FetchMock, routes: Record<string, RouteHandler>): void {
  mockFetch.mockImplementation(async (input, init) => {
    const key = `${init?.method ?? 'GET'} ${String(input)}`;
    const handler = routes[key];
    if (!handler) {
      throw new TypeError(`unexpected request: ${key}`);
    }
    return handler(init);
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** 取第 index 次调用的 URL 和 init */
export function callAt(mockFetch: FetchMock, index = 0): { url: string; init: RequestInit | undefined } {
  const call = mockFetch.mock.calls[index];
  if (!call) {
    throw new Error(`fetch 未被调用第 ${index + 1} 次`);
  }
  return { url: String(call[0]), init: call[1] };
}

/** 解析 JSON 请求体 */
export function jsonBody(init: RequestInit | undefined): unknown {
  if (typeof init?.body !== 'string') {
    throw new Error('请求体不是 JSON 字符串');
  }
  return JSON.parse(init.body);
}
