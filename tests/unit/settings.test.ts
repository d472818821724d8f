/**
 * 用户设置 API 单元测试
 *
 * 测试自动回复、字体、深色模式接口
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createApiClient, type ApiClient } from '../../src/api/client';
import { InvalidArgumentError } from '../../src/api/errors';
import {
  getAutoReplySettings,
  getDarkMode,
  getFontSettings,
  setDarkMode,
  toggleAutoReply,
  updateAutoReplySettings,
  updateFontSettings,
} from '../../src/api/settings';
import {
  callAt,
  installFetchMock,
  jsonBody,
  jsonResponse,
  type FetchMock,
} from '../utils/fetch-mock';

const BASE_URL = 'https://mail.test/api';

describe('用户设置 API', () => {
  let mockFetch: FetchMock;
  let api: ApiClient;

  beforeEach(() => {
    mockFetch = installFetchMock();
    api = createApiClient({ baseUrl: BASE_URL, getToken: () => 'tok123' });
  });

  describe('自动回复', () => {
    it('获取自动回复设置', async () => {
      mockFetch.mockResolvedValue(jsonResponse({
        auto_reply_enabled: false,
        auto_reply_message: null,
        auto_reply_start_date: null,
        auto_reply_end_date: null,
      }));

      const settings = await getAutoReplySettings(api);

      expect(settings.auto_reply_enabled).toBe(false);
      expect(callAt(mockFetch).url).toBe(`${BASE_URL}/user/settings/auto-reply`);
      expect(callAt(mockFetch).init?.method).toBe('GET');
    });

    it('更新时只发送变更的字段', async () => {
      mockFetch.mockResolvedValue(jsonResponse({
        auto_reply_enabled: true,
        auto_reply_message: 'Out of office',
      }));

      const settings = await updateAutoReplySettings(api, { auto_reply_message: 'Out of office' });

      expect(settings.auto_reply_message).toBe('Out of office');
      expect(callAt(mockFetch).init?.method).toBe('PUT');
      expect(jsonBody(callAt(mockFetch).init)).toEqual({ auto_reply_message: 'Out of office' });
    });

    it('开始时间晚于结束时间时抛出 InvalidArgumentError 且不发请求', async () => {
      await expect(updateAutoReplySettings(api, {
        auto_reply_start_date: '2026-03-10T00:00:00Z',
        auto_reply_end_date: '2026-03-01T00:00:00Z',
      })).rejects.toBeInstanceOf(InvalidArgumentError);

      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('切换开关使用 PATCH 且不带请求体', async () => {
      mockFetch.mockResolvedValue(jsonResponse({
        auto_reply_enabled: true,
        auto_reply_start_date: '2026-03-01T00:00:00Z',
        auto_reply_end_date: '2026-03-31T00:00:00Z',
      }));

      const settings = await toggleAutoReply(api);

      expect(settings.auto_reply_enabled).toBe(true);
      expect(callAt(mockFetch).init?.method).toBe('PATCH');
      expect(callAt(mockFetch).init?.body).toBeUndefined();
    });
  });

  describe('字体', () => {
    it('获取和更新字体设置', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ font_size: 14, font_family: 'Roboto' }))
        .mockResolvedValueOnce(jsonResponse({ font_size: 16, font_family: 'Roboto' }));

      await expect(getFontSettings(api)).resolves.toEqual({ font_size: 14, font_family: 'Roboto' });
      await expect(updateFontSettings(api, { font_size: 16 })).resolves.toEqual({
        font_size: 16,
        font_family: 'Roboto',
      });
      expect(jsonBody(callAt(mockFetch, 1).init)).toEqual({ font_size: 16 });
    });
  });

  describe('深色模式', () => {
    it('获取深色模式', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ dark_mode: true }));

      await expect(getDarkMode(api)).resolves.toBe(true);
    });

    it('设置深色模式', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ dark_mode: false }));

      await expect(setDarkMode(api, false)).resolves.toBe(false);
      expect(callAt(mockFetch).init?.method).toBe('PATCH');
      expect(jsonBody(callAt(mockFetch).init)).toEqual({ dark_mode: false });
    });
  });
});
