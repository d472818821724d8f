/**
 * 用户设置 API 封装
 *
 * 自动回复、字体、深色模式，均需登录
 */

import { API_ENDPOINTS } from '../config';
import {
  AutoReplySettingsSchema,
  DarkModeSchema,
  FontSettingsSchema,
  type AutoReplySettings,
  type FontSettings,
} from '../types/settings';
import { InvalidArgumentError } from './errors';
import type { ApiClient } from './client';

// ============================================
// 自动回复
// ============================================

/**
 * 获取自动回复设置
 */
export function getAutoReplySettings(api: ApiClient): Promise<AutoReplySettings> {
  return api.fetchData(API_ENDPOINTS.AUTO_REPLY_SETTINGS, {}, AutoReplySettingsSchema);
}

/**
 * 更新自动回复设置（部分字段）
 *
 * @throws InvalidArgumentError 开始时间晚于结束时间
 */
export async function updateAutoReplySettings(
  api: ApiClient,
  changes: Partial<AutoReplySettings>,
): Promise<AutoReplySettings> {
  const start = changes.auto_reply_start_date;
  const end = changes.auto_reply_end_date;
  if (start && end && Date.parse(start) > Date.parse(end)) {
    throw new InvalidArgumentError('开始时间必须早于结束时间');
  }

  return api.fetchData(API_ENDPOINTS.AUTO_REPLY_SETTINGS, {
    method: 'PUT',
    body: changes,
  }, AutoReplySettingsSchema);
}

/**
 * 切换自动回复开关
 *
 * 开启时服务器会补上默认的起止时间
 */
export function toggleAutoReply(api: ApiClient): Promise<AutoReplySettings> {
  return api.fetchData(API_ENDPOINTS.AUTO_REPLY_SETTINGS, {
    method: 'PATCH',
  }, AutoReplySettingsSchema);
}

// ============================================
// 字体
// ============================================

export function getFontSettings(api: ApiClient): Promise<FontSettings> {
  return api.fetchData(API_ENDPOINTS.FONT_SETTINGS, {}, FontSettingsSchema);
}

export function updateFontSettings(
  api: ApiClient,
  changes: Partial<FontSettings>,
): Promise<FontSettings> {
  return api.fetchData(API_ENDPOINTS.FONT_SETTINGS, {
    method: 'PUT',
    body: changes,
  }, FontSettingsSchema);
}

// ============================================
// 深色模式
// ============================================

export async function getDarkMode(api: ApiClient): Promise<boolean> {
  const { dark_mode } = await api.fetchData(API_ENDPOINTS.DARK_MODE, {}, DarkModeSchema);
  return dark_mode;
}

export async function setDarkMode(api: ApiClient, enabled: boolean): Promise<boolean> {
  const { dark_mode } = await api.fetchData(API_ENDPOINTS.DARK_MODE, {
    method: 'PATCH',
    body: { dark_mode: enabled },
  }, DarkModeSchema);
  return dark_mode;
}
