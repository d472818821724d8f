/**
 * 用户设置类型定义
 */

import { z } from 'zod';

/** 自动回复设置 */
export const AutoReplySettingsSchema = z.object({
  auto_reply_enabled: z.boolean(),
  auto_reply_message: z.string().nullish(),
  /** ISO 时间 */
  auto_reply_start_date: z.string().nullish(),
  auto_reply_end_date: z.string().nullish(),
});

export type AutoReplySettings = z.infer<typeof AutoReplySettingsSchema>;

/** 字体设置 */
export const FontSettingsSchema = z.object({
  font_size: z.union([z.number(), z.string()]).nullish(),
  font_family: z.string().nullish(),
});

export type FontSettings = z.infer<typeof FontSettingsSchema>;

/** 深色模式 */
export const DarkModeSchema = z.object({
  dark_mode: z.boolean(),
});

export type DarkMode = z.infer<typeof DarkModeSchema>;
