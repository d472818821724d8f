/**
 * 邮件相关类型定义
 *
 * 发件人、收件人在不同接口中可能是手机号，也可能是账号对象
 */

import { z } from 'zod';

// ============================================
// 服务器数据结构
// ============================================

/** 邮件参与者 */
export const EmailParticipantSchema = z.union([
  z.string(),
  z.number(),
  z.object({ phone_number: z.string() }).passthrough(),
]);

export type EmailParticipant = z.infer<typeof EmailParticipantSchema>;

/** 邮件标签 */
export const EmailLabelSchema = z.union([
  z.string(),
  z.object({ name: z.string() }).passthrough(),
]);

export const EmailSchema = z.object({
  id: z.union([z.number(), z.string()]),
  subject: z.string().nullish(),
  body: z.string().nullish(),
  sender: EmailParticipantSchema.nullish(),
  recipients: z.array(EmailParticipantSchema).optional(),
  /** ISO 时间 */
  sent_at: z.string().nullish(),
  is_read: z.boolean().optional(),
  is_starred: z.boolean().optional(),
  labels: z.array(EmailLabelSchema).optional(),
  attachments: z.array(z.unknown()).optional(),
}).passthrough();

export type Email = z.infer<typeof EmailSchema>;

/** 搜索结果，分页与否两种格式都接受 */
export const EmailListResponseSchema = z.union([
  z.array(EmailSchema),
  z.object({
    count: z.number().optional(),
    results: z.array(EmailSchema),
  }).passthrough(),
]);

// ============================================
// 请求数据
// ============================================

/** 发送邮件 */
export interface SendEmailInput {
  /** 收件人手机号，至少一个 */
  recipients: string[];
  subject: string;
  body: string;
  cc?: string[];
  bcc?: string[];
}

/** 邮件状态筛选 */
export type EmailStatusFilter = 'unread' | 'starred';

/** 高级搜索条件，全部可选 */
export interface EmailSearchQuery {
  /** 匹配主题、正文、发件人手机号 */
  search?: string;
  /** 发送时间范围，起止需同时提供 */
  startDate?: Date | string;
  endDate?: Date | string;
  status?: EmailStatusFilter;
  label?: string;
  /** 只看带附件的邮件 */
  hasAttachments?: boolean;
}
