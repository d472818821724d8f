/**
 * 邮件 API 封装
 *
 * 发送邮件、高级搜索，均需登录
 */

import { API_ENDPOINTS } from '../config';
import {
  EmailListResponseSchema,
  EmailSchema,
  type Email,
  type EmailSearchQuery,
  type SendEmailInput,
} from '../types/email';
import { InvalidArgumentError } from './errors';
import type { ApiClient } from './client';

/**
 * 发送邮件
 *
 * @throws InvalidArgumentError 没有收件人
 */
export async function sendEmail(api: ApiClient, input: SendEmailInput): Promise<Email> {
  if (input.recipients.length === 0) {
    throw new InvalidArgumentError('至少需要一个收件人');
  }

  const body: Record<string, unknown> = {
    recipients: input.recipients,
    subject: input.subject,
    body: input.body,
  };
  if (input.cc?.length) {
    body.cc = input.cc;
  }
  if (input.bcc?.length) {
    body.bcc = input.bcc;
  }

  return api.fetchData(API_ENDPOINTS.EMAIL_SEND, {
    method: 'POST',
    body,
  }, EmailSchema);
}

/**
 * 高级搜索
 *
 * 已移入回收站的邮件不会返回
 *
 * @throws InvalidArgumentError 时间范围只给了一端，或开始晚于结束
 */
export async function searchEmails(
  api: ApiClient,
  query: EmailSearchQuery = {},
): Promise<Email[]> {
  const params = buildSearchParams(query);
  const queryString = params.toString();
  const endpoint = queryString
    ? `${API_ENDPOINTS.EMAIL_SEARCH}?${queryString}`
    : API_ENDPOINTS.EMAIL_SEARCH;

  const data = await api.fetchData(endpoint, {}, EmailListResponseSchema);
  return Array.isArray(data) ? data : data.results;
}

/**
 * 生成搜索参数
 */
export function buildSearchParams(query: EmailSearchQuery): URLSearchParams {
  const params = new URLSearchParams();

  if (query.search) {
    params.set('search', query.search);
  }

  const { startDate, endDate } = query;
  if ((startDate === undefined) !== (endDate === undefined)) {
    // 服务器只在起止都有时才按时间过滤
    throw new InvalidArgumentError('开始时间和结束时间需同时提供');
  }
  if (startDate !== undefined && endDate !== undefined) {
    const start = toIsoString(startDate);
    const end = toIsoString(endDate);
    if (Date.parse(start) > Date.parse(end)) {
      throw new InvalidArgumentError('开始时间必须早于结束时间');
    }
    params.set('start_date', start);
    params.set('end_date', end);
  }

  if (query.status) {
    params.set('status', query.status);
  }
  if (query.label) {
    params.set('label', query.label);
  }
  // 服务器只判断参数是否存在，false 时不能发送
  if (query.hasAttachments) {
    params.set('has_attachments', 'true');
  }

  return params;
}

function toIsoString(value: Date | string): string {
  return typeof value === 'string' ? value : value.toISOString();
}
