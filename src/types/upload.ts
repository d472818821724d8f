/**
 * 上传相关类型定义
 */

/**
 * 二进制数据来源
 *
 * 文件路径和内存字节二选一，由 kind 区分
 */
export type BinarySource =
  | {
    kind: 'file';
    /** 本地文件路径 */
    path: string;
    /** 上传时使用的文件名，默认取路径最后一段 */
    filename?: string;
    contentType?: string;
  }
  | {
    kind: 'bytes';
    data: Uint8Array;
    filename?: string;
    contentType?: string;
  };

/** 上传请求中的文本字段 */
export type UploadFields = Record<string, string>;
