/**
 * 错误分类：每类错误带稳定的 code，供 HTTP 层与 CLI 映射
 */

export type LipsyncErrorCode =
  | 'VALIDATION_ERROR'
  | 'DOWNLOAD_ERROR'
  | 'DECODE_ERROR'
  | 'CONNECT_TIMEOUT'
  | 'SUBMISSION_ERROR'
  | 'POLL_ERROR'
  | 'NO_OUTPUT'
  | 'NOT_FOUND'
  | 'EXECUTION_FAILED'
  | 'EXECUTION_DISCONNECTED'
  | 'EXECUTION_TIMEOUT'
  | 'WAIT_TIMEOUT'
  | 'INTERNAL_ERROR';

export class LipsyncError extends Error {
  readonly code: LipsyncErrorCode;

  constructor(code: LipsyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** 缺少或无法定位必需输入 */
export class ValidationError extends LipsyncError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
  }
}

export class DownloadError extends LipsyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DOWNLOAD_ERROR', message, options);
  }
}

export class DecodeError extends LipsyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_ERROR', message, options);
  }
}

/** 实时通道在上限时间内无法建立 */
export class ConnectTimeoutError extends LipsyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECT_TIMEOUT', message, options);
  }
}

/** 入队失败（非 2xx），body 保留服务端响应便于排查 */
export class SubmissionError extends LipsyncError {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details?: { status?: number; body?: string; cause?: unknown }) {
    super('SUBMISSION_ERROR', message, { cause: details?.cause });
    this.status = details?.status;
    this.body = details?.body;
  }
}

/** 轮询在重试次数用尽后仍失败 */
export class PollError extends LipsyncError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('POLL_ERROR', message, options);
    this.attempts = attempts;
  }
}

/** 服务端声称成功，但没有任何产物 */
export class NoOutputError extends LipsyncError {
  constructor(message: string) {
    super('NO_OUTPUT', message);
  }
}

/** 产物引用存在但文件在读取时不可用 */
export class NotFoundError extends LipsyncError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class ExecutionFailedError extends LipsyncError {
  constructor(message: string) {
    super('EXECUTION_FAILED', message);
  }
}

export class ExecutionDisconnectedError extends LipsyncError {
  constructor(message: string) {
    super('EXECUTION_DISCONNECTED', message);
  }
}

export class ExecutionTimeoutError extends LipsyncError {
  constructor(message: string) {
    super('EXECUTION_TIMEOUT', message);
  }
}

/** 客户端等待上限：只停止轮询，不通知服务端 */
export class WaitTimeoutError extends LipsyncError {
  constructor(message: string) {
    super('WAIT_TIMEOUT', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): LipsyncErrorCode {
  return error instanceof LipsyncError ? error.code : 'INTERNAL_ERROR';
}
