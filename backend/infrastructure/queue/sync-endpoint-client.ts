/**
 * 同步端点客户端：一次请求直接拿到 base64 视频或错误信息
 */
import { z } from 'zod';
import {
  SubmissionError,
  errorMessage,
  type InlineVideoResponse,
  type SubmissionPayload,
} from '../../domain/index.js';
import { redactPayloadForLog, type Logger } from '../../services/log-manager.js';
import { SyncInferenceBase } from '../inference/bases/sync-inference-base.js';

/** 同步端点要等整次推理结束，默认与执行上限一致 */
export const DEFAULT_SYNC_TIMEOUT_MS = 3_600_000;

export interface SyncEndpointClientOptions {
  url: string;
  token?: string;
  timeoutMs?: number;
  logger?: Logger;
}

const inlineVideoResponseSchema = z.union([
  z.object({ video: z.string().min(1) }),
  z.object({ error: z.string(), code: z.string().optional() }),
]);

export class SyncEndpointClient extends SyncInferenceBase<SubmissionPayload, InlineVideoResponse> {
  private readonly url: string;
  private readonly token?: string;
  private readonly timeoutMs: number;

  constructor(options: SyncEndpointClientOptions) {
    super(options.logger);
    this.url = options.url;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS;
  }

  protected async _execute(payload: SubmissionPayload): Promise<InlineVideoResponse> {
    this.logger.info(`Sending synchronous job to ${this.url}`, { payload: redactPayloadForLog({ ...payload }) });
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SubmissionError(`Sync request failed: ${errorMessage(error)}`, { cause: error });
    }

    const body = await res.text().catch(() => '');
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      data = null;
    }
    // 错误响应（4xx/5xx）也按 {error, code} 返回给调用方
    const parsed = inlineVideoResponseSchema.safeParse(data);
    if (parsed.success && (res.ok || 'error' in parsed.data)) {
      return parsed.data;
    }
    throw new SubmissionError(`Sync request failed: ${res.status} ${res.statusText} ${body}`.trim(), {
      status: res.status,
      body,
    });
  }
}
