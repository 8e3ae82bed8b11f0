/**
 * 任务队列客户端：POST 入队拿 task_id，GET 状态 URL 查询一次状态
 * 入队失败不重试；状态查询失败按固定间隔重试
 */
import { z } from 'zod';
import {
  PollError,
  SubmissionError,
  errorMessage,
  type SubmissionPayload,
  type TaskStatusRecord,
} from '../../domain/index.js';
import { redactPayloadForLog, type Logger } from '../../services/log-manager.js';
import { AsyncInferenceBase } from '../inference/bases/async-inference-base.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_POLL_RETRIES = 5;
export const DEFAULT_POLL_RETRY_DELAY_MS = 2_000;

export interface TaskQueueClientOptions {
  /** 入队端点 */
  queueUrl: string;
  /** 状态 URL 模板，含 {task_id}；缺省为 <queueUrl>/{task_id} */
  statusUrlTemplate?: string;
  token?: string;
  requestTimeoutMs?: number;
  pollRetries?: number;
  pollRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const queueResponseSchema = z.object({ task_id: z.string().min(1) }).passthrough();

const taskOutputSchema = z
  .object({
    url: z.string().optional(),
    name: z.string().optional(),
  })
  .passthrough();

const taskStatusSchema = z
  .object({
    task_id: z.string().optional(),
    status: z.string().min(1),
    outputs: z
      .array(taskOutputSchema)
      .nullish()
      .transform((outputs) => outputs ?? []),
    error: z
      .unknown()
      .optional()
      .transform((error) => {
        if (error === undefined || error === null) return undefined;
        return typeof error === 'string' ? error : JSON.stringify(error);
      }),
  })
  .passthrough();

export function statusUrlFor(template: string, taskId: string): string {
  return template.replaceAll('{task_id}', encodeURIComponent(taskId));
}

export class TaskQueueClient extends AsyncInferenceBase<SubmissionPayload, string, TaskStatusRecord> {
  private readonly queueUrl: string;
  private readonly statusUrlTemplate: string;
  private readonly token?: string;
  private readonly requestTimeoutMs: number;
  private readonly pollRetries: number;
  private readonly pollRetryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TaskQueueClientOptions) {
    super(options.logger);
    this.queueUrl = options.queueUrl;
    this.statusUrlTemplate = options.statusUrlTemplate ?? `${options.queueUrl.replace(/\/$/, '')}/{task_id}`;
    this.token = options.token;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.pollRetries = Math.max(1, options.pollRetries ?? DEFAULT_POLL_RETRIES);
    this.pollRetryDelayMs = options.pollRetryDelayMs ?? DEFAULT_POLL_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? ((ms: number) => new Promise<void>((r) => setTimeout(r, ms)));
  }

  statusUrl(taskId: string): string {
    return statusUrlFor(this.statusUrlTemplate, taskId);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    return headers;
  }

  protected async _submit(payload: SubmissionPayload): Promise<string> {
    this.logger.info(`Submitting job to ${this.queueUrl}`, { payload: redactPayloadForLog({ ...payload }) });
    let res: Response;
    try {
      res = await fetch(this.queueUrl, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw new SubmissionError(`Task submit failed: ${errorMessage(error)}`, { cause: error });
    }

    const body = await res.text().catch(() => '');
    if (!res.ok) {
      throw new SubmissionError(`Task submit failed: ${res.status} ${res.statusText} ${body}`.trim(), {
        status: res.status,
        body,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      data = null;
    }
    const parsed = queueResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new SubmissionError(`Task submit response has no task_id: ${body}`, { status: res.status, body });
    }
    this.logger.info(`Job queued: ${parsed.data.task_id}`);
    return parsed.data.task_id;
  }

  protected async _poll(taskId: string): Promise<TaskStatusRecord> {
    const url = this.statusUrl(taskId);
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.pollRetries; attempt++) {
      try {
        return await this.fetchStatus(url);
      } catch (error) {
        lastError = error;
        this.logger.warn(`Status request failed (${attempt}/${this.pollRetries}): ${errorMessage(error)}`, { taskId });
        if (attempt < this.pollRetries) await this.sleep(this.pollRetryDelayMs);
      }
    }
    throw new PollError(
      `Status polling for ${taskId} failed after ${this.pollRetries} attempts: ${errorMessage(lastError)}`,
      this.pollRetries,
      { cause: lastError }
    );
  }

  private async fetchStatus(url: string): Promise<TaskStatusRecord> {
    const res = await fetch(url, {
      headers: this.headers(),
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new Error(`Status request HTTP error: ${res.status} ${res.statusText} ${text}`.trim());
    }
    const parsed = taskStatusSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Malformed status response: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return parsed.data;
  }
}
