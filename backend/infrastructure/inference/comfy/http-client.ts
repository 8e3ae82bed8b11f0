/**
 * 节点图推理服务的 HTTP 接口：提交 prompt、读取执行历史、探活
 */
import { z } from 'zod';
import { SubmissionError, errorMessage, type JobGraph } from '../../../domain/index.js';
import type { Logger } from '../../../services/log-manager.js';

export interface ComfyServerConfig {
  /** 如 http://127.0.0.1:8188 */
  baseUrl: string;
  /** 单次 HTTP 请求超时 */
  requestTimeoutMs: number;
}

const artifactRefSchema = z
  .object({
    fullpath: z.string().optional(),
    filename: z.string().optional(),
    subfolder: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

const nodeOutputSchema = z
  .object({
    gifs: z.array(artifactRefSchema).optional(),
  })
  .passthrough();

const historyEntrySchema = z
  .object({
    outputs: z.record(nodeOutputSchema).default({}),
    status: z
      .object({
        status_str: z.string().optional(),
        completed: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const queueResponseSchema = z.object({ prompt_id: z.string().min(1) }).passthrough();

const historyResponseSchema = z.record(z.unknown());

export type ArtifactRef = z.infer<typeof artifactRefSchema>;
export type NodeOutput = z.infer<typeof nodeOutputSchema>;
export type ExecutionHistory = z.infer<typeof historyEntrySchema>;

function baseUrl(cfg: ComfyServerConfig): string {
  return cfg.baseUrl.replace(/\/$/, '');
}

/** ws(s)://host/ws?clientId=…，按关联 id 订阅实时事件 */
export function eventChannelUrl(cfg: ComfyServerConfig, clientId: string): string {
  const url = new URL(`${baseUrl(cfg)}/ws`);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  url.searchParams.set('clientId', clientId);
  return url.toString();
}

/** 提交节点图，返回服务端 prompt_id（提交一次，不重试） */
export async function queuePrompt(
  cfg: ComfyServerConfig,
  graph: JobGraph,
  clientId: string,
  logger: Logger
): Promise<string> {
  const url = `${baseUrl(cfg)}/prompt`;
  logger.info(`Queueing prompt to ${url}`);
  let res: Response;
  try {
    res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ prompt: graph, client_id: clientId }),
      signal: AbortSignal.timeout(cfg.requestTimeoutMs),
    });
  } catch (error) {
    throw new SubmissionError(`Prompt submit failed: ${errorMessage(error)}`, { cause: error });
  }
  if (!res.ok) {
    const body = await res.text().catch(() => '');
    logger.error(`Prompt submit HTTP error: ${res.status} ${res.statusText}`, { body });
    throw new SubmissionError(`Prompt submit failed: ${res.status} ${res.statusText} ${body}`.trim(), {
      status: res.status,
      body,
    });
  }
  const parsed = queueResponseSchema.safeParse(await res.json().catch(() => null));
  if (!parsed.success) {
    throw new SubmissionError('Prompt submit did not return prompt_id');
  }
  return parsed.data.prompt_id;
}

/** 读取某个 prompt 的执行历史；服务端尚无记录时返回 null */
export async function getHistory(cfg: ComfyServerConfig, promptId: string): Promise<ExecutionHistory | null> {
  const res = await fetch(`${baseUrl(cfg)}/history/${encodeURIComponent(promptId)}`, {
    signal: AbortSignal.timeout(cfg.requestTimeoutMs),
  });
  if (!res.ok) throw new Error(`History fetch failed: ${res.status} ${res.statusText}`);
  const all = historyResponseSchema.safeParse(await res.json());
  if (!all.success || all.data[promptId] === undefined) return null;
  const parsed = historyEntrySchema.safeParse(all.data[promptId]);
  if (!parsed.success) {
    throw new Error(`History for ${promptId} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

/** 服务根路径可访问即视为就绪 */
export async function pingServer(cfg: ComfyServerConfig): Promise<boolean> {
  try {
    const res = await fetch(`${baseUrl(cfg)}/`, { signal: AbortSignal.timeout(Math.min(cfg.requestTimeoutMs, 5000)) });
    return res.ok;
  } catch {
    return false;
  }
}

export interface WaitForServerOptions {
  intervalMs: number;
  timeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * 启动时等待推理服务就绪（默认每秒一次，最多 3 分钟）
 */
export async function waitForServerReady(
  cfg: ComfyServerConfig,
  options: WaitForServerOptions,
  logger: Logger
): Promise<number> {
  const sleep = options.sleep ?? ((ms: number) => new Promise<void>((r) => setTimeout(r, ms)));
  const maxAttempts = Math.max(1, Math.ceil(options.timeoutMs / options.intervalMs));
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (await pingServer(cfg)) {
      logger.info(`Inference server ready after ${attempt} attempt(s)`, { baseUrl: cfg.baseUrl });
      return attempt;
    }
    if (attempt < maxAttempts) await sleep(options.intervalMs);
  }
  throw new Error(`Inference server at ${cfg.baseUrl} did not become ready within ${options.timeoutMs}ms`);
}
