/**
 * 应用配置：全部来自环境变量（入口处由 dotenv 加载 .env），带类型化默认值
 * 工作端与客户端各取所需，互不依赖
 */
import path from 'path';
import { DEFAULT_MAX_WAIT_MS, DEFAULT_POLL_INTERVAL_MS } from './application/client/wait-for-task.js';
import {
  DEFAULT_CONNECT_RETRY_INTERVAL_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_EXECUTION_TIMEOUT_MS,
} from './infrastructure/inference/comfy/execution-monitor.js';
import { DEFAULT_DOWNLOAD_TIMEOUT_MS } from './infrastructure/queue/artifact-download.js';
import { DEFAULT_SYNC_TIMEOUT_MS } from './infrastructure/queue/sync-endpoint-client.js';
import {
  DEFAULT_POLL_RETRIES,
  DEFAULT_POLL_RETRY_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './infrastructure/queue/task-queue-client.js';
import { DEFAULT_TASK_CONCURRENCY, DEFAULT_TASK_RETENTION_MS } from './infrastructure/tasks/task-store.js';
import { DEFAULT_INPUT_DOWNLOAD_TIMEOUT_MS } from './services/input-materializer.js';

type Env = Record<string, string | undefined>;

export function env(name: string, fallback: string, source: Env = process.env): string {
  const value = source[name]?.trim();
  return value ? value : fallback;
}

export function envInt(name: string, fallback: number, source: Env = process.env): number {
  const raw = source[name]?.trim();
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Environment variable ${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/** 间隔、超时与并发数：0 会让重试循环失去间隔，要求至少为 1 */
export function envPositiveInt(name: string, fallback: number, source: Env = process.env): number {
  const value = envInt(name, fallback, source);
  if (value < 1) {
    throw new Error(`Environment variable ${name} must be a positive integer, got "${source[name]?.trim() ?? ''}"`);
  }
  return value;
}

export function envBool(name: string, fallback: boolean, source: Env = process.env): boolean {
  const raw = source[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`Environment variable ${name} must be a boolean, got "${raw}"`);
}

export interface WorkerConfig {
  host: string;
  port: number;
  /** 节点图推理服务地址 */
  comfyUrl: string;
  /** 任务工作目录与产物的根目录 */
  outputPath: string;
  configDir: string;
  requestTimeoutMs: number;
  inputDownloadTimeoutMs: number;
  connectRetryIntervalMs: number;
  connectTimeoutMs: number;
  executionTimeoutMs: number;
  /** 启动时等待推理服务就绪 */
  readyIntervalMs: number;
  readyTimeoutMs: number;
  taskConcurrency: number;
  taskRetentionMs: number;
  /** 对外可见的地址，用于拼接产物 URL；缺省取请求的 Host */
  publicUrl?: string;
  /** 设置后所有 /api 路由要求 Bearer token */
  token?: string;
}

export function loadWorkerConfig(source: Env = process.env): WorkerConfig {
  const publicUrl = source.LIPSYNC_PUBLIC_URL?.trim();
  const token = source.LIPSYNC_TOKEN?.trim();
  return {
    host: env('LIPSYNC_HOST', '0.0.0.0', source),
    port: envInt('LIPSYNC_PORT', 8000, source),
    comfyUrl: env('COMFY_URL', 'http://127.0.0.1:8188', source),
    outputPath: path.resolve(env('LIPSYNC_OUTPUT_PATH', path.join(process.cwd(), 'outputs'), source)),
    configDir: path.resolve(env('LIPSYNC_CONFIG_DIR', path.join(process.cwd(), 'backend', 'config'), source)),
    requestTimeoutMs: envPositiveInt('COMFY_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS, source),
    inputDownloadTimeoutMs: envPositiveInt('LIPSYNC_INPUT_DOWNLOAD_TIMEOUT_MS', DEFAULT_INPUT_DOWNLOAD_TIMEOUT_MS, source),
    connectRetryIntervalMs: envPositiveInt('COMFY_CONNECT_RETRY_INTERVAL_MS', DEFAULT_CONNECT_RETRY_INTERVAL_MS, source),
    connectTimeoutMs: envPositiveInt('COMFY_CONNECT_TIMEOUT_MS', DEFAULT_CONNECT_TIMEOUT_MS, source),
    executionTimeoutMs: envPositiveInt('COMFY_EXECUTION_TIMEOUT_MS', DEFAULT_EXECUTION_TIMEOUT_MS, source),
    readyIntervalMs: envPositiveInt('COMFY_READY_INTERVAL_MS', 1_000, source),
    readyTimeoutMs: envPositiveInt('COMFY_READY_TIMEOUT_MS', 180_000, source),
    taskConcurrency: envPositiveInt('LIPSYNC_TASK_CONCURRENCY', DEFAULT_TASK_CONCURRENCY, source),
    taskRetentionMs: envInt('LIPSYNC_TASK_RETENTION_MS', DEFAULT_TASK_RETENTION_MS, source),
    ...(publicUrl ? { publicUrl } : {}),
    ...(token ? { token } : {}),
  };
}

export interface ClientConfig {
  queueUrl?: string;
  statusUrlTemplate?: string;
  syncUrl?: string;
  token?: string;
  requestTimeoutMs: number;
  pollIntervalMs: number;
  pollRetries: number;
  pollRetryDelayMs: number;
  maxWaitMs: number;
  downloadTimeoutMs: number;
  syncTimeoutMs: number;
  /** 进度显示（ora spinner）；非 TTY 或 CI 中可关闭 */
  progress: boolean;
}

function optional(name: string, source: Env): string | undefined {
  const value = source[name]?.trim();
  return value ? value : undefined;
}

export function loadClientConfig(source: Env = process.env): ClientConfig {
  return {
    queueUrl: optional('LIPSYNC_QUEUE_URL', source),
    statusUrlTemplate: optional('LIPSYNC_STATUS_URL', source),
    syncUrl: optional('LIPSYNC_SYNC_URL', source),
    token: optional('LIPSYNC_TOKEN', source),
    requestTimeoutMs: envPositiveInt('LIPSYNC_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS, source),
    pollIntervalMs: envPositiveInt('LIPSYNC_POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS, source),
    pollRetries: envPositiveInt('LIPSYNC_POLL_RETRIES', DEFAULT_POLL_RETRIES, source),
    pollRetryDelayMs: envInt('LIPSYNC_POLL_RETRY_DELAY_MS', DEFAULT_POLL_RETRY_DELAY_MS, source),
    maxWaitMs: envPositiveInt('LIPSYNC_MAX_WAIT_MS', DEFAULT_MAX_WAIT_MS, source),
    downloadTimeoutMs: envPositiveInt('LIPSYNC_DOWNLOAD_TIMEOUT_MS', DEFAULT_DOWNLOAD_TIMEOUT_MS, source),
    syncTimeoutMs: envPositiveInt('LIPSYNC_SYNC_TIMEOUT_MS', DEFAULT_SYNC_TIMEOUT_MS, source),
    progress: envBool('LIPSYNC_PROGRESS', true, source),
  };
}
