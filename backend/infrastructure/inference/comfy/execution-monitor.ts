/**
 * 执行监控：先订阅实时通道再提交节点图，等待本任务完成后从历史中取产物路径
 *
 * 状态：SUBMITTED → EXECUTING(node)* → COMPLETE，或 FAILED / DISCONNECTED / TIMEOUT
 */
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  ExecutionDisconnectedError,
  ExecutionFailedError,
  ExecutionTimeoutError,
  NoOutputError,
  type JobGraph,
} from '../../../domain/index.js';
import { fileExists } from '../../../services/input-materializer.js';
import { silentLogger, type Logger } from '../../../services/log-manager.js';
import { SyncInferenceBase } from '../bases/sync-inference-base.js';
import { connectWebSocket, connectWithRetry, type ChannelConnector, type EventChannel } from './event-channel.js';
import { selectArtifact } from './history.js';
import { eventChannelUrl, getHistory, queuePrompt, type ComfyServerConfig } from './http-client.js';

export const DEFAULT_CONNECT_RETRY_INTERVAL_MS = 1_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 180_000;
export const DEFAULT_EXECUTION_TIMEOUT_MS = 3_600_000;

export type ExecutionState =
  | { phase: 'SUBMITTED'; promptId: string }
  | { phase: 'EXECUTING'; promptId: string; node: string }
  | { phase: 'COMPLETE'; promptId: string };

export interface ExecutionRequest {
  graph: JobGraph;
  signal?: AbortSignal;
  onState?: (state: ExecutionState) => void;
  logger?: Logger;
}

export interface ExecutionResult {
  promptId: string;
  clientId: string;
  nodeId: string;
  artifactPath: string;
}

export interface ExecutionMonitorOptions {
  server: ComfyServerConfig;
  connectRetryIntervalMs?: number;
  connectTimeoutMs?: number;
  executionTimeoutMs?: number;
  connector?: ChannelConnector;
  sleep?: (ms: number) => Promise<void>;
  exists?: (filePath: string) => Promise<boolean>;
  logger?: Logger;
}

const serverMessageSchema = z.object({ type: z.string(), data: z.unknown() });

const executingDataSchema = z.object({
  node: z.union([z.string(), z.number().transform(String)]).nullable(),
  prompt_id: z.string().optional(),
});

const executionErrorDataSchema = z
  .object({
    prompt_id: z.string().optional(),
    node_id: z.union([z.string(), z.number().transform(String)]).optional(),
    node_type: z.string().optional(),
    exception_type: z.string().optional(),
    exception_message: z.string().optional(),
  })
  .passthrough();

export interface WaitForCompletionOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  onState?: (state: ExecutionState) => void;
  logger?: Logger;
}

function parseMessage(raw: string): z.infer<typeof serverMessageSchema> | null {
  try {
    const parsed = serverMessageSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * 读取通道直到本 prompt 完成（executing 且 node 为 null）。
 * 其它 prompt 的消息与其它类型一律忽略
 */
export async function waitForCompletion(
  channel: EventChannel,
  promptId: string,
  options: WaitForCompletionOptions
): Promise<void> {
  const logger = options.logger ?? silentLogger;
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new ExecutionTimeoutError(`Execution of prompt ${promptId} exceeded ${options.timeoutMs}ms`));
  }, options.timeoutMs);
  const forwardAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) forwardAbort();
  else options.signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    for (;;) {
      const raw = await channel.receive(controller.signal);
      if (raw === null) {
        throw new ExecutionDisconnectedError(`Realtime channel closed before prompt ${promptId} completed`);
      }
      const message = parseMessage(raw);
      if (!message) {
        logger.debug('Ignoring non-JSON realtime message');
        continue;
      }

      if (message.type === 'executing') {
        const data = executingDataSchema.safeParse(message.data);
        if (!data.success || data.data.prompt_id !== promptId) continue;
        if (data.data.node === null) {
          logger.info(`Prompt ${promptId} execution complete`);
          options.onState?.({ phase: 'COMPLETE', promptId });
          return;
        }
        logger.debug(`Executing node ${data.data.node}`, { promptId });
        options.onState?.({ phase: 'EXECUTING', promptId, node: data.data.node });
      } else if (message.type === 'execution_error') {
        const data = executionErrorDataSchema.safeParse(message.data);
        if (!data.success || data.data.prompt_id !== promptId) continue;
        const { node_id, node_type, exception_type, exception_message } = data.data;
        throw new ExecutionFailedError(
          `Node ${node_id ?? '?'} (${node_type ?? 'unknown'}) failed: ${exception_type ?? 'Error'}: ${exception_message ?? 'no message'}`
        );
      }
    }
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * 节点图执行器：一次 execute 对应一个关联 id、一条实时通道、一个 prompt
 */
export class ExecutionMonitor extends SyncInferenceBase<ExecutionRequest, ExecutionResult> {
  private readonly server: ComfyServerConfig;
  private readonly connectRetryIntervalMs: number;
  private readonly connectTimeoutMs: number;
  private readonly executionTimeoutMs: number;
  private readonly connector: ChannelConnector;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly exists: (filePath: string) => Promise<boolean>;

  constructor(options: ExecutionMonitorOptions) {
    super(options.logger);
    this.server = options.server;
    this.connectRetryIntervalMs = options.connectRetryIntervalMs ?? DEFAULT_CONNECT_RETRY_INTERVAL_MS;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.executionTimeoutMs = options.executionTimeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
    this.connector = options.connector ?? connectWebSocket;
    this.sleep = options.sleep;
    this.exists = options.exists ?? fileExists;
  }

  protected async _execute(request: ExecutionRequest): Promise<ExecutionResult> {
    const logger = request.logger ?? this.logger;
    const clientId = randomUUID();
    const channel = await connectWithRetry(this.connector, eventChannelUrl(this.server, clientId), {
      retryIntervalMs: this.connectRetryIntervalMs,
      connectTimeoutMs: this.connectTimeoutMs,
      sleep: this.sleep,
      logger,
    });

    try {
      const promptId = await queuePrompt(this.server, request.graph, clientId, logger);
      logger.info(`Prompt queued: ${promptId}`, { clientId });
      request.onState?.({ phase: 'SUBMITTED', promptId });

      await waitForCompletion(channel, promptId, {
        timeoutMs: this.executionTimeoutMs,
        signal: request.signal,
        onState: request.onState,
        logger,
      });

      const history = await getHistory(this.server, promptId);
      if (!history) {
        throw new NoOutputError(`No execution history for prompt ${promptId}`);
      }
      const artifact = await selectArtifact(history, this.exists, logger);
      logger.info(`Output artifact: ${artifact.path}`, { nodeId: artifact.nodeId });
      return { promptId, clientId, nodeId: artifact.nodeId, artifactPath: artifact.path };
    } finally {
      channel.close();
    }
  }
}
