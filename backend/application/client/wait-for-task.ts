/**
 * 轮询任务直到终态；maxWaitMs 只是客户端等待上限，超时后停止轮询，不通知服务端
 */
import {
  WaitTimeoutError,
  isTerminalStatus,
  type AsyncInferencePort,
  type SubmissionPayload,
  type TaskStatusRecord,
} from '../../domain/index.js';
import { silentLogger, type Logger } from '../../services/log-manager.js';

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_MAX_WAIT_MS = 2 * 60 * 60 * 1000;

export type TaskQueuePort = AsyncInferencePort<SubmissionPayload, string, TaskStatusRecord>;

export interface WaitForTaskOptions {
  pollIntervalMs?: number;
  maxWaitMs?: number;
  /** 每次轮询后回调（含状态未变化的情况，供进度展示） */
  onStatus?: (record: TaskStatusRecord, changed: boolean) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export async function waitForTask(
  queue: Pick<TaskQueuePort, 'poll'>,
  taskId: string,
  options: WaitForTaskOptions = {}
): Promise<TaskStatusRecord> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
  const sleep = options.sleep ?? ((ms: number) => new Promise<void>((r) => setTimeout(r, ms)));
  const now = options.now ?? Date.now;
  const logger = options.logger ?? silentLogger;

  const startedAt = now();
  let lastStatus: string | null = null;
  for (;;) {
    const record = await queue.poll(taskId);
    const changed = record.status !== lastStatus;
    if (changed) {
      logger.info(`Task ${taskId} status: ${record.status}`);
      lastStatus = record.status;
    }
    options.onStatus?.(record, changed);
    if (isTerminalStatus(record.status)) return record;

    if (now() - startedAt + pollIntervalMs > maxWaitMs) {
      throw new WaitTimeoutError(`Gave up waiting for task ${taskId} after ${maxWaitMs}ms (last status ${record.status})`);
    }
    await sleep(pollIntervalMs);
  }
}
