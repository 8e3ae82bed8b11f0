/**
 * 工作端内存任务表：PENDING → RUNNING → COMPLETED / FAILED
 * 后台按并发上限依次执行，终态任务超过保留时长后被清理
 */
import { errorCode, errorMessage, type JobOutcome, type TaskStatus } from '../../domain/index.js';
import { silentLogger, type Logger } from '../../services/log-manager.js';

export const DEFAULT_TASK_CONCURRENCY = 1;
export const DEFAULT_TASK_RETENTION_MS = 24 * 60 * 60 * 1000;

export interface TaskArtifact {
  name: string;
  path: string;
}

export interface TaskRecord {
  taskId: string;
  status: TaskStatus;
  createdAt: number;
  updatedAt: number;
  outputs: TaskArtifact[];
  error?: string;
  code?: string;
}

/** 任务体不抛错，失败以 ok: false 返回 */
export type TaskRunner = () => Promise<JobOutcome<{ outputs: TaskArtifact[] }>>;

export interface TaskStoreOptions {
  concurrency?: number;
  retentionMs?: number;
  now?: () => number;
  logger?: Logger;
}

interface QueuedTask {
  taskId: string;
  run: TaskRunner;
}

export class TaskStore {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly queue: QueuedTask[] = [];
  private readonly settled = new Map<string, Promise<TaskRecord>>();
  private readonly resolvers = new Map<string, (record: TaskRecord) => void>();
  private running = 0;
  private readonly concurrency: number;
  private readonly retentionMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: TaskStoreOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_TASK_CONCURRENCY);
    this.retentionMs = options.retentionMs ?? DEFAULT_TASK_RETENTION_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  enqueue(taskId: string, run: TaskRunner): TaskRecord {
    if (this.tasks.has(taskId)) {
      throw new Error(`Task already exists: ${taskId}`);
    }
    this.prune();
    const timestamp = this.now();
    const record: TaskRecord = { taskId, status: 'PENDING', createdAt: timestamp, updatedAt: timestamp, outputs: [] };
    this.tasks.set(taskId, record);
    this.settled.set(
      taskId,
      new Promise<TaskRecord>((resolve) => {
        this.resolvers.set(taskId, resolve);
      })
    );
    this.queue.push({ taskId, run });
    this.logger.info(`Task queued: ${taskId}`, { queued: this.queue.length, running: this.running });
    // 返回入队时的快照；drain 可能同步把任务切到 RUNNING
    const accepted = { ...record };
    this.drain();
    return accepted;
  }

  get(taskId: string): TaskRecord | undefined {
    const record = this.tasks.get(taskId);
    return record ? { ...record, outputs: [...record.outputs] } : undefined;
  }

  /** 等待任务进入终态；未知任务返回 undefined */
  async whenSettled(taskId: string): Promise<TaskRecord | undefined> {
    const pending = this.settled.get(taskId);
    if (!pending) return this.get(taskId);
    await pending;
    return this.get(taskId);
  }

  /** 清理超过保留时长的终态任务，返回清理数量 */
  prune(): number {
    const cutoff = this.now() - this.retentionMs;
    let removed = 0;
    for (const [taskId, record] of this.tasks) {
      const terminal = record.status === 'COMPLETED' || record.status === 'FAILED';
      if (terminal && record.updatedAt < cutoff) {
        this.tasks.delete(taskId);
        this.settled.delete(taskId);
        removed++;
      }
    }
    if (removed > 0) this.logger.info(`Pruned ${removed} expired task(s)`);
    return removed;
  }

  private drain(): void {
    while (this.running < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;
      this.running++;
      void this.runTask(next).finally(() => {
        this.running--;
        this.drain();
      });
    }
  }

  private async runTask({ taskId, run }: QueuedTask): Promise<void> {
    this.update(taskId, { status: 'RUNNING' });
    try {
      const outcome = await run();
      if (outcome.ok) {
        this.update(taskId, { status: 'COMPLETED', outputs: outcome.outputs });
        this.logger.info(`Task completed: ${taskId}`, { outputs: outcome.outputs.length });
      } else {
        this.update(taskId, { status: 'FAILED', error: outcome.error, code: outcome.code });
        this.logger.warn(`Task failed: ${taskId}: ${outcome.error}`, { code: outcome.code });
      }
    } catch (error) {
      this.update(taskId, { status: 'FAILED', error: errorMessage(error), code: errorCode(error) });
      this.logger.error(`Task failed: ${taskId}: ${errorMessage(error)}`, { code: errorCode(error) });
    }
    const record = this.tasks.get(taskId);
    const resolve = this.resolvers.get(taskId);
    this.resolvers.delete(taskId);
    if (record && resolve) resolve(record);
  }

  private update(taskId: string, patch: Partial<Omit<TaskRecord, 'taskId' | 'createdAt'>>): void {
    const record = this.tasks.get(taskId);
    if (!record) return;
    Object.assign(record, patch, { updatedAt: this.now() });
  }
}
