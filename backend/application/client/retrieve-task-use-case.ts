/**
 * 按任务 id 取回结果：等待终态，成功则下载第一个产物
 * 也用于补救此前中断的运行
 */
import {
  errorCode,
  errorMessage,
  isSuccessStatus,
  type JobOutcome,
  type TaskStatusRecord,
} from '../../domain/index.js';
import { selectOutputUrl, type SavedArtifact } from '../../infrastructure/queue/artifact-download.js';
import type { Logger } from '../../services/log-manager.js';
import { waitForTask, type TaskQueuePort, type WaitForTaskOptions } from './wait-for-task.js';

export interface RetrieveTaskUseCaseDeps {
  queue: Pick<TaskQueuePort, 'poll'>;
  download: (url: string, destination: string) => Promise<SavedArtifact>;
  logger: Logger;
}

export interface RetrieveTaskUseCaseParams {
  taskId: string;
  output: string;
  wait?: Omit<WaitForTaskOptions, 'logger'>;
}

export interface RetrieveTaskUseCaseResult {
  taskId: string;
  status: string;
  outputPath: string;
  bytes: number;
}

export async function retrieveTaskUseCase(
  deps: RetrieveTaskUseCaseDeps,
  params: RetrieveTaskUseCaseParams
): Promise<JobOutcome<RetrieveTaskUseCaseResult>> {
  const { taskId } = params;
  const logger = deps.logger.child({ taskId });
  let record: TaskStatusRecord;
  try {
    record = await waitForTask(deps.queue, taskId, { ...params.wait, logger });
  } catch (error) {
    logger.error(`Waiting for task failed: ${errorMessage(error)}`);
    return { ok: false, error: errorMessage(error), code: errorCode(error), taskId };
  }

  if (!isSuccessStatus(record.status)) {
    const error = record.error ? `Task ${record.status}: ${record.error}` : `Task ${record.status}`;
    logger.error(error);
    return { ok: false, error, code: 'EXECUTION_FAILED', taskId };
  }

  try {
    const url = selectOutputUrl(record);
    const saved = await deps.download(url, params.output);
    logger.info(`Result saved to ${saved.path}`, { bytes: saved.bytes });
    return { ok: true, taskId, status: record.status, outputPath: saved.path, bytes: saved.bytes };
  } catch (error) {
    logger.error(`Fetching result failed: ${errorMessage(error)}`);
    return { ok: false, error: errorMessage(error), code: errorCode(error), taskId };
  }
}
