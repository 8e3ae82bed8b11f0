/**
 * 队列路径：提交 → 等待终态 → 下载产物
 */
import {
  errorCode,
  errorMessage,
  type JobOutcome,
  type SubmissionPayload,
} from '../../domain/index.js';
import {
  retrieveTaskUseCase,
  type RetrieveTaskUseCaseDeps,
  type RetrieveTaskUseCaseResult,
} from './retrieve-task-use-case.js';
import type { TaskQueuePort, WaitForTaskOptions } from './wait-for-task.js';

export interface RunQueuedJobUseCaseDeps extends RetrieveTaskUseCaseDeps {
  queue: TaskQueuePort;
}

export interface RunQueuedJobUseCaseParams {
  payload: SubmissionPayload;
  output: string;
  onSubmitted?: (taskId: string) => void;
  wait?: Omit<WaitForTaskOptions, 'logger'>;
}

export async function runQueuedJobUseCase(
  deps: RunQueuedJobUseCaseDeps,
  params: RunQueuedJobUseCaseParams
): Promise<JobOutcome<RetrieveTaskUseCaseResult>> {
  let taskId: string;
  try {
    taskId = await deps.queue.submit(params.payload);
  } catch (error) {
    deps.logger.error(`Submission failed: ${errorMessage(error)}`);
    return { ok: false, error: errorMessage(error), code: errorCode(error) };
  }
  params.onSubmitted?.(taskId);
  return retrieveTaskUseCase(deps, { taskId, output: params.output, wait: params.wait });
}
