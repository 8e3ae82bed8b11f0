/**
 * 应用层客户端入口：构造载荷、队列提交、同步调用、按 id 取回
 */
export {
  buildSubmissionPayload,
  isRemoteSource,
  MODE_DEFAULT_SIZE,
  MODE_INPUT_TYPE,
  type ClientJobOptions,
  type ClientMode,
} from './build-submission-payload.js';
export {
  waitForTask,
  DEFAULT_MAX_WAIT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  type TaskQueuePort,
  type WaitForTaskOptions,
} from './wait-for-task.js';
export {
  retrieveTaskUseCase,
  type RetrieveTaskUseCaseDeps,
  type RetrieveTaskUseCaseParams,
  type RetrieveTaskUseCaseResult,
} from './retrieve-task-use-case.js';
export {
  runQueuedJobUseCase,
  type RunQueuedJobUseCaseDeps,
  type RunQueuedJobUseCaseParams,
} from './run-queued-job-use-case.js';
export {
  runSyncJobUseCase,
  type RunSyncJobUseCaseDeps,
  type RunSyncJobUseCaseParams,
  type RunSyncJobUseCaseResult,
} from './run-sync-job-use-case.js';
