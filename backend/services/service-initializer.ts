/**
 * Service Initializer - 组装工作端核心服务
 * 启动时调用一次；不读环境变量，由调用方传入 WorkerConfig 与 LogManager。
 */

import type { WorkerConfig } from '../app-config.js';
import {
  processLipsyncUseCase,
  type ProcessLipsyncUseCaseDeps,
  type ProcessLipsyncUseCaseParams,
} from '../application/lipsync/index.js';
import { ExecutionMonitor, type ExecutionMonitorOptions } from '../infrastructure/inference/comfy/execution-monitor.js';
import type { ComfyServerConfig } from '../infrastructure/inference/comfy/http-client.js';
import { TaskStore } from '../infrastructure/tasks/task-store.js';
import { getAudioDuration } from './audio-duration.js';
import { WorkspaceFilesystem, resolveWorkspaceRoot } from './fs.js';
import { InputMaterializer, fileExists } from './input-materializer.js';
import type { LogManager } from './log-manager.js';
import { WorkflowRepository } from './workflow-loader.js';

export interface WorkerServices {
  server: ComfyServerConfig;
  workspace: WorkspaceFilesystem;
  workflows: WorkflowRepository;
  executor: ExecutionMonitor;
  tasks: TaskStore;
  runJob: (params: ProcessLipsyncUseCaseParams) => ReturnType<typeof processLipsyncUseCase>;
  /** 清理过期任务记录、任务目录与审计日志 */
  housekeeping: () => Promise<HousekeepingReport>;
}

export interface HousekeepingReport {
  tasks: number;
  workspaces: number;
  auditDays: number;
}

export interface InitializeServicesOptions {
  /** 测试时替换实时通道连接、睡眠与文件存在判断 */
  monitor?: Pick<ExecutionMonitorOptions, 'connector' | 'sleep' | 'exists'>;
  now?: () => number;
}

/**
 * 初始化工作端服务
 */
export async function initializeServices(
  config: WorkerConfig,
  logManager: LogManager,
  options: InitializeServicesOptions = {}
): Promise<WorkerServices> {
  const logger = logManager.createLogger({ component: 'worker' });

  const workspace = new WorkspaceFilesystem(resolveWorkspaceRoot(config.outputPath));
  await workspace.ensureRoot();
  logger.info(`Workspace root: ${workspace.root}`);

  const workflows = new WorkflowRepository(config.configDir);
  const server: ComfyServerConfig = { baseUrl: config.comfyUrl, requestTimeoutMs: config.requestTimeoutMs };
  const executor = new ExecutionMonitor({
    server,
    connectRetryIntervalMs: config.connectRetryIntervalMs,
    connectTimeoutMs: config.connectTimeoutMs,
    executionTimeoutMs: config.executionTimeoutMs,
    logger,
    ...options.monitor,
  });
  const now = options.now ?? Date.now;
  const tasks = new TaskStore({
    concurrency: config.taskConcurrency,
    retentionMs: config.taskRetentionMs,
    now,
    logger: logger.child({ component: 'tasks' }),
  });

  const deps: ProcessLipsyncUseCaseDeps = {
    workflows,
    materializer: new InputMaterializer({ workspace, downloadTimeoutMs: config.inputDownloadTimeoutMs }),
    executor,
    probeAudioDuration: getAudioDuration,
    fileExists,
    logAudit: (jobId, entry) => logManager.logAudit(jobId, entry),
    logger,
  };

  logger.info('Worker services initialized', { inferenceServer: config.comfyUrl });
  return {
    server,
    workspace,
    workflows,
    executor,
    tasks,
    runJob: (params) => processLipsyncUseCase(deps, params),
    housekeeping: async () => {
      const prunedTasks = tasks.prune();
      // 运行中任务的目录仍在写入，mtime 不会早于保留窗口
      const prunedDirs = await workspace.pruneOlderThan(now() - config.taskRetentionMs);
      const auditDays = await logManager.cleanupOldLogs();
      if (prunedDirs.length > 0) logger.info(`Removed ${prunedDirs.length} expired job workspace(s)`);
      return { tasks: prunedTasks, workspaces: prunedDirs.length, auditDays };
    },
  };
}
