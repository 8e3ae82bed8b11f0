import { promises as fs } from 'fs';
import type { Express, Request, Response } from 'express';
import {
  LipsyncError,
  errorCode,
  errorMessage,
  parseJobRequest,
  type JobOutcome,
} from '../../domain/index.js';
import {
  createJobId,
  type ProcessLipsyncUseCaseParams,
  type ProcessLipsyncUseCaseResult,
} from '../../application/lipsync/index.js';
import type { TaskStore } from '../../infrastructure/tasks/task-store.js';
import type { WorkspaceFilesystem } from '../../services/fs.js';
import type { Logger } from '../../services/log-manager.js';

export const OUTPUT_FILENAME = 'output.mp4';

export interface LipsyncRouteDeps {
  runJob: (params: ProcessLipsyncUseCaseParams) => Promise<JobOutcome<ProcessLipsyncUseCaseResult>>;
  tasks: TaskStore;
  workspace: WorkspaceFilesystem;
  logger: Logger;
  /** 拼接产物 URL 的对外地址；缺省取请求的协议与 Host */
  publicUrl?: string;
}

const CLIENT_ERROR_CODES = new Set(['VALIDATION_ERROR', 'DOWNLOAD_ERROR', 'DECODE_ERROR']);
const UPSTREAM_ERROR_CODES = new Set([
  'CONNECT_TIMEOUT',
  'SUBMISSION_ERROR',
  'EXECUTION_FAILED',
  'EXECUTION_DISCONNECTED',
  'EXECUTION_TIMEOUT',
  'NO_OUTPUT',
  'NOT_FOUND',
]);

/** 错误码 → HTTP 状态：输入问题 400，推理端问题 502，其余 500 */
export function statusForCode(code: string): number {
  if (CLIENT_ERROR_CODES.has(code)) return 400;
  if (UPSTREAM_ERROR_CODES.has(code)) return 502;
  return 500;
}

function baseUrl(req: Request, publicUrl?: string): string {
  return (publicUrl ?? `${req.protocol}://${req.get('host') ?? 'localhost'}`).replace(/\/$/, '');
}

export function registerLipsyncRoutes(app: Express, deps: LipsyncRouteDeps) {
  app.post('/api/lipsync', async (req: Request, res: Response) => {
    try {
      const outcome = await deps.runJob({ payload: req.body });
      if (!outcome.ok) {
        res.status(statusForCode(outcome.code)).json({ error: outcome.error, code: outcome.code });
        return;
      }
      const video = await fs.readFile(outcome.artifactPath);
      res.json({ video: video.toString('base64') });
    } catch (error) {
      deps.logger.error(`Synchronous job failed: ${errorMessage(error)}`);
      res.status(500).json({ error: errorMessage(error), code: errorCode(error) });
    }
  });

  app.post('/api/tasks', (req: Request, res: Response) => {
    const payload: unknown = req.body;
    try {
      parseJobRequest(payload);
    } catch (error) {
      const code = errorCode(error);
      res.status(error instanceof LipsyncError ? statusForCode(code) : 500).json({ error: errorMessage(error), code });
      return;
    }

    const taskId = createJobId();
    const record = deps.tasks.enqueue(taskId, async () => {
      const outcome = await deps.runJob({ payload, jobId: taskId });
      if (!outcome.ok) return outcome;
      const outputPath = await deps.workspace.copyInto(taskId, OUTPUT_FILENAME, outcome.artifactPath);
      return { ok: true, outputs: [{ name: OUTPUT_FILENAME, path: outputPath }] };
    });
    res.status(202).json({ task_id: taskId, status: record.status });
  });

  app.get('/api/tasks/:taskId', (req: Request, res: Response) => {
    const { taskId } = req.params;
    const record = deps.tasks.get(taskId);
    if (!record) {
      res.status(404).json({ error: 'Task not found' });
      return;
    }
    const base = baseUrl(req, deps.publicUrl);
    res.json({
      task_id: record.taskId,
      status: record.status,
      outputs: record.outputs.map((output) => ({
        name: output.name,
        url: `${base}/api/tasks/${encodeURIComponent(record.taskId)}/outputs/${encodeURIComponent(output.name)}`,
      })),
      ...(record.error ? { error: record.error, code: record.code } : {}),
    });
  });

  app.get('/api/tasks/:taskId/outputs/:name', (req: Request, res: Response) => {
    const { taskId, name } = req.params;
    const output = deps.tasks.get(taskId)?.outputs.find((o) => o.name === name);
    if (!output) {
      res.status(404).json({ error: 'Output not found' });
      return;
    }
    res.sendFile(output.path, (error) => {
      if (!error) return;
      deps.logger.warn(`Sending output failed: ${error.message}`, { taskId, name });
      if (!res.headersSent) res.status(404).json({ error: 'Output not found' });
    });
  });
}
