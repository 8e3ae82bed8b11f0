/**
 * 处理一次唇形同步请求：解析载荷 → 落地输入 → 推算帧数 → 注入工作流 → 执行并取产物
 * 不向调用方抛错，失败以 { ok: false, error, code } 返回
 */
import { randomUUID } from 'crypto';
import {
  ValidationError,
  errorCode,
  errorMessage,
  parseJobRequest,
  type JobOutcome,
  type MediaKind,
  type SyncInferencePort,
} from '../../domain/index.js';
import type {
  ExecutionRequest,
  ExecutionResult,
  ExecutionState,
} from '../../infrastructure/inference/comfy/execution-monitor.js';
import type { AudioDurationProbe } from '../../services/audio-duration.js';
import type { InputMaterializer } from '../../services/input-materializer.js';
import { redactPayloadForLog, type Logger, type LogMeta } from '../../services/log-manager.js';
import { injectParameters, resolveMaxFrames } from '../../services/workflow-injector.js';
import type { WorkflowRepository } from '../../services/workflow-loader.js';

export interface ProcessLipsyncUseCaseDeps {
  workflows: Pick<WorkflowRepository, 'getDefinition' | 'getTemplate'>;
  materializer: Pick<InputMaterializer, 'materialize'>;
  executor: SyncInferencePort<ExecutionRequest, ExecutionResult>;
  probeAudioDuration: AudioDurationProbe;
  fileExists: (filePath: string) => Promise<boolean>;
  logAudit: (jobId: string, entry: LogMeta) => Promise<void>;
  logger: Logger;
}

export interface ProcessLipsyncUseCaseParams {
  payload: unknown;
  /** 缺省生成 task_<uuid> */
  jobId?: string;
  signal?: AbortSignal;
  onState?: (state: ExecutionState) => void;
}

export interface ProcessLipsyncUseCaseResult {
  jobId: string;
  promptId: string;
  artifactPath: string;
  maxFrame: number;
}

const MISSING_FILE_LABEL: Record<MediaKind, string> = {
  image: 'Image',
  video: 'Video',
  audio: 'Audio',
};

function payloadForAudit(payload: unknown): LogMeta {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) return {};
  return redactPayloadForLog({ ...payload });
}

export function createJobId(): string {
  return `task_${randomUUID()}`;
}

export async function processLipsyncUseCase(
  deps: ProcessLipsyncUseCaseDeps,
  params: ProcessLipsyncUseCaseParams
): Promise<JobOutcome<ProcessLipsyncUseCaseResult>> {
  const jobId = params.jobId ?? createJobId();
  const logger = deps.logger.child({ jobId });
  await deps.logAudit(jobId, { action: 'job_received', payload: payloadForAudit(params.payload) });

  try {
    const { request, warnings } = parseJobRequest(params.payload);
    for (const warning of warnings) logger.warn(warning);

    const mediaPath = await deps.materializer.materialize(request.media, jobId, logger);
    const audioPath = await deps.materializer.materialize(request.audio, jobId, logger);
    for (const [kind, filePath] of [
      [request.media.kind, mediaPath],
      [request.audio.kind, audioPath],
    ] as const) {
      if (!(await deps.fileExists(filePath))) {
        throw new ValidationError(`${MISSING_FILE_LABEL[kind]} file not found: ${filePath}`);
      }
    }

    const maxFrame = await resolveMaxFrames(request.maxFrame, audioPath, deps.probeAudioDuration, logger);
    const definition = await deps.workflows.getDefinition(request.inputType);
    const template = await deps.workflows.getTemplate(definition.template);
    const graph = injectParameters(
      template,
      {
        inputType: request.inputType,
        mediaPath,
        audioPath,
        prompt: request.prompt,
        width: request.width,
        height: request.height,
        maxFrame,
        forceOffload: request.forceOffload,
      },
      definition.roles,
      logger
    );

    const result = await deps.executor.execute({
      graph,
      signal: params.signal,
      onState: (state) => {
        if (state.phase === 'SUBMITTED') {
          void deps.logAudit(jobId, { action: 'job_submitted', promptId: state.promptId });
        }
        params.onState?.(state);
      },
      logger,
    });

    await deps.logAudit(jobId, {
      action: 'job_completed',
      promptId: result.promptId,
      artifactPath: result.artifactPath,
      maxFrame,
    });
    return { ok: true, jobId, promptId: result.promptId, artifactPath: result.artifactPath, maxFrame };
  } catch (error) {
    const code = errorCode(error);
    const message = errorMessage(error);
    logger.error(`Lip-sync job failed: ${message}`, { code });
    await deps.logAudit(jobId, { action: 'job_failed', code, error: message });
    return { ok: false, error: message, code, taskId: jobId };
  }
}
