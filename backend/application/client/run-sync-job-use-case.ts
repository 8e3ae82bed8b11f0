/**
 * 同步路径：一次请求拿回 base64 视频并写盘
 */
import {
  errorCode,
  errorMessage,
  type InlineVideoResponse,
  type JobOutcome,
  type SubmissionPayload,
  type SyncInferencePort,
} from '../../domain/index.js';
import type { SavedArtifact } from '../../infrastructure/queue/artifact-download.js';
import type { Logger } from '../../services/log-manager.js';

export interface RunSyncJobUseCaseDeps {
  endpoint: SyncInferencePort<SubmissionPayload, InlineVideoResponse>;
  saveInline: (base64: string, destination: string) => Promise<SavedArtifact>;
  logger: Logger;
}

export interface RunSyncJobUseCaseParams {
  payload: SubmissionPayload;
  output: string;
}

export interface RunSyncJobUseCaseResult {
  outputPath: string;
  bytes: number;
}

export async function runSyncJobUseCase(
  deps: RunSyncJobUseCaseDeps,
  params: RunSyncJobUseCaseParams
): Promise<JobOutcome<RunSyncJobUseCaseResult>> {
  try {
    const response = await deps.endpoint.execute(params.payload);
    if ('error' in response) {
      deps.logger.error(`Worker returned error: ${response.error}`);
      return { ok: false, error: response.error, code: response.code ?? 'EXECUTION_FAILED' };
    }
    const saved = await deps.saveInline(response.video, params.output);
    deps.logger.info(`Result saved to ${saved.path}`, { bytes: saved.bytes });
    return { ok: true, outputPath: saved.path, bytes: saved.bytes };
  } catch (error) {
    deps.logger.error(`Synchronous job failed: ${errorMessage(error)}`);
    return { ok: false, error: errorMessage(error), code: errorCode(error) };
  }
}
