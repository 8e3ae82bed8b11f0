import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import path from 'path';
import { promises as fs } from 'fs';
import {
  DEFAULT_PROMPT,
  SubmissionError,
  ValidationError,
  type InlineVideoResponse,
  type SubmissionPayload,
  type TaskStatusRecord,
} from '../../../backend/domain/index.js';
import {
  buildSubmissionPayload,
  isRemoteSource,
  retrieveTaskUseCase,
  runQueuedJobUseCase,
  runSyncJobUseCase,
} from '../../../backend/application/client/index.js';
import type { SavedArtifact } from '../../../backend/infrastructure/queue/artifact-download.js';
import { silentLogger } from '../../../backend/services/log-manager.js';
import { makeTempDir } from '../../helpers/fakes.js';

const completed: TaskStatusRecord = {
  status: 'COMPLETED',
  outputs: [{ url: 'https://files.test/t-1/output.mp4' }],
};

function fakeDownload() {
  return vi.fn(async (_url: string, destination: string): Promise<SavedArtifact> => ({ path: destination, bytes: 42 }));
}

describe('buildSubmissionPayload()', () => {
  let dir: string;
  let audioFile: string;

  beforeAll(async () => {
    dir = await makeTempDir('lipsync-client');
    audioFile = path.join(dir, 'speech.wav');
    await fs.writeFile(audioFile, 'RIFF');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('classifies sources by their http prefix', () => {
    expect(isRemoteSource('https://media.test/a.jpg')).toBe(true);
    expect(isRemoteSource('http://media.test/a.jpg')).toBe(true);
    expect(isRemoteSource('./face.jpg')).toBe(false);
  });

  it('sends remote media as URLs and local files as base64 with i2v defaults', async () => {
    await expect(
      buildSubmissionPayload({ mode: 'i2v', image: 'https://media.test/face.jpg', audio: audioFile })
    ).resolves.toEqual({
      input_type: 'image',
      prompt: DEFAULT_PROMPT,
      width: 384,
      height: 384,
      image_url: 'https://media.test/face.jpg',
      wav_base64: 'UklGRg==',
    });
  });

  it('uses the v2v defaults and explicit options', async () => {
    const payload = await buildSubmissionPayload({
      mode: 'v2v',
      video: audioFile,
      audio: 'https://media.test/a.wav',
      prompt: 'whispering',
      maxFrame: 300,
      forceOffload: false,
    });
    expect(payload).toEqual({
      input_type: 'video',
      prompt: 'whispering',
      width: 640,
      height: 640,
      max_frame: 300,
      force_offload: false,
      video_base64: 'UklGRg==',
      wav_url: 'https://media.test/a.wav',
    });
  });

  it('sends force_offload only when it was chosen', async () => {
    const base = { mode: 'i2v' as const, image: 'https://media.test/face.jpg', audio: 'https://media.test/a.wav' };
    await expect(buildSubmissionPayload(base)).resolves.not.toHaveProperty('force_offload');
    await expect(buildSubmissionPayload({ ...base, forceOffload: true })).resolves.toHaveProperty('force_offload', true);
    await expect(buildSubmissionPayload({ ...base, forceOffload: false })).resolves.toHaveProperty('force_offload', false);
  });

  it('requires the media of the selected mode and an audio source', async () => {
    await expect(buildSubmissionPayload({ mode: 'i2v', video: audioFile, audio: audioFile })).rejects.toThrow(
      new ValidationError('Mode i2v requires an image (--image)')
    );
    await expect(buildSubmissionPayload({ mode: 'v2v', image: audioFile, audio: audioFile })).rejects.toThrow(
      'Mode v2v requires a video (--video)'
    );
    await expect(buildSubmissionPayload({ mode: 'i2v', image: audioFile })).rejects.toThrow(
      'An audio file is required (--audio)'
    );
  });

  it('reports unreadable local files', async () => {
    const missing = path.join(dir, 'missing.wav');
    await expect(
      buildSubmissionPayload({ mode: 'i2v', image: 'https://media.test/face.jpg', audio: missing })
    ).rejects.toThrow(`Audio file not found: ${missing}`);
  });
});

describe('retrieveTaskUseCase()', () => {
  it('downloads the first output of a completed task', async () => {
    const download = fakeDownload();
    const outcome = await retrieveTaskUseCase(
      { queue: { poll: async () => completed }, download, logger: silentLogger },
      { taskId: 't-1', output: '/tmp/out.mp4' }
    );

    expect(outcome).toEqual({ ok: true, taskId: 't-1', status: 'COMPLETED', outputPath: '/tmp/out.mp4', bytes: 42 });
    expect(download).toHaveBeenCalledWith('https://files.test/t-1/output.mp4', '/tmp/out.mp4');
  });

  it('reports a failed task without downloading', async () => {
    const download = fakeDownload();
    const outcome = await retrieveTaskUseCase(
      {
        queue: { poll: async () => ({ status: 'FAILED', outputs: [], error: 'CUDA out of memory' }) },
        download,
        logger: silentLogger,
      },
      { taskId: 't-1', output: '/tmp/out.mp4' }
    );

    expect(outcome).toEqual({ ok: false, error: 'Task FAILED: CUDA out of memory', code: 'EXECUTION_FAILED', taskId: 't-1' });
    expect(download).not.toHaveBeenCalled();
  });

  it('reports a cancelled task without a message', async () => {
    const outcome = await retrieveTaskUseCase(
      { queue: { poll: async () => ({ status: 'CANCELED', outputs: [] }) }, download: fakeDownload(), logger: silentLogger },
      { taskId: 't-1', output: '/tmp/out.mp4' }
    );
    expect(outcome).toEqual({ ok: false, error: 'Task CANCELED', code: 'EXECUTION_FAILED', taskId: 't-1' });
  });

  it('distinguishes success without outputs', async () => {
    const outcome = await retrieveTaskUseCase(
      { queue: { poll: async () => ({ status: 'COMPLETED', outputs: [] }) }, download: fakeDownload(), logger: silentLogger },
      { taskId: 't-1', output: '/tmp/out.mp4' }
    );
    expect(outcome).toMatchObject({ ok: false, code: 'NO_OUTPUT', taskId: 't-1' });
  });
});

describe('runQueuedJobUseCase()', () => {
  const payload: SubmissionPayload = { input_type: 'image', image_url: 'https://media.test/face.jpg', wav_url: 'https://media.test/a.wav' };

  it('submits, announces the task id and retrieves the result', async () => {
    const submitted: string[] = [];
    const queue = { submit: vi.fn(async () => 't-7'), poll: vi.fn(async () => completed) };

    const outcome = await runQueuedJobUseCase(
      { queue, download: fakeDownload(), logger: silentLogger },
      { payload, output: '/tmp/out.mp4', onSubmitted: (id) => submitted.push(id), wait: { sleep: async () => {} } }
    );

    expect(submitted).toEqual(['t-7']);
    expect(queue.submit).toHaveBeenCalledWith(payload);
    expect(outcome).toMatchObject({ ok: true, taskId: 't-7', bytes: 42 });
  });

  it('returns a submission failure without task id', async () => {
    const queue = {
      submit: vi.fn(async (): Promise<string> => {
        throw new SubmissionError('Task submit failed: 401 Unauthorized');
      }),
      poll: vi.fn(async () => completed),
    };

    const outcome = await runQueuedJobUseCase(
      { queue, download: fakeDownload(), logger: silentLogger },
      { payload, output: '/tmp/out.mp4' }
    );

    expect(outcome).toEqual({ ok: false, error: 'Task submit failed: 401 Unauthorized', code: 'SUBMISSION_ERROR' });
    expect(queue.poll).not.toHaveBeenCalled();
  });
});

describe('runSyncJobUseCase()', () => {
  const payload: SubmissionPayload = { input_type: 'image' };

  it('saves the inline video', async () => {
    const saveInline = vi.fn(async (_b64: string, destination: string): Promise<SavedArtifact> => ({ path: destination, bytes: 2 }));
    const endpoint = { execute: async (): Promise<InlineVideoResponse> => ({ video: 'aGk=' }) };

    const outcome = await runSyncJobUseCase({ endpoint, saveInline, logger: silentLogger }, { payload, output: '/tmp/out.mp4' });

    expect(outcome).toEqual({ ok: true, outputPath: '/tmp/out.mp4', bytes: 2 });
    expect(saveInline).toHaveBeenCalledWith('aGk=', '/tmp/out.mp4');
  });

  it('maps a worker error response', async () => {
    const endpoint = {
      execute: async (): Promise<InlineVideoResponse> => ({ error: 'Node 128 (WanVideoSampler) failed: RuntimeError: boom' }),
    };
    const outcome = await runSyncJobUseCase(
      { endpoint, saveInline: vi.fn(), logger: silentLogger },
      { payload, output: '/tmp/out.mp4' }
    );
    expect(outcome).toEqual({
      ok: false,
      error: 'Node 128 (WanVideoSampler) failed: RuntimeError: boom',
      code: 'EXECUTION_FAILED',
    });
  });

  it('maps a thrown endpoint error', async () => {
    const endpoint = {
      execute: async (): Promise<InlineVideoResponse> => {
        throw new SubmissionError('Sync request failed: fetch failed');
      },
    };
    const outcome = await runSyncJobUseCase(
      { endpoint, saveInline: vi.fn(), logger: silentLogger },
      { payload, output: '/tmp/out.mp4' }
    );
    expect(outcome).toEqual({ ok: false, error: 'Sync request failed: fetch failed', code: 'SUBMISSION_ERROR' });
  });
});
