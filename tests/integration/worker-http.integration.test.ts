import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { promises as fs } from 'fs';
import request from 'supertest';
import type { Express } from 'express';
import { loadWorkerConfig } from '../../backend/app-config.js';
import { SILENT_LOG_CONFIG } from '../../backend/config/log-config.js';
import { createApp } from '../../backend/interfaces/http/index.js';
import { LogManager } from '../../backend/services/log-manager.js';
import { initializeServices, type WorkerServices } from '../../backend/services/service-initializer.js';
import { CONFIG_DIR, ScriptedChannel, executing, jsonResponse, makeTempDir, urlOf } from '../helpers/fakes.js';

const IMAGE_B64 = Buffer.from('jpeg-bytes').toString('base64');
const AUDIO_B64 = Buffer.from('wav-bytes').toString('base64');
const VIDEO_BYTES = Buffer.from('fake-video');

describe('worker HTTP surface', () => {
  let root: string;
  let artifactPath: string;
  let services: WorkerServices;

  async function buildApp(token?: string): Promise<Express> {
    const config = loadWorkerConfig({
      COMFY_URL: 'http://comfy.test',
      LIPSYNC_OUTPUT_PATH: path.join(root, 'jobs'),
      LIPSYNC_CONFIG_DIR: CONFIG_DIR,
    });
    const logManager = new LogManager(SILENT_LOG_CONFIG);
    services = await initializeServices(config, logManager, {
      monitor: { connector: async () => new ScriptedChannel([executing('1', 'p1'), executing(null, 'p1')]) },
    });
    return createApp({
      runJob: services.runJob,
      tasks: services.tasks,
      workspace: services.workspace,
      logger: logManager.createLogger({ component: 'test' }),
      inferenceServer: config.comfyUrl,
      publicUrl: 'http://worker.test',
      token,
    });
  }

  function stubInferenceServer(promptStatus = 200) {
    return vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
      const { pathname } = new URL(urlOf(input));
      if (pathname === '/prompt') {
        return promptStatus === 200
          ? jsonResponse({ prompt_id: 'p1', number: 1 })
          : new Response('boom', { status: promptStatus, statusText: 'Internal Server Error' });
      }
      if (pathname === '/history/p1') {
        return jsonResponse({ p1: { outputs: { '131': { gifs: [{ fullpath: artifactPath }] } } } });
      }
      return new Response('not found', { status: 404 });
    });
  }

  beforeEach(async () => {
    root = await makeTempDir('lipsync-worker');
    artifactPath = path.join(root, 'talk_00001-audio.mp4');
    await fs.writeFile(artifactPath, VIDEO_BYTES);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('reports health without authentication', async () => {
    const app = await buildApp('test-secret');
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', inferenceServer: 'http://comfy.test' });
  });

  it('returns the video inline from the synchronous endpoint', async () => {
    const fetchSpy = stubInferenceServer();
    const app = await buildApp();

    const res = await request(app).post('/api/lipsync').send({ image_base64: IMAGE_B64, wav_base64: AUDIO_B64 });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ video: VIDEO_BYTES.toString('base64') });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('rejects a request without audio', async () => {
    const fetchSpy = stubInferenceServer();
    const app = await buildApp();

    const res = await request(app).post('/api/lipsync').send({ image_base64: IMAGE_B64 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'Audio input required (wav_path, wav_url, wav_base64)',
      code: 'VALIDATION_ERROR',
    });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('runs queued tasks and serves their outputs', async () => {
    stubInferenceServer();
    const app = await buildApp();

    const accepted = await request(app).post('/api/tasks').send({ image_base64: IMAGE_B64, wav_base64: AUDIO_B64 });
    expect(accepted.status).toBe(202);
    expect(accepted.body.status).toBe('PENDING');
    const taskId: string = accepted.body.task_id;
    expect(taskId).toMatch(/^task_/);

    await services.tasks.whenSettled(taskId);

    const status = await request(app).get(`/api/tasks/${taskId}`);
    expect(status.status).toBe(200);
    expect(status.body).toEqual({
      task_id: taskId,
      status: 'COMPLETED',
      outputs: [{ name: 'output.mp4', url: `http://worker.test/api/tasks/${taskId}/outputs/output.mp4` }],
    });

    const output = await request(app).get(`/api/tasks/${taskId}/outputs/output.mp4`).responseType('blob');
    expect(output.status).toBe(200);
    expect(Buffer.compare(output.body, VIDEO_BYTES)).toBe(0);
    await expect(fs.readFile(services.workspace.jobPath(taskId, 'output.mp4'))).resolves.toEqual(VIDEO_BYTES);
  });

  it('records a failed task with its error code', async () => {
    stubInferenceServer(500);
    const app = await buildApp();

    const accepted = await request(app).post('/api/tasks').send({ image_base64: IMAGE_B64, wav_base64: AUDIO_B64 });
    const taskId: string = accepted.body.task_id;
    await services.tasks.whenSettled(taskId);

    const status = await request(app).get(`/api/tasks/${taskId}`);
    expect(status.body).toEqual({
      task_id: taskId,
      status: 'FAILED',
      outputs: [],
      error: 'Prompt submit failed: 500 Internal Server Error boom',
      code: 'SUBMISSION_ERROR',
    });
    const output = await request(app).get(`/api/tasks/${taskId}/outputs/output.mp4`);
    expect(output.status).toBe(404);
  });

  it('validates queued submissions before accepting them', async () => {
    const app = await buildApp();
    const res = await request(app).post('/api/tasks').send({ wav_base64: AUDIO_B64 });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Image input required (image_path, image_url, image_base64)', code: 'VALIDATION_ERROR' });
  });

  it('answers 404 for unknown tasks', async () => {
    const app = await buildApp();
    const res = await request(app).get('/api/tasks/task_missing');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Task not found' });
  });

  it('requires the bearer token when one is configured', async () => {
    stubInferenceServer();
    const app = await buildApp('test-secret');

    const denied = await request(app).get('/api/tasks/task_missing');
    expect(denied.status).toBe(401);
    expect(denied.body).toEqual({ error: 'Unauthorized' });

    const allowed = await request(app).get('/api/tasks/task_missing').set('Authorization', 'Bearer test-secret');
    expect(allowed.status).toBe(404);
  });

  it('turns malformed JSON into a validation error', async () => {
    const app = await buildApp();
    const res = await request(app).post('/api/lipsync').set('Content-Type', 'application/json').send('{"image_base64":');
    expect(res.status).toBe(400);
    expect(res.body.code).toBe('VALIDATION_ERROR');
  });
});
