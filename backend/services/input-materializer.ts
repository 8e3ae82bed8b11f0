/**
 * 输入落地：把 path / url / base64 三种形式的媒体统一成任务工作目录下的本地文件
 */
import { promises as fs } from 'fs';
import {
  DecodeError,
  DownloadError,
  errorMessage,
  type MediaKind,
  type MediaReference,
} from '../domain/index.js';
import type { WorkspaceFilesystem } from './fs.js';
import type { Logger } from './log-manager.js';

export const DEFAULT_INPUT_DOWNLOAD_TIMEOUT_MS = 60_000;

/** 各类媒体在任务目录中的固定文件名 */
export const INPUT_FILENAMES: Record<MediaKind, string> = {
  image: 'input_image.jpg',
  video: 'input_video.mp4',
  audio: 'input_audio.wav',
};

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URL_PREFIX = /^data:[^;,]*;base64,/i;

/**
 * 严格解码 base64（允许 data URL 前缀与空白）；格式不合法抛 DecodeError
 */
export function decodeBase64(input: string): Buffer {
  const body = input.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
  if (body.length === 0 || body.length % 4 !== 0 || !BASE64_PATTERN.test(body)) {
    throw new DecodeError('Base64 decode failed: input is not valid base64');
  }
  return Buffer.from(body, 'base64');
}

export interface InputMaterializerOptions {
  workspace: WorkspaceFilesystem;
  downloadTimeoutMs?: number;
}

export class InputMaterializer {
  private readonly workspace: WorkspaceFilesystem;
  private readonly downloadTimeoutMs: number;

  constructor(options: InputMaterializerOptions) {
    this.workspace = options.workspace;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULT_INPUT_DOWNLOAD_TIMEOUT_MS;
  }

  /**
   * 返回本地文件路径。path 形式原样返回（不复制，由调用方校验存在性）
   */
  async materialize(reference: MediaReference, jobId: string, logger: Logger): Promise<string> {
    const filename = INPUT_FILENAMES[reference.kind];
    switch (reference.form) {
      case 'path':
        logger.info(`Path input (${reference.kind}): ${reference.value}`);
        return reference.value;
      case 'url':
        logger.info(`URL input (${reference.kind}): ${reference.value}`);
        return this.download(reference.value, jobId, filename, logger);
      case 'base64': {
        logger.info(`Base64 input (${reference.kind}) processing`);
        const bytes = decodeBase64(reference.value);
        const filePath = await this.workspace.writeFile(jobId, filename, bytes);
        logger.info(`Saved base64 input to ${filePath}`, { bytes: bytes.length });
        return filePath;
      }
    }
  }

  private async download(url: string, jobId: string, filename: string, logger: Logger): Promise<string> {
    let res: Response;
    try {
      res = await fetch(url, { signal: AbortSignal.timeout(this.downloadTimeoutMs) });
    } catch (error) {
      throw new DownloadError(`URL download failed: ${url}: ${errorMessage(error)}`, { cause: error });
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new DownloadError(`URL download failed: ${res.status} ${res.statusText} ${text}`.trim());
    }

    let bytes: Buffer;
    try {
      bytes = Buffer.from(await res.arrayBuffer());
    } catch (error) {
      throw new DownloadError(`URL download interrupted: ${url}: ${errorMessage(error)}`, { cause: error });
    }
    const filePath = await this.workspace.writeFile(jobId, filename, bytes);
    logger.info(`Downloaded ${url} -> ${filePath}`, { bytes: bytes.length });
    return filePath;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}
