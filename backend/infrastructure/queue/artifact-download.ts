/**
 * 产物落盘：队列路径按 8192 字节分块流式下载，同步路径直接解码 base64
 * 下载中断时删除半成品文件
 */
import { createWriteStream, promises as fs } from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  DownloadError,
  NoOutputError,
  errorMessage,
  type TaskStatusRecord,
} from '../../domain/index.js';
import { decodeBase64 } from '../../services/input-materializer.js';
import { silentLogger, type Logger } from '../../services/log-manager.js';

export const DOWNLOAD_CHUNK_SIZE = 8192;
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 600_000;

export interface SavedArtifact {
  path: string;
  bytes: number;
}

/**
 * 成功状态下取第一个产物 URL；没有产物属于协议违例，与任务失败区分
 */
export function selectOutputUrl(record: TaskStatusRecord): string {
  const [first] = record.outputs;
  if (!first) {
    throw new NoOutputError(`Task reported ${record.status} but returned no outputs`);
  }
  if (typeof first.url !== 'string' || first.url.length === 0) {
    throw new NoOutputError(`Task reported ${record.status} but its first output has no url`);
  }
  return first.url;
}

/** 把任意大小的上游块重新切成固定大小 */
export async function* rechunk(source: AsyncIterable<Uint8Array>, size = DOWNLOAD_CHUNK_SIZE): AsyncGenerator<Buffer> {
  let pending: Buffer = Buffer.alloc(0);
  for await (const chunk of source) {
    pending = pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([pending, chunk]);
    while (pending.length >= size) {
      yield pending.subarray(0, size);
      pending = pending.subarray(size);
    }
  }
  if (pending.length > 0) yield pending;
}

export interface DownloadOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export async function downloadArtifact(
  url: string,
  destination: string,
  options: DownloadOptions = {}
): Promise<SavedArtifact> {
  const logger = options.logger ?? silentLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  const target = path.resolve(destination);
  await fs.mkdir(path.dirname(target), { recursive: true });

  logger.info(`Downloading ${url} -> ${target}`);
  let res: Response;
  try {
    res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new DownloadError(`Artifact download failed: ${url}: ${errorMessage(error)}`, { cause: error });
  }
  if (!res.ok || !res.body) {
    const text = await res.text().catch(() => '');
    throw new DownloadError(`Artifact download failed: ${res.status} ${res.statusText} ${text}`.trim());
  }

  let bytes = 0;
  try {
    await pipeline(
      Readable.fromWeb(res.body),
      async function* (source: AsyncIterable<Uint8Array>) {
        for await (const chunk of rechunk(source)) {
          bytes += chunk.length;
          yield chunk;
        }
      },
      createWriteStream(target, { highWaterMark: DOWNLOAD_CHUNK_SIZE })
    );
  } catch (error) {
    await fs.rm(target, { force: true });
    logger.warn(`Removed partial download ${target}`, { bytes });
    throw new DownloadError(`Artifact download interrupted after ${bytes} bytes: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  logger.info(`Saved ${bytes} bytes to ${target}`);
  return { path: target, bytes };
}

/** 同步端点返回的 base64 视频写盘 */
export async function saveInlineArtifact(base64: string, destination: string): Promise<SavedArtifact> {
  const data = decodeBase64(base64);
  const target = path.resolve(destination);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, data);
  return { path: target, bytes: data.length };
}
