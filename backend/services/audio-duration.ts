/**
 * 音频时长探测：WAV 直接读 RIFF 头；其它容器调用系统 ffprobe
 * 任何失败都返回 null，由调用方回退到默认帧数
 */
import { spawn } from 'child_process';
import { promises as fs } from 'fs';

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const FFPROBE_TIMEOUT_MS = 15_000;

/** 从 WAV 文件头计算时长（秒）；不是合法 WAV 时返回 null */
export async function readWavDuration(filePath: string): Promise<number | null> {
  const handle = await fs.open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    const header = Buffer.alloc(RIFF_HEADER_SIZE);
    const { bytesRead } = await handle.read(header, 0, RIFF_HEADER_SIZE, 0);
    if (bytesRead < RIFF_HEADER_SIZE) return null;
    if (header.toString('ascii', 0, 4) !== 'RIFF' || header.toString('ascii', 8, 12) !== 'WAVE') return null;

    let byteRate: number | null = null;
    let offset = RIFF_HEADER_SIZE;
    const chunkHeader = Buffer.alloc(CHUNK_HEADER_SIZE);
    while (offset + CHUNK_HEADER_SIZE <= size) {
      await handle.read(chunkHeader, 0, CHUNK_HEADER_SIZE, offset);
      const id = chunkHeader.toString('ascii', 0, 4);
      const chunkSize = chunkHeader.readUInt32LE(4);
      const bodyStart = offset + CHUNK_HEADER_SIZE;

      if (id === 'fmt ') {
        const fmt = Buffer.alloc(16);
        const read = await handle.read(fmt, 0, 16, bodyStart);
        if (read.bytesRead < 16) return null;
        byteRate = fmt.readUInt32LE(8);
      } else if (id === 'data') {
        if (!byteRate) return null;
        // 流式写出的 WAV 可能把 data 长度写成 0 或 0xFFFFFFFF，以文件实际长度为准
        const available = size - bodyStart;
        const dataSize = chunkSize === 0 || chunkSize > available ? available : chunkSize;
        return dataSize / byteRate;
      }
      // chunk 按 2 字节对齐
      offset = bodyStart + chunkSize + (chunkSize % 2);
    }
    return null;
  } finally {
    await handle.close();
  }
}

/** 调用 ffprobe 读取容器时长；ffprobe 不存在或解析失败时返回 null */
export function probeDurationWithFfprobe(filePath: string, timeoutMs = FFPROBE_TIMEOUT_MS): Promise<number | null> {
  return new Promise((resolve) => {
    let settled = false;
    const finish = (value: number | null) => {
      if (!settled) {
        settled = true;
        clearTimeout(timer);
        resolve(value);
      }
    };

    const probe = spawn(
      'ffprobe',
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', filePath],
      { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true }
    );
    const timer = setTimeout(() => {
      probe.kill();
      finish(null);
    }, timeoutMs);

    let stdout = '';
    probe.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    probe.on('error', () => finish(null));
    probe.on('close', (code) => {
      const duration = Number.parseFloat(stdout.trim());
      finish(code === 0 && Number.isFinite(duration) && duration >= 0 ? duration : null);
    });
  });
}

/**
 * 获取音频时长（秒）；无法确定时返回 null
 */
export async function getAudioDuration(filePath: string): Promise<number | null> {
  try {
    const wavDuration = await readWavDuration(filePath);
    if (wavDuration !== null) return wavDuration;
  } catch {
    return null;
  }
  return probeDurationWithFfprobe(filePath);
}

export type AudioDurationProbe = (filePath: string) => Promise<number | null>;
