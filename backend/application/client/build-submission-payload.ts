/**
 * 由命令行参数构造提交载荷：http 开头按 URL 发送，其余视为本地文件读成 base64
 */
import { promises as fs } from 'fs';
import {
  DEFAULT_PROMPT,
  ValidationError,
  validateSubmissionPayload,
  type InputType,
  type SubmissionPayload,
} from '../../domain/index.js';

export type ClientMode = 'i2v' | 'v2v';

export const MODE_INPUT_TYPE: Record<ClientMode, InputType> = {
  i2v: 'image',
  v2v: 'video',
};

/** 两种模式的默认分辨率 */
export const MODE_DEFAULT_SIZE: Record<ClientMode, number> = {
  i2v: 384,
  v2v: 640,
};

export interface ClientJobOptions {
  mode: ClientMode;
  image?: string;
  video?: string;
  audio?: string;
  prompt?: string;
  width?: number;
  height?: number;
  maxFrame?: number;
  forceOffload?: boolean;
}

export function isRemoteSource(source: string): boolean {
  return source.startsWith('http');
}

async function readAsBase64(filePath: string, label: string): Promise<string> {
  try {
    return (await fs.readFile(filePath)).toString('base64');
  } catch {
    throw new ValidationError(`${label} file not found: ${filePath}`);
  }
}

async function mediaFields(
  source: string,
  prefix: 'image' | 'video' | 'wav',
  label: string
): Promise<Record<string, string>> {
  if (isRemoteSource(source)) {
    return { [`${prefix}_url`]: source };
  }
  return { [`${prefix}_base64`]: await readAsBase64(source, label) };
}

export async function buildSubmissionPayload(options: ClientJobOptions): Promise<SubmissionPayload> {
  const inputType = MODE_INPUT_TYPE[options.mode];
  const mediaSource = inputType === 'image' ? options.image : options.video;
  if (!mediaSource) {
    throw new ValidationError(
      inputType === 'image' ? 'Mode i2v requires an image (--image)' : 'Mode v2v requires a video (--video)'
    );
  }
  if (!options.audio) {
    throw new ValidationError('An audio file is required (--audio)');
  }

  const size = MODE_DEFAULT_SIZE[options.mode];
  const payload: Record<string, unknown> = {
    input_type: inputType,
    prompt: options.prompt ?? DEFAULT_PROMPT,
    width: options.width ?? size,
    height: options.height ?? size,
    // 未显式指定时不发送，由工作端默认值决定
    ...(options.forceOffload !== undefined ? { force_offload: options.forceOffload } : {}),
    ...(options.maxFrame !== undefined ? { max_frame: options.maxFrame } : {}),
    ...(await mediaFields(mediaSource, inputType, inputType === 'image' ? 'Image' : 'Video')),
    ...(await mediaFields(options.audio, 'wav', 'Audio')),
  };
  return validateSubmissionPayload(payload);
}
