/**
 * 提交载荷的校验与解析：zod 校验字段类型，再按媒体种类选出唯一来源
 */
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type {
  InputType,
  JobRequest,
  MediaKind,
  MediaReference,
  MediaSourceForm,
  SubmissionPayload,
} from '../types.js';

export const DEFAULT_PROMPT = 'A person talking naturally';
export const DEFAULT_SIZE = 512;

/** 同一媒体出现多种来源时的固定优先级 */
export const SOURCE_PRIORITY: readonly MediaSourceForm[] = ['path', 'url', 'base64'];

const optionalSource = z.string().min(1).optional();

export const submissionPayloadSchema = z
  .object({
    input_type: z.enum(['image', 'video']).default('image'),
    prompt: z.string().optional(),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
    max_frame: z.number().int().positive().optional(),
    force_offload: z.boolean().optional(),
    image_path: optionalSource,
    image_url: optionalSource,
    image_base64: optionalSource,
    video_path: optionalSource,
    video_url: optionalSource,
    video_base64: optionalSource,
    wav_path: optionalSource,
    wav_url: optionalSource,
    wav_base64: optionalSource,
  })
  .passthrough();

/** 载荷中每种媒体的键名前缀（音频沿用 wav_ 前缀） */
const KEY_PREFIX = {
  image: 'image',
  video: 'video',
  audio: 'wav',
} as const satisfies Record<MediaKind, string>;

type MediaSourceKey = `${(typeof KEY_PREFIX)[MediaKind]}_${MediaSourceForm}`;

function sourceKey(kind: MediaKind, form: MediaSourceForm): MediaSourceKey {
  return `${KEY_PREFIX[kind]}_${form}` as const;
}

export function validateSubmissionPayload(input: unknown): SubmissionPayload {
  const parsed = submissionPayloadSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid submission payload: ${detail}`);
  }
  return parsed.data;
}

export interface MediaSelection {
  reference: MediaReference;
  /** 被忽略的其它来源形式（存在多种来源时） */
  ignored: MediaSourceForm[];
}

/**
 * 为某种媒体选出唯一来源；一个都没有时抛 ValidationError。
 * 多种来源并存时按 path > url > base64 取第一个，与键的出现顺序无关。
 */
export function selectMediaReference(payload: SubmissionPayload, kind: MediaKind): MediaSelection {
  const present = SOURCE_PRIORITY.filter((form) => {
    const value = payload[sourceKey(kind, form)];
    return typeof value === 'string' && value.length > 0;
  });
  const [form, ...ignored] = present;
  if (!form) {
    const keys = SOURCE_PRIORITY.map((f) => sourceKey(kind, f)).join(', ');
    throw new ValidationError(`${describeKind(kind)} input required (${keys})`);
  }
  const value = payload[sourceKey(kind, form)] ?? '';
  return { reference: { kind, form, value }, ignored };
}

function describeKind(kind: MediaKind): string {
  return kind === 'audio' ? 'Audio' : kind === 'video' ? 'Video' : 'Image';
}

export function mediaKindFor(inputType: InputType): MediaKind {
  return inputType === 'video' ? 'video' : 'image';
}

export interface ParsedJobRequest {
  request: JobRequest;
  warnings: string[];
}

/** 载荷 → JobRequest：补全默认值，收集非致命告警 */
export function parseJobRequest(input: unknown): ParsedJobRequest {
  const payload = validateSubmissionPayload(input);
  const inputType = payload.input_type;
  const media = selectMediaReference(payload, mediaKindFor(inputType));
  const audio = selectMediaReference(payload, 'audio');

  const warnings: string[] = [];
  for (const selection of [media, audio]) {
    if (selection.ignored.length > 0) {
      warnings.push(
        `Multiple ${selection.reference.kind} sources supplied; using ${selection.reference.form}, ignoring ${selection.ignored.join(', ')}`
      );
    }
  }

  return {
    request: {
      inputType,
      prompt: payload.prompt ?? DEFAULT_PROMPT,
      width: payload.width ?? DEFAULT_SIZE,
      height: payload.height ?? DEFAULT_SIZE,
      maxFrame: payload.max_frame,
      forceOffload: payload.force_offload ?? true,
      media: media.reference,
      audio: audio.reference,
    },
    warnings,
  };
}
