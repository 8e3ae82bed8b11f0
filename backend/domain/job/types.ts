/**
 * 唇形同步任务的领域类型：请求、媒体来源、任务状态与结果
 */

/** 两种输入模式：图生视频（image）与视频生视频（video） */
export type InputType = 'image' | 'video';

/** 需要落地为本地文件的媒体种类 */
export type MediaKind = 'image' | 'video' | 'audio';

/** 媒体来源形式，优先级 path > url > base64 */
export type MediaSourceForm = 'path' | 'url' | 'base64';

export interface MediaReference {
  kind: MediaKind;
  form: MediaSourceForm;
  value: string;
}

/** 提交载荷（与队列端点、同步端点共用的 JSON 结构） */
export interface SubmissionPayload {
  input_type: InputType;
  prompt?: string;
  width?: number;
  height?: number;
  max_frame?: number;
  force_offload?: boolean;
  image_path?: string;
  image_url?: string;
  image_base64?: string;
  video_path?: string;
  video_url?: string;
  video_base64?: string;
  wav_path?: string;
  wav_url?: string;
  wav_base64?: string;
}

/** 解析、补全默认值后的任务请求 */
export interface JobRequest {
  inputType: InputType;
  prompt: string;
  width: number;
  height: number;
  maxFrame?: number;
  forceOffload: boolean;
  media: MediaReference;
  audio: MediaReference;
}

export const TASK_STATUSES = ['PENDING', 'RUNNING', 'COMPLETED', 'COMPLETE', 'FAILED', 'CANCELED'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

const TERMINAL: ReadonlySet<string> = new Set<TaskStatus>(['COMPLETED', 'COMPLETE', 'FAILED', 'CANCELED']);
const SUCCEEDED: ReadonlySet<string> = new Set<TaskStatus>(['COMPLETED', 'COMPLETE']);

export function isTerminalStatus(status: string): boolean {
  return TERMINAL.has(status);
}

export function isSuccessStatus(status: string): boolean {
  return SUCCEEDED.has(status);
}

export interface TaskOutput {
  url?: string;
  name?: string;
  [key: string]: unknown;
}

/** 队列状态查询响应；status 保留服务端原始字符串以便向前兼容 */
export interface TaskStatusRecord {
  task_id?: string;
  status: string;
  outputs: TaskOutput[];
  error?: string;
}

/** 同步端点响应 */
export type InlineVideoResponse = { video: string } | { error: string; code?: string };

/** 对外统一的结果形状：成功携带产物，失败携带可读错误 */
export type JobOutcome<T> = ({ ok: true } & T) | { ok: false; error: string; code: string; taskId?: string };
