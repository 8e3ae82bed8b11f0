/**
 * 领域层导出
 */
export type { AsyncInferencePort, SyncInferencePort } from './inference/index.js';
export * from './job/types.js';
export * from './job/errors.js';
export {
  DEFAULT_PROMPT,
  DEFAULT_SIZE,
  SOURCE_PRIORITY,
  submissionPayloadSchema,
  validateSubmissionPayload,
  selectMediaReference,
  mediaKindFor,
  parseJobRequest,
  type MediaSelection,
  type ParsedJobRequest,
} from './job/value-objects/submission.js';
export * from './workflow/types.js';
