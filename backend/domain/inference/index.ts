export type { SyncInferencePort } from './ports/sync-inference-port.js';
export type { AsyncInferencePort } from './ports/async-inference-port.js';
