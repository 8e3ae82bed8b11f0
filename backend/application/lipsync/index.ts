/**
 * 应用层 lipsync 域：工作端处理单个唇形同步请求
 */
export {
  processLipsyncUseCase,
  createJobId,
  type ProcessLipsyncUseCaseDeps,
  type ProcessLipsyncUseCaseParams,
  type ProcessLipsyncUseCaseResult,
} from './process-lipsync-use-case.js';
