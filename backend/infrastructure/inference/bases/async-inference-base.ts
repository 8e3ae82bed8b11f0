/**
 * 异步任务适配器基类：封装 submit + poll 契约
 * 子类实现 _submit 与 _poll；未分类的异常在此归入 SubmissionError / PollError
 */
import {
  LipsyncError,
  PollError,
  SubmissionError,
  errorMessage,
  type AsyncInferencePort,
} from '../../../domain/index.js';
import { silentLogger, type Logger } from '../../../services/log-manager.js';

export abstract class AsyncInferenceBase<TInput, TTaskId, TStatus>
  implements AsyncInferencePort<TInput, TTaskId, TStatus>
{
  protected readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  async submit(input: TInput): Promise<TTaskId> {
    try {
      return await this._submit(input);
    } catch (error) {
      if (error instanceof LipsyncError) throw error;
      throw new SubmissionError(`Submit failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async poll(taskId: TTaskId): Promise<TStatus> {
    try {
      return await this._poll(taskId);
    } catch (error) {
      if (error instanceof LipsyncError) throw error;
      throw new PollError(`Poll failed: ${errorMessage(error)}`, 1, { cause: error });
    }
  }

  protected abstract _submit(input: TInput): Promise<TTaskId>;
  protected abstract _poll(taskId: TTaskId): Promise<TStatus>;
}
