/**
 * 同步推理适配器基类：execute 统一记录耗时与失败
 * 子类实现 _execute 完成具体调用
 */
import { errorCode, errorMessage, type SyncInferencePort } from '../../../domain/index.js';
import { silentLogger, type Logger } from '../../../services/log-manager.js';

export abstract class SyncInferenceBase<TInput, TOutput> implements SyncInferencePort<TInput, TOutput> {
  protected readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  async execute(input: TInput): Promise<TOutput> {
    const startedAt = Date.now();
    try {
      const output = await this._execute(input);
      this.logger.debug(`${this.constructor.name} finished`, { elapsedMs: Date.now() - startedAt });
      return output;
    } catch (error) {
      this.logger.error(`${this.constructor.name} failed: ${errorMessage(error)}`, {
        code: errorCode(error),
        elapsedMs: Date.now() - startedAt,
      });
      throw error;
    }
  }

  protected abstract _execute(input: TInput): Promise<TOutput>;
}
