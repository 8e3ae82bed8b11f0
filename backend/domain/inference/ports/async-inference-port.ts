/**
 * 异步任务端口：submit 入队返回任务 id，poll 查询一次任务状态
 * （等待终态、下载产物由应用层编排，端口只负责单次调用）
 */
export interface AsyncInferencePort<TInput, TTaskId, TStatus> {
  submit(input: TInput): Promise<TTaskId>;
  poll(taskId: TTaskId): Promise<TStatus>;
}
