/**
 * 同步推理端口：一次请求直接返回结果（如同步端点内联返回 base64 视频）
 */
export interface SyncInferencePort<TInput, TOutput> {
  execute(input: TInput): Promise<TOutput>;
}
