/**
 * 从执行历史中挑选产物文件
 */
import { NoOutputError, NotFoundError } from '../../../domain/index.js';
import type { Logger } from '../../../services/log-manager.js';
import type { ExecutionHistory } from './http-client.js';

export interface ArtifactCandidate {
  nodeId: string;
  path: string;
}

export interface SelectedArtifact extends ArtifactCandidate {
  /** 含可用产物的输出节点数；大于 1 时只取第一个 */
  outputNodes: number;
}

/**
 * 按节点顺序收集全部产物引用（gifs[].fullpath）。
 * 节点顺序即对象键顺序：整数形式的 id 按数值升序在前，其余 id 按响应中的出现顺序
 */
export function collectArtifactRefs(history: ExecutionHistory): ArtifactCandidate[] {
  const refs: ArtifactCandidate[] = [];
  for (const [nodeId, output] of Object.entries(history.outputs)) {
    for (const item of output.gifs ?? []) {
      if (item.fullpath) refs.push({ nodeId, path: item.fullpath });
    }
  }
  return refs;
}

/**
 * 只保留读取时仍存在的文件；第一个含可用文件的节点胜出，取其第一个文件
 */
export async function selectArtifact(
  history: ExecutionHistory,
  exists: (filePath: string) => Promise<boolean>,
  logger: Logger
): Promise<SelectedArtifact> {
  const refs = collectArtifactRefs(history);
  if (refs.length === 0) {
    throw new NoOutputError('Execution finished but history contains no output artifacts');
  }

  const resolvable: ArtifactCandidate[] = [];
  for (const ref of refs) {
    if (await exists(ref.path)) resolvable.push(ref);
    else logger.warn(`Output file missing: ${ref.path}`, { nodeId: ref.nodeId });
  }
  if (resolvable.length === 0) {
    throw new NotFoundError(`None of ${refs.length} output artifact(s) exist on disk`);
  }

  const [first] = resolvable;
  const outputNodes = new Set(resolvable.map((r) => r.nodeId)).size;
  if (outputNodes > 1) {
    logger.info(`Multiple output nodes produced files; using node ${first.nodeId}`, { outputNodes });
  }
  return { ...first, outputNodes };
}
