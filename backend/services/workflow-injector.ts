/**
 * 工作流参数注入：按角色定位模板节点，把请求参数写进节点 inputs
 *
 * 角色表（role → node id）对每张图只构建一次。同一角色有多个候选节点时，
 * 先检查 preferred_id，其次取图遍历顺序中的第一个匹配节点；决定写入日志。
 */
import {
  ValidationError,
  type GraphNode,
  type InputType,
  type JobGraph,
  type RoleBinding,
  type RoleSpec,
  type RoleSpecs,
  type RoleTable,
  type WorkflowRole,
} from '../domain/index.js';
import type { AudioDurationProbe } from './audio-duration.js';
import type { Logger } from './log-manager.js';

export const FRAMES_PER_SECOND = 25;
export const LOOKAHEAD_FRAMES = 81;
export const DEFAULT_MAX_FRAMES = 81;

const ROLE_ORDER: WorkflowRole[] = ['image', 'video', 'audio', 'prompt', 'width', 'height', 'frames', 'sampler'];

export interface InjectionParams {
  inputType: InputType;
  mediaPath: string;
  audioPath: string;
  prompt: string;
  width: number;
  height: number;
  maxFrame: number;
  forceOffload: boolean;
}

function matches(node: GraphNode, spec: RoleSpec): boolean {
  if (node.class_type !== spec.class_type) return false;
  return spec.title === undefined || node._meta?.title === spec.title;
}

/** 定位单个角色；找不到返回 null。未命中优先 id 时取对象键顺序（整数 id 升序）中的第一个 */
export function locateRole(graph: JobGraph, role: WorkflowRole, spec: RoleSpec): RoleBinding | null {
  const candidates = Object.keys(graph).filter((id) => matches(graph[id], spec));
  if (candidates.length === 0) return null;

  const preferred = spec.preferred_id;
  if (preferred !== undefined && candidates.includes(preferred)) {
    return { role, nodeId: preferred, field: spec.field, via: 'preferred', candidates: candidates.length };
  }
  return { role, nodeId: candidates[0], field: spec.field, via: 'scan', candidates: candidates.length };
}

/**
 * 构建角色表：必需角色缺失抛 ValidationError，可选角色缺失只告警
 */
export function buildRoleTable(
  graph: JobGraph,
  specs: RoleSpecs,
  requiredRoles: readonly WorkflowRole[],
  logger: Logger
): RoleTable {
  const table: RoleTable = new Map();

  for (const role of requiredRoles) {
    if (!specs[role]) {
      throw new ValidationError(`Workflow has no rule for required role "${role}"`);
    }
  }

  for (const role of ROLE_ORDER) {
    const spec = specs[role];
    if (!spec) continue;
    const binding = locateRole(graph, role, spec);
    if (!binding) {
      if (requiredRoles.includes(role)) {
        throw new ValidationError(`Required workflow node not found for role "${role}" (${spec.class_type})`);
      }
      logger.warn(`Workflow node for role "${role}" (${spec.class_type}) not found; using template defaults`, { role });
      continue;
    }
    if (binding.candidates > 1 || binding.via === 'scan') {
      logger.info(`Role "${role}" resolved to node ${binding.nodeId}`, {
        role,
        nodeId: binding.nodeId,
        via: binding.via,
        candidates: binding.candidates,
      });
    }
    table.set(role, binding);
  }
  return table;
}

export function requiredRolesFor(inputType: InputType): WorkflowRole[] {
  return [inputType === 'video' ? 'video' : 'image', 'audio', 'prompt'];
}

/** frames = floor(duration * 25) + 81；时长未知时回退 81 */
export function calculateMaxFrames(durationSeconds: number | null): number {
  if (durationSeconds === null || !Number.isFinite(durationSeconds) || durationSeconds < 0) {
    return DEFAULT_MAX_FRAMES;
  }
  return Math.floor(durationSeconds * FRAMES_PER_SECOND) + LOOKAHEAD_FRAMES;
}

/**
 * 解析帧数：调用方显式给出则直接使用，否则由音频时长推算
 */
export async function resolveMaxFrames(
  explicit: number | undefined,
  audioPath: string,
  probe: AudioDurationProbe,
  logger: Logger
): Promise<number> {
  if (explicit !== undefined) return explicit;
  const duration = await probe(audioPath);
  if (duration === null) {
    logger.warn(`Could not determine audio duration (${audioPath}); using default ${DEFAULT_MAX_FRAMES} frames`);
    return DEFAULT_MAX_FRAMES;
  }
  const maxFrames = calculateMaxFrames(duration);
  logger.info(`Audio duration ${duration.toFixed(2)}s, calculated max_frame=${maxFrames}`);
  return maxFrames;
}

function setField(graph: JobGraph, binding: RoleBinding | undefined, value: unknown): void {
  if (!binding) return;
  const node = graph[binding.nodeId];
  node.inputs = { ...(node.inputs ?? {}), [binding.field]: value };
}

/**
 * 注入参数，返回新的节点图；模板本身不被修改
 */
export function injectParameters(
  template: JobGraph,
  params: InjectionParams,
  specs: RoleSpecs,
  logger: Logger
): JobGraph {
  const graph: JobGraph = structuredClone(template);
  const mediaRole: WorkflowRole = params.inputType === 'video' ? 'video' : 'image';
  const table = buildRoleTable(graph, specs, requiredRolesFor(params.inputType), logger);

  setField(graph, table.get(mediaRole), params.mediaPath);
  setField(graph, table.get('audio'), params.audioPath);
  setField(graph, table.get('prompt'), params.prompt);
  setField(graph, table.get('width'), params.width);
  setField(graph, table.get('height'), params.height);
  setField(graph, table.get('frames'), params.maxFrame);

  const sampler = table.get('sampler');
  if (sampler) {
    setField(graph, sampler, params.forceOffload);
    logger.info(`Node ${sampler.nodeId} (${graph[sampler.nodeId].class_type}) updated: force_offload=${params.forceOffload}`);
  } else if (!specs.sampler) {
    logger.warn('Workflow has no sampler rule; force_offload left at workflow default');
  }

  return graph;
}
