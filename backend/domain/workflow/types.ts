/**
 * 节点图（Job Graph）类型：以节点 id 为键，节点含 class_type、可选标题与输入字段
 */

/** 字段值为标量，或指向另一节点输出的引用 [节点 id, 输出槽位] */
export interface GraphNode {
  class_type: string;
  inputs?: Record<string, unknown>;
  _meta?: { title?: string };
}

export type JobGraph = Record<string, GraphNode>;

/** 注入器依赖的节点角色 */
export type WorkflowRole = 'image' | 'video' | 'audio' | 'prompt' | 'width' | 'height' | 'frames' | 'sampler';

/** 角色匹配规则（来自 workflows.yaml） */
export interface RoleSpec {
  class_type: string;
  /** 同 class_type 有多个节点时用标题区分（如 Width / Height） */
  title?: string;
  /** 写入的输入字段名 */
  field: string;
  /** 优先检查的节点 id */
  preferred_id?: string;
}

export type RoleSpecs = Partial<Record<WorkflowRole, RoleSpec>>;

/** 角色定位结果；via 记录是命中优先 id 还是按遍历顺序回退 */
export interface RoleBinding {
  role: WorkflowRole;
  nodeId: string;
  field: string;
  via: 'preferred' | 'scan';
  candidates: number;
}

export type RoleTable = Map<WorkflowRole, RoleBinding>;

export interface WorkflowDefinition {
  /** 模板文件名（相对 workflows 目录） */
  template: string;
  roles: RoleSpecs;
}
