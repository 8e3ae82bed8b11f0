/**
 * 工作流配置加载：workflows.yaml（角色规则）+ workflows/*.json（节点图模板）
 * 配置目录默认 {cwd}/backend/config，可用 LIPSYNC_CONFIG_DIR 覆盖
 */
import path from 'path';
import { promises as fs } from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { errorMessage, type InputType, type JobGraph, type WorkflowDefinition } from '../domain/index.js';

const roleSpecSchema = z.object({
  class_type: z.string().min(1),
  title: z.string().optional(),
  field: z.string().min(1),
  preferred_id: z.union([z.string(), z.number()]).transform(String).optional(),
});

const workflowDefinitionSchema = z.object({
  template: z.string().min(1),
  roles: z
    .object({
      image: roleSpecSchema,
      video: roleSpecSchema,
      audio: roleSpecSchema,
      prompt: roleSpecSchema,
      width: roleSpecSchema,
      height: roleSpecSchema,
      frames: roleSpecSchema,
      sampler: roleSpecSchema,
    })
    .partial(),
});

const workflowsFileSchema = z.object({
  image: workflowDefinitionSchema,
  video: workflowDefinitionSchema,
});

const graphNodeSchema = z
  .object({
    class_type: z.string().min(1),
    inputs: z.record(z.unknown()).optional(),
    _meta: z.object({ title: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export const jobGraphSchema = z.record(graphNodeSchema);

export type WorkflowDefinitions = Record<InputType, WorkflowDefinition>;

export function getConfigDir(): string {
  if (process.env.LIPSYNC_CONFIG_DIR) {
    return path.resolve(process.env.LIPSYNC_CONFIG_DIR);
  }
  return path.join(process.cwd(), 'backend', 'config');
}

export async function loadWorkflowDefinitions(configDir = getConfigDir()): Promise<WorkflowDefinitions> {
  const filePath = path.join(configDir, 'workflows.yaml');
  let raw: unknown;
  try {
    raw = yaml.load(await fs.readFile(filePath, 'utf-8'));
  } catch (e) {
    throw new Error(`Failed to read workflows.yaml: ${errorMessage(e)}`);
  }
  const parsed = workflowsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid workflows.yaml: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

export async function loadTemplate(templateName: string, configDir = getConfigDir()): Promise<JobGraph> {
  const filePath = path.join(configDir, 'workflows', templateName);
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (e) {
    throw new Error(`Failed to load workflow template ${templateName}: ${errorMessage(e)}`);
  }
  const parsed = jobGraphSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid workflow template ${templateName}: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

/**
 * 带缓存的工作流仓库：定义与模板只读一次，注入时复制，不会被修改
 */
export class WorkflowRepository {
  private definitions: Promise<WorkflowDefinitions> | null = null;
  private readonly templates = new Map<string, Promise<JobGraph>>();

  constructor(private readonly configDir: string = getConfigDir()) {}

  getDefinition(inputType: InputType): Promise<WorkflowDefinition> {
    if (!this.definitions) {
      this.definitions = loadWorkflowDefinitions(this.configDir);
      this.definitions.catch(() => {
        this.definitions = null;
      });
    }
    return this.definitions.then((defs) => defs[inputType]);
  }

  getTemplate(templateName: string): Promise<JobGraph> {
    let template = this.templates.get(templateName);
    if (!template) {
      template = loadTemplate(templateName, this.configDir);
      this.templates.set(templateName, template);
      template.catch(() => this.templates.delete(templateName));
    }
    return template;
  }
}
