import { promises as fs } from 'fs';
import path from 'path';
import fg from 'fast-glob';

const WORKSPACES_DIRNAME = 'workspaces';

function normalizeRelative(relativePath: string): string {
  return relativePath.replace(/\\/g, '/');
}

function ensureTrailingSep(dir: string): string {
  return dir.endsWith(path.sep) ? dir : `${dir}${path.sep}`;
}

function resolveRootDir(outputPath?: string): string {
  const base = outputPath ? path.resolve(outputPath) : path.resolve(process.cwd(), 'outputs');
  return path.join(base, WORKSPACES_DIRNAME);
}

export interface JobWorkspaceEntry {
  jobId: string;
  path: string;
  mtimeMs: number;
}

/**
 * 按任务隔离的工作目录：{outputPath}/workspaces/{jobId}/…
 * 每个任务独占一个目录，并发任务之间不会在文件名上冲突。
 */
export class WorkspaceFilesystem {
  private readonly rootDir: string;
  private readonly rootWithSep: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
    this.rootWithSep = ensureTrailingSep(this.rootDir);
  }

  get root(): string {
    return this.rootDir;
  }

  async ensureRoot(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  jobPath(jobId: string, relativePath = ''): string {
    if (!jobId || jobId.includes('/') || jobId.includes('\\') || jobId.includes('..')) {
      throw new Error(`Invalid job id: ${jobId}`);
    }
    // 只接受相对路径，resolve 结果不得脱离 root
    const trimmed = relativePath.replace(/\\/g, '/').replace(/^\/+/, '').trim();
    if (path.isAbsolute(relativePath) || trimmed.includes('..')) {
      throw new Error('Path escapes workspace root');
    }
    const resolved = path.resolve(this.rootDir, jobId, normalizeRelative(trimmed));
    if (!path.normalize(resolved).startsWith(path.normalize(this.rootWithSep))) {
      throw new Error('Path escapes workspace root');
    }
    return resolved;
  }

  async writeFile(jobId: string, relativePath: string, data: string | NodeJS.ArrayBufferView): Promise<string> {
    const targetPath = this.jobPath(jobId, relativePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.writeFile(targetPath, data);
    return targetPath;
  }

  async copyInto(jobId: string, relativePath: string, sourcePath: string): Promise<string> {
    const targetPath = this.jobPath(jobId, relativePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.copyFile(sourcePath, targetPath);
    return targetPath;
  }

  /** 列出全部任务目录（供过期清理） */
  async listJobs(): Promise<JobWorkspaceEntry[]> {
    await this.ensureRoot();
    const dirs = await fg('*', { cwd: this.rootDir, onlyDirectories: true, stats: true });
    return dirs.map((entry) => ({
      jobId: entry.name,
      path: path.resolve(this.rootDir, entry.path),
      mtimeMs: entry.stats?.mtimeMs ?? 0,
    }));
  }

  async rm(jobId: string, relativePath = ''): Promise<void> {
    const targetPath = this.jobPath(jobId, relativePath);
    const maxRetries = 3;
    const retryDelayMs = 200;
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        await fs.rm(targetPath, { recursive: true, force: true });
        return;
      } catch (err: unknown) {
        const code = err instanceof Error && 'code' in err ? err.code : undefined;
        const isRetryable = code === 'EPERM' || code === 'EBUSY';
        if (!isRetryable || attempt === maxRetries) throw err;
        await new Promise((r) => setTimeout(r, retryDelayMs));
      }
    }
  }

  /** 删除最后修改时间早于 cutoffMs 的任务目录，返回删除的 jobId */
  async pruneOlderThan(cutoffMs: number): Promise<string[]> {
    const removed: string[] = [];
    for (const entry of await this.listJobs()) {
      if (entry.mtimeMs >= cutoffMs) continue;
      await this.rm(entry.jobId);
      removed.push(entry.jobId);
    }
    return removed;
  }
}

export function resolveWorkspaceRoot(outputPath?: string): string {
  return resolveRootDir(outputPath);
}
