/**
 * Log Manager - 统一日志管理
 * 系统日志写 logs/system/app.log（错误另写 error.log），任务审计日志按日期写 logs/audit/{date}/{jobId}_audit.jsonl
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { getLogConfig, shouldLog, type LogConfig, type LogLevel } from '../config/log-config.js';

export type { LogLevel } from '../config/log-config.js';
export type LogType = 'audit' | 'system';
export type LogMeta = Record<string, unknown>;

/**
 * 组件使用的日志接口：显式构造并传入，child 追加上下文字段（如 jobId）
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(context: LogMeta): Logger;
}

const BASE64_FIELDS = ['image_base64', 'video_base64', 'wav_base64', 'video'];

/**
 * 截断 base64 字段，避免日志被整段媒体数据淹没
 */
export function truncateBase64ForLog(value: string | undefined, maxLength = 50): string {
  if (!value) return 'None';
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}... (total ${value.length} chars)`;
}

export function redactPayloadForLog(payload: Record<string, unknown>): Record<string, unknown> {
  const copy: Record<string, unknown> = { ...payload };
  for (const key of BASE64_FIELDS) {
    const value = copy[key];
    if (typeof value === 'string') {
      copy[key] = truncateBase64ForLog(value);
    }
  }
  return copy;
}

function today(): string {
  return new Date().toISOString().split('T')[0];
}

/**
 * 统一日志管理器
 */
export class LogManager {
  private readonly config: LogConfig;
  private readonly logRoot: string | null;
  /** 串行写入链，保证同一文件内行顺序与调用顺序一致 */
  private pending: Promise<void> = Promise.resolve();

  constructor(config: LogConfig = getLogConfig()) {
    this.config = config;
    this.logRoot = config.logDir ? path.resolve(config.logDir) : null;
  }

  get root(): string | null {
    return this.logRoot;
  }

  /**
   * 确保日志目录存在
   */
  private async ensureLogDir(type: LogType, date?: string): Promise<string | null> {
    if (!this.logRoot) return null;
    const dirPath = type === 'system'
      ? path.join(this.logRoot, 'system')
      : path.join(this.logRoot, type, date || today());
    await fs.mkdir(dirPath, { recursive: true });
    return dirPath;
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.pending.then(task).catch((error) => {
      console.error('[LogManager] Failed to write log:', error);
    });
    this.pending = next;
    return next;
  }

  /**
   * 等待所有已排队的写入完成（进程退出前调用）
   */
  flush(): Promise<void> {
    return this.pending;
  }

  /**
   * 记录任务审计日志（生命周期事件：received / submitted / completed / failed）
   */
  logAudit(jobId: string, entry: LogMeta): Promise<void> {
    if (!this.config.audit.enabled || !this.logRoot) return Promise.resolve();
    const logEntry = {
      ...entry,
      jobId,
      logId: randomUUID(),
      timestamp: new Date().toISOString(),
    };
    return this.enqueue(async () => {
      const dirPath = await this.ensureLogDir('audit');
      if (!dirPath) return;
      await fs.appendFile(path.join(dirPath, `${jobId}_audit.jsonl`), JSON.stringify(logEntry) + '\n', 'utf-8');
    });
  }

  /**
   * 记录系统日志，同时按配置输出到控制台
   */
  logSystem(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!shouldLog(level, this.config.level)) return;

    if (this.config.system.consoleOutput) {
      const consoleMsg = `[${level.toUpperCase()}] ${message}`;
      const args: unknown[] = meta && Object.keys(meta).length > 0 ? [consoleMsg, meta] : [consoleMsg];
      if (level === 'error') {
        console.error(...args);
      } else if (level === 'warn') {
        console.warn(...args);
      } else {
        console.log(...args);
      }
    }

    if (!this.config.system.enabled || !this.logRoot) return;
    const logLine = JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...meta }) + '\n';
    void this.enqueue(async () => {
      const dirPath = await this.ensureLogDir('system');
      if (!dirPath) return;
      await fs.appendFile(path.join(dirPath, 'app.log'), logLine, 'utf-8');
      if (level === 'error') {
        await fs.appendFile(path.join(dirPath, 'error.log'), logLine, 'utf-8');
      }
    });
  }

  createLogger(context: LogMeta = {}): Logger {
    return new ContextLogger(this, context);
  }

  /**
   * 清理旧的审计日志目录
   */
  async cleanupOldLogs(daysToKeep: number = this.config.cleanup.keepDays): Promise<number> {
    if (!this.logRoot) return 0;
    const cutoffDate = new Date();
    cutoffDate.setDate(cutoffDate.getDate() - daysToKeep);
    const typeDir = path.join(this.logRoot, 'audit');

    let dates: string[];
    try {
      dates = await fs.readdir(typeDir);
    } catch {
      return 0;
    }

    let removed = 0;
    for (const dateStr of dates) {
      const dirDate = new Date(dateStr);
      if (Number.isNaN(dirDate.getTime()) || dirDate >= cutoffDate) continue;
      await fs.rm(path.join(typeDir, dateStr), { recursive: true, force: true });
      removed++;
    }
    return removed;
  }

}

class ContextLogger implements Logger {
  constructor(
    private readonly manager: LogManager,
    private readonly context: LogMeta
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.manager.logSystem('debug', message, { ...this.context, ...meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.manager.logSystem('info', message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.manager.logSystem('warn', message, { ...this.context, ...meta });
  }

  error(message: string, meta?: LogMeta): void {
    this.manager.logSystem('error', message, { ...this.context, ...meta });
  }

  child(context: LogMeta): Logger {
    return new ContextLogger(this.manager, { ...this.context, ...context });
  }
}

/** 不输出任何内容的日志器（测试与库调用方默认） */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
