/**
 * Log Configuration
 * 日志系统配置
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogConfig {
  // 日志级别
  level: LogLevel;

  // 日志根目录；null 表示不落盘
  logDir: string | null;

  audit: {
    enabled: boolean;
  };

  system: {
    enabled: boolean;
    consoleOutput: boolean;  // 是否同时输出到控制台
  };

  // 清理策略
  cleanup: {
    keepDays: number;         // 保留天数
  };
}

/**
 * 默认日志配置
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  logDir: './logs',

  audit: {
    enabled: true,
  },

  system: {
    enabled: true,
    consoleOutput: true,
  },

  cleanup: {
    keepDays: 30,
  },
};

/**
 * 开发环境日志配置
 */
export const DEV_LOG_CONFIG: LogConfig = {
  ...DEFAULT_LOG_CONFIG,
  level: 'debug',
};

/**
 * 生产环境日志配置
 */
export const PROD_LOG_CONFIG: LogConfig = {
  ...DEFAULT_LOG_CONFIG,
  level: 'info',
};

/** 测试用：不写文件、不输出控制台 */
export const SILENT_LOG_CONFIG: LogConfig = {
  ...DEFAULT_LOG_CONFIG,
  logDir: null,
  audit: { enabled: false },
  system: { enabled: false, consoleOutput: false },
};

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * 根据环境获取日志配置：NODE_ENV 选基线，LOG_LEVEL / LOG_DIR / LOG_CONSOLE / LOG_FILE 覆盖
 */
export function getLogConfig(): LogConfig {
  const env = process.env.NODE_ENV || 'development';
  const base = env === 'production' ? PROD_LOG_CONFIG : DEV_LOG_CONFIG;

  const level = process.env.LOG_LEVEL?.trim().toLowerCase();
  const logDir = process.env.LOG_DIR?.trim();
  const fileOutput = process.env.LOG_FILE?.trim().toLowerCase();
  const consoleOutput = process.env.LOG_CONSOLE?.trim().toLowerCase();

  return {
    ...base,
    level: isLogLevel(level) ? level : base.level,
    logDir: fileOutput === 'false' || fileOutput === '0' ? null : logDir || base.logDir,
    system: {
      ...base.system,
      consoleOutput: consoleOutput ? consoleOutput === 'true' || consoleOutput === '1' : base.system.consoleOutput,
    },
  };
}

/**
 * 检查日志级别是否应该记录
 */
export function shouldLog(
  messageLevel: LogLevel,
  configLevel: LogLevel = 'info'
): boolean {
  return LEVELS.indexOf(messageLevel) >= LEVELS.indexOf(configLevel);
}
