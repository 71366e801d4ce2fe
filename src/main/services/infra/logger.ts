/**
 * 统一日志服务
 * 带上下文和级别的控制台日志，替代散落的 console.log
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * LOG_LEVEL 优先；否则 production 为 INFO，其余为 DEBUG
 */
function resolveDefaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (fromEnv && fromEnv in LEVEL_NAMES) {
    return LEVEL_NAMES[fromEnv];
  }
  return process.env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

export class Logger {
  // 未显式设置时每次按环境变量解析，CLI 可在启动后调整 LOG_LEVEL
  private level?: LogLevel;
  private context?: string;

  constructor(context?: string) {
    this.context = context;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? resolveDefaultLevel();
  }

  /**
   * 派生子上下文，例如 StoryArcPlanner:run-1a2b
   */
  child(suffix: string): Logger {
    const child = new Logger(this.context ? `${this.context}:${suffix}` : suffix);
    if (this.level !== undefined) {
      child.setLevel(this.level);
    }
    return child;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.DEBUG) {
      this.log('DEBUG', message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.INFO) {
      this.log('INFO', message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.WARN) {
      this.log('WARN', message, args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.getLevel() > LogLevel.ERROR) return;

    // Error 对象展开为 message + stack
    const firstArg = args[0];
    if (firstArg instanceof Error) {
      const errorInfo = { errorMessage: firstArg.message, stack: firstArg.stack };
      this.log('ERROR', message, [errorInfo, ...args.slice(1)]);
    } else {
      this.log('ERROR', message, args);
    }
  }

  private log(level: string, message: string, args: unknown[]): void {
    const timestamp = new Date().toISOString();
    const ctx = this.context ? `[${this.context}]` : '';

    const logFn =
      level === 'ERROR'
        ? console.error
        : level === 'WARN'
          ? console.warn
          : console.log;

    if (args.length > 0) {
      logFn(`${timestamp} ${level} ${ctx} ${message}`, ...args);
    } else {
      logFn(`${timestamp} ${level} ${ctx} ${message}`);
    }
  }
}

/**
 * 创建带上下文的 Logger 实例
 * @param context 日志上下文（通常是类名或模块名）
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}

/**
 * 默认 Logger 实例（无上下文）
 */
export const logger = new Logger();
