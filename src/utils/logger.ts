/**
 * 日志系统
 *
 * 级别过滤 + 模块标识 + 结构化上下文。
 * 控制台输出单行文本，内存传输器保留最近的条目供检查。
 *
 * @module Logger
 * @version 1.0.0
 */

// ============================================
// Types
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogModule =
  | 'episodic'
  | 'semantic'
  | 'retriever'
  | 'tracing'
  | 'config'
  | 'system';

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  module?: LogModule;
  context?: LogContext;
  error?: Error;
  source?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  /** 内存中保留的条目数 */
  memorySize: number;
}

export interface LogTransport {
  name: string;
  log(entry: LogEntry): void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  enableConsole: true,
  memorySize: 1000,
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

// ============================================
// Transports
// ============================================

/**
 * 单行输出：时间 级别 [模块] [来源] 消息 {上下文}
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [entry.timestamp.toISOString(), entry.level.toUpperCase().padEnd(5)];
  if (entry.module) parts.push(`[${entry.module}]`);
  if (entry.source) parts.push(`[${entry.source}]`);
  parts.push(entry.message);
  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }
  if (entry.error) {
    parts.push(`(${entry.error.name}: ${entry.error.message})`);
  }
  return parts.join(' ');
}

class ConsoleTransport implements LogTransport {
  name = 'console';

  log(entry: LogEntry): void {
    const line = formatEntry(entry);
    if (entry.level === 'error' || entry.level === 'fatal') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export class MemoryTransport implements LogTransport {
  name = 'memory';
  private entries: LogEntry[] = [];

  constructor(private maxSize: number = DEFAULT_LOGGER_CONFIG.memorySize) {}

  log(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxSize) {
      this.entries.splice(0, this.entries.length - this.maxSize);
    }
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter(entry => entry.level === level) : [...this.entries];
  }
}

// ============================================
// Logger
// ============================================

export class Logger {
  private config: LoggerConfig;
  private transports: LogTransport[];
  private memory: MemoryTransport;
  private module?: LogModule;
  private bound: LogContext = {};

  constructor(config: Partial<LoggerConfig> = {}, private source?: string, module?: LogModule) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.module = module;
    this.memory = new MemoryTransport(this.config.memorySize);
    this.transports = this.config.enableConsole ? [new ConsoleTransport(), this.memory] : [this.memory];
  }

  get level(): LogLevel {
    return this.config.level;
  }

  /**
   * 模块日志器；与父级共享级别和传输器
   */
  forModule(module: LogModule): Logger {
    return this.derive(module, this.bound);
  }

  /**
   * 附带固定上下文的子日志器
   */
  child(context: LogContext): Logger {
    return this.derive(this.module, { ...this.bound, ...context });
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!isLevelEnabled(this.config.level, level)) return;

    const hasBound = Object.keys(this.bound).length > 0;
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      module: this.module,
      context: hasBound ? { ...this.bound, ...context } : context,
      error,
      source: this.source,
    };

    for (const transport of this.transports) {
      try {
        transport.log(entry);
      } catch (err) {
        console.error(`[Logger] transport ${transport.name} failed:`, err);
      }
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log('warn', message, context, error);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log('error', message, context, error);
  }

  fatal(message: string, context?: LogContext, error?: Error): void {
    this.log('fatal', message, context, error);
  }

  /**
   * 内存中保留的条目
   */
  getAllLogs(): LogEntry[] {
    return this.memory.getLogs();
  }

  private derive(module: LogModule | undefined, bound: LogContext): Logger {
    const derived = new Logger({ ...this.config, enableConsole: false }, this.source, module);
    derived.config = this.config;
    derived.transports = this.transports;
    derived.memory = this.memory;
    derived.bound = bound;
    return derived;
  }
}

// ============================================
// Global & module loggers
// ============================================

let globalLogger: Logger | null = null;
const moduleLoggers = new Map<LogModule, Logger>();

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
  moduleLoggers.clear();
}

export function getLogger(module: LogModule): Logger {
  let logger = moduleLoggers.get(module);
  if (!logger) {
    logger = getGlobalLogger().forModule(module);
    moduleLoggers.set(module, logger);
  }
  return logger;
}

export function createLogger(config?: Partial<LoggerConfig> & { name?: string; module?: LogModule }): Logger {
  return new Logger(config, config?.name, config?.module);
}
