type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
  /** Lowest level written; defaults to LOG_LEVEL, then `info` */
  level?: LogLevel;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

class ExtractorLogger {
  private prefix: string;
  private enabled: boolean;
  private threshold: number;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '[Extractor]';
    this.enabled = options.enabled ?? process.env.NODE_ENV !== 'test';
    this.threshold = LEVEL_ORDER[options.level ?? levelFromEnv()];
  }

  private shouldLog(level: LogLevel): boolean {
    return this.enabled && LEVEL_ORDER[level] >= this.threshold;
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}`;
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message));
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message));
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message));
    }
  }

  error(message: string, error?: Error): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message), error?.stack || '');
    }
  }
}

export const extractionLogger = new ExtractorLogger({ prefix: '[Extraction]' });
export const inferenceLogger = new ExtractorLogger({ prefix: '[Inference]' });
export const pipelineLogger = new ExtractorLogger({ prefix: '[Pipeline]' });
export const cliLogger = new ExtractorLogger({ prefix: '[ClaudeCli]' });

export function createLogger(prefix: string, enabled?: boolean, level?: LogLevel): ExtractorLogger {
  return new ExtractorLogger({ prefix, enabled, level });
}

export { ExtractorLogger, isLogLevel };
export type { LogLevel };
