/**
 * Harness Logger
 *
 * Leveled console logging for the cluster test kit. Node secrets and
 * authorization tokens end up in log lines fairly often (config dumps,
 * request traces), so they are redacted unless LOG_SECRETS=true.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerConfig {
  level: LogLevel;
  redactSecrets: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

/**
 * Redact a sensitive value, showing only first and last characters
 * @param value The value to redact
 * @param showChars Number of characters to show at start and end
 */
export function redact(value: string, showChars = 2): string {
  if (!value || value.length <= showChars * 2) return '****';
  return `${value.slice(0, showChars)}****${value.slice(-showChars)}`;
}

/**
 * Lifecycle events reported by supervised nodes
 */
export type ProcessEvent = 'spawned' | 'healthy' | 'startup_failed' | 'exited' | 'stopping' | 'stopped';

class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const envLevel = process.env['LOG_LEVEL'];

    this.config = {
      level: isLogLevel(envLevel) ? envLevel : 'info',
      redactSecrets: process.env['LOG_SECRETS'] !== 'true',
      ...config,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  get level(): LogLevel {
    return this.config.level;
  }

  /**
   * Redact a secret (password, key, token) based on configuration
   */
  secret(value: string): string {
    return this.config.redactSecrets ? redact(value) : value;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      if (meta) {
        console.debug(`[DEBUG] ${message}`, meta);
      } else {
        console.debug(`[DEBUG] ${message}`);
      }
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      if (meta) {
        console.log(`[INFO] ${message}`, meta);
      } else {
        console.log(`[INFO] ${message}`);
      }
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      if (meta) {
        console.warn(`[WARN] ${message}`, meta);
      } else {
        console.warn(`[WARN] ${message}`);
      }
    }
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      if (error && meta) {
        console.error(`[ERROR] ${message}`, error, meta);
      } else if (error) {
        console.error(`[ERROR] ${message}`, error);
      } else if (meta) {
        console.error(`[ERROR] ${message}`, meta);
      } else {
        console.error(`[ERROR] ${message}`);
      }
    }
  }

  /**
   * Log a lifecycle event of a supervised node
   */
  processEvent(event: ProcessEvent, host: string, details: Record<string, unknown> = {}): void {
    const filtered = Object.fromEntries(
      Object.entries({ host, ...details }).filter(([, v]) => v !== undefined)
    );

    if (event === 'startup_failed') {
      this.warn(`[Process] ${event}`, filtered);
    } else {
      this.debug(`[Process] ${event}`, filtered);
    }
  }

  /**
   * Log one hop of a redirect-following transfer
   */
  transferHop(method: string, url: string, status: number, hop: number): void {
    this.debug(`[Transfer] ${method} ${url} -> ${status}`, { hop });
  }
}

// Export a singleton instance
export const logger = new Logger();

// Also export the class for testing or custom configurations
export { Logger };
