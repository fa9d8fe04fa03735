/**
 * Structured JSON Logger
 *
 * Base logger shared by the agents. Each agent extends it with typed
 * event methods; every entry is a single JSON object carrying the event
 * name, level, timestamp and session id.
 *
 * @module logger
 */

// ===========================================
// Logger Configuration
// ===========================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Output format */
  format: 'json' | 'pretty';

  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;

  /** Custom output function (defaults to the console method for the level) */
  output?: (message: string, level: LogLevel) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

const envLevel = process.env.LOG_LEVEL;

const DEFAULT_CONFIG: LoggerConfig = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  format: 'json',
};

export interface LogEntry {
  event: string;
  level: LogLevel;
  timestamp: string;
  session_id?: string;
  [key: string]: unknown;
}

// ===========================================
// Logger Class
// ===========================================

export class StructuredLogger<TEvent extends string = string> {
  protected config: LoggerConfig;
  private sessionId?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Set session ID for all subsequent log entries
   */
  setSessionId(sessionId: string): void {
    this.sessionId = sessionId;
  }

  /**
   * Update logger configuration
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Start a timer; the returned function yields elapsed milliseconds
   */
  startTimer(): () => number {
    const start = Date.now();
    return () => Date.now() - start;
  }

  protected shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  protected log(level: LogLevel, event: TEvent, data: Record<string, unknown> = {}): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      event,
      level,
      timestamp: new Date().toISOString(),
      session_id: this.sessionId,
      ...this.config.metadata,
      ...data,
    };

    // Remove undefined values
    for (const key in entry) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    this.emit(level, this.format(entry));
  }

  private format(entry: LogEntry): string {
    if (this.config.format === 'json') {
      return JSON.stringify(entry);
    }

    const { event, level, timestamp, ...rest } = entry;
    const time = timestamp.split('T')[1];
    return `[${time}] ${level.toUpperCase()} ${event} ${JSON.stringify(rest)}`;
  }

  private emit(level: LogLevel, message: string): void {
    if (this.config.output) {
      this.config.output(message, level);
      return;
    }

    switch (level) {
      case 'debug':
        console.debug(message);
        break;
      case 'info':
        console.log(message);
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'error':
        console.error(message);
        break;
    }
  }
}

/**
 * Output sink that discards everything (for tests and embedded use)
 */
export const silentOutput = (): void => {};
