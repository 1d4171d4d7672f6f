/**
 * Logger
 *
 * stderr-only, leveled, component-tagged logging. stdout is reserved for CLI
 * output and MCP JSON-RPC traffic, so diagnostics never go there.
 *
 * Entries can be mirrored as JSON lines to a file (PODCAST_LOG_FILE). The file
 * sink is buffered and flushed on error-level entries and on demand.
 */

import * as fs from 'fs/promises';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
  error?: string;
  stack?: string;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // gray
  info: '\x1b[36m', // cyan
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};
const RESET = '\x1b[0m';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

// =============================================================================
// Sink
// =============================================================================

export class LogSink {
  private level: LogLevel;
  private filePath: string | null;
  private buffer: string[] = [];
  private flushing: Promise<void> = Promise.resolve();

  constructor(level: LogLevel = 'info', filePath: string | null = null) {
    this.level = level;
    this.filePath = filePath;
  }

  configure(options: { level?: LogLevel; filePath?: string | null }): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.filePath !== undefined) {
      this.filePath = options.filePath;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  write(entry: LogEntry): void {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const tag = process.stderr.isTTY
      ? `${COLORS[entry.level]}[${entry.level.toUpperCase()}]${RESET}`
      : `[${entry.level.toUpperCase()}]`;
    const data = entry.data && Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
    const error = entry.error ? ` (${entry.error})` : '';
    process.stderr.write(`${tag} [${entry.component}] ${entry.message}${error}${data}\n`);

    if (this.filePath) {
      this.buffer.push(JSON.stringify(entry));
      if (entry.level === 'error') {
        void this.flush();
      }
    }
  }

  /**
   * Append buffered entries to the log file.
   */
  flush(): Promise<void> {
    this.flushing = this.flushing.then(async () => {
      const filePath = this.filePath;
      if (!filePath || this.buffer.length === 0) {
        return;
      }
      const lines = this.buffer.splice(0);
      try {
        await fs.appendFile(filePath, lines.join('\n') + '\n', 'utf-8');
      } catch (error) {
        process.stderr.write(
          `[ERROR] [Logger] Failed to write logs: ${error instanceof Error ? error.message : String(error)}\n`,
        );
      }
    });
    return this.flushing;
  }
}

const envLevel = process.env.PODCAST_LOG_LEVEL?.toLowerCase();

export const logSink = new LogSink(
  isLogLevel(envLevel) ? envLevel : 'info',
  process.env.PODCAST_LOG_FILE?.trim() || null,
);

// =============================================================================
// Factory
// =============================================================================

export function createLogger(component: string, sink: LogSink = logSink): Logger {
  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown) => {
    sink.write({
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      data,
      error: error === undefined ? undefined : error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, error, data) => emit('error', message, data, error),
  };
}
