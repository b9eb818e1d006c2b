import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Enable pretty printing (development) */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const LOG_FILE_PREFIX = 'reward-';

/**
 * Generate timestamp-based log filename.
 */
function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_FILE_PREFIX}${timestamp}.log`;
}

/**
 * Cleanup old log files, keeping only the most recent maxFiles.
 * Empty log files are removed as well.
 *
 * @returns Names of the files that were deleted
 */
export function cleanupOldLogs(logDir: string, maxFiles: number): string[] {
  if (!fs.existsSync(logDir)) {
    return [];
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_FILE_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { name: f, path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const emptyFiles = files.filter((f) => f.size === 0);
  // newest first
  const staleFiles = files
    .filter((f) => f.size > 0)
    .sort((a, b) => b.mtime - a.mtime)
    .slice(maxFiles);

  const deleted: string[] = [];
  for (const file of [...emptyFiles, ...staleFiles]) {
    try {
      fs.unlinkSync(file.path);
      deleted.push(file.name);
    } catch (error) {
      // Another process may have rotated it already
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
  }
  return deleted;
}

/**
 * Pino mixin that injects the active trace context into every entry.
 * Explicit fields passed to a log call take precedence.
 */
function createTraceMixin(): () => Record<string, unknown> {
  const TRACE_KEYS = ['traceId', 'correlationId', 'spanId'] as const;

  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = {};
    for (const key of TRACE_KEYS) {
      if (ctx[key]) {
        result[key] = ctx[key];
      }
    }
    return result;
  };
}

/**
 * Create a configured logger instance.
 *
 * - Console output with pino-pretty in development, JSON on stdout otherwise
 * - File output with a timestamp-based filename
 * - Old and empty log files are pruned on startup
 * - Trace context (tick, session) is injected via mixin
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  fs.mkdirSync(logDir, { recursive: true });
  cleanupOldLogs(logDir, maxFiles);

  const logFilePath = path.join(logDir, generateLogFilename());

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: { colorize: true },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 1 }, // stdout
    });
  }

  targets.push({
    target: 'pino/file',
    level,
    options: { destination: logFilePath, mkdir: true },
  });

  return pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });
}
