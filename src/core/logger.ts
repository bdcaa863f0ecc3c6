import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Log level */
  level: pino.LevelWithSilent;
  /** Enable pretty printing (development) */
  pretty: boolean;
  /** Directory for a per-run log file (no file output when unset) */
  logDir?: string | undefined;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
};

/**
 * Generate timestamp-based log filename.
 */
function generateLogFilename(): string {
  const now = new Date();
  const timestamp = now.toISOString().replace(/[:.]/g, '-');
  return `simulation-${timestamp}.log`;
}

/**
 * Ensure log directory exists.
 */
function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Create a configured logger instance.
 *
 * - Console output with pino-pretty when `pretty` is set, plain JSON otherwise
 * - Optional file output with timestamp-based filename
 *
 * Without pretty printing or a log directory the logger writes
 * synchronously to stdout and starts no transport worker.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { level, pretty, logDir } = { ...DEFAULT_CONFIG, ...config };

  if (!pretty && logDir === undefined) {
    return pino({ level });
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
      },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 1 }, // stdout
    });
  }

  if (logDir !== undefined) {
    ensureLogDir(logDir);
    targets.push({
      target: 'pino/file',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename()),
        mkdir: true,
      },
    });
  }

  return pino({
    level,
    transport: {
      targets,
    },
  });
}
