/**
 * logger.ts - Timestamped, context-labelled logger shared by every module.
 *
 * Each line looks like
 *   `[2026-02-10T18:30:00.000Z] [INFO ] [LocationSharing] Fetched 3 people`
 * and goes to console.log / console.warn / console.error by level.
 *
 * The threshold comes from LOG_LEVEL (debug | info | warn | error | silent)
 * unless the caller passes one explicitly.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/** Read LOG_LEVEL, falling back to `info` for unset or unknown values. */
export function resolveLogThreshold(
  raw: string | undefined = process.env.LOG_LEVEL,
): LogThreshold {
  const normalized = (raw ?? '').trim().toLowerCase();
  return isLogThreshold(normalized) ? normalized : 'info';
}

/**
 * Usage:
 *   const logger = new Logger('CookieLoader');
 *   logger.info('Loaded 12 cookies from cookies.txt');
 */
export class Logger {
  /** Label prepended to every message so you can tell which module is talking. */
  private readonly context: string;
  private readonly threshold: LogThreshold;

  constructor(context: string, threshold: LogThreshold = resolveLogThreshold()) {
    this.context = context;
    this.threshold = threshold;
  }

  /** A logger for a sub-component that keeps this logger's threshold. */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.threshold);
  }

  // ── Public API ─────────────────────────────────────────

  /** Per-attempt detail: cache hits, attempt numbers, parse results. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: service connected, people decoded. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but recoverable: transient HTTP status, skipped entry. */
  warn(message: string, err?: unknown): void {
    if (this.emit('warn', message) && err) {
      console.warn(err);
    }
  }

  /** A hard failure surfaced to the caller. */
  error(message: string, err?: unknown): void {
    if (this.emit('error', message) && err) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  /** Writes one line; returns false when the level is below the threshold. */
  private emit(level: LogLevel, message: string): boolean {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) {
      return false;
    }

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
    return true;
  }
}
