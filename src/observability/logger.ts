import crypto from 'crypto';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export interface LogContext {
  treeId: string;
  height?: number;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  treeId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  height?: number;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

class Logger {
  private context: LogContext | null = null;
  private threshold: LogThreshold = 'info';

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  setLevel(threshold: LogThreshold): void {
    this.threshold = threshold;
  }

  getLevel(): LogThreshold {
    return this.threshold;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      treeId: this.context?.treeId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.height !== undefined) entry.height = this.context.height;

    console.log(JSON.stringify(entry));
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateTreeId(): string {
  return crypto.randomBytes(8).toString('hex');
}

/**
 * Shorten a digest for log output.
 */
export function abbreviate(digest: string): string {
  return digest.length > 16 ? digest.substring(0, 16) + '...' : digest;
}
