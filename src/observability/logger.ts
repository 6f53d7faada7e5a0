import crypto from 'crypto';

export interface LogContext {
  requestId: string;
  nodeId?: string;
  route?: string;
}

type LogLevel = 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  requestId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  nodeId?: string;
  route?: string;
}

class Logger {
  private context: LogContext | null = null;
  private silent = false;

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  // Used by the test suite to keep runner output readable.
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      requestId: this.context?.requestId || 'system',
      phase,
      message,
      data,
    };

    if (this.context?.nodeId) entry.nodeId = this.context.nodeId;
    if (this.context?.route) entry.route = this.context.route;

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

export function generateRequestId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
