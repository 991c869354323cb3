/**
 * Structured Logger
 *
 * Minimal logger with operation/correlation context.
 * One JSON line per entry.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  operation?: string;
  correlationId?: string;
  paymentId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  private context: LogContext;
  private level: LogLevel;

  constructor(context: LogContext = {}, level: LogLevel = 'info') {
    this.context = context;
    this.level = level;
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private log(
    level: Exclude<LogLevel, 'silent'>,
    context: LogContext,
    message: string
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...context,
    };

    // Remove undefined values
    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([_, v]) => v !== undefined)
    );

    // Serialize errors
    const err = cleaned.error;
    if (err instanceof Error) {
      cleaned.error = {
        name: err.name,
        message: err.message,
        stack: err.stack,
      };
    }

    console.log(JSON.stringify(cleaned));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const candidate = raw?.trim().toLowerCase();
  return LEVELS.find((level) => level === candidate) ?? fallback;
}

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'payment-core' },
    options?.level ?? parseLogLevel(process.env.LOG_LEVEL)
  );
}
