/**
 * Simple logger with clear, short output for monitoring and debugging
 * Level defaults to info; the entry point sets it from LOG_LEVEL via setLogLevel()
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const colors = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
  reset: '\x1b[0m',
};

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function formatTime(): string {
  return new Date().toISOString().substring(11, 23);
}

function formatData(data: unknown): string {
  // Error objects don't serialize with JSON.stringify
  if (data instanceof Error) {
    const cause = data.cause instanceof Error ? `\nCaused by: ${data.cause.message}` : '';
    return `${data.name}: ${data.message}${cause}${data.stack ? `\n${data.stack}` : ''}`;
  }
  if (typeof data === 'object') {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

function log(level: LogLevel, context: string, message: string, data?: unknown): void {
  if (levelPriority[level] < levelPriority[minLevel]) {
    return;
  }

  const color = colors[level];
  const prefix = `${colors.reset}[${formatTime()}] ${color}${level.toUpperCase().padEnd(5)}${colors.reset}`;
  const ctx = `[${context}]`;

  if (data !== undefined) {
    console.log(`${prefix} ${ctx} ${message}`, formatData(data));
  } else {
    console.log(`${prefix} ${ctx} ${message}`);
  }
}

export const logger = {
  debug: (context: string, message: string, data?: unknown) => log('debug', context, message, data),
  info: (context: string, message: string, data?: unknown) => log('info', context, message, data),
  warn: (context: string, message: string, data?: unknown) => log('warn', context, message, data),
  error: (context: string, message: string, data?: unknown) => log('error', context, message, data),
};

/**
 * Query-scoped logger: prefixes the context with a short form of the career
 * title so concurrent aggregations can be told apart.
 */
export class QueryLogger {
  private readonly tag: string;

  constructor(queryTitle: string) {
    const compact = queryTitle.trim().replace(/\s+/g, ' ');
    this.tag = compact.length > 24 ? `${compact.slice(0, 24)}…` : compact;
  }

  private formatContext(context: string): string {
    return `${context}:${this.tag}`;
  }

  debug(context: string, message: string, data?: unknown): void {
    log('debug', this.formatContext(context), message, data);
  }

  info(context: string, message: string, data?: unknown): void {
    log('info', this.formatContext(context), message, data);
  }

  warn(context: string, message: string, data?: unknown): void {
    log('warn', this.formatContext(context), message, data);
  }

  error(context: string, message: string, data?: unknown): void {
    log('error', this.formatContext(context), message, data);
  }
}

export function createQueryLogger(queryTitle: string): QueryLogger {
  return new QueryLogger(queryTitle);
}

export default logger;
