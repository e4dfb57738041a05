import { config } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m',  // green
  warn: '\x1b[33m',  // yellow
  error: '\x1b[31m', // red
  reset: '\x1b[0m',
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): number {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return LOG_LEVELS[level];
  }
  switch (config.server.nodeEnv) {
    case 'production':
      return LOG_LEVELS.info;
    case 'test':
      return LOG_LEVELS.warn;
    default:
      return LOG_LEVELS.debug;
  }
}

function useJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === 'json';
}

function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }
  if (data && typeof data === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? serializeData(value) : value;
    }
    return out;
  }
  return data;
}

function formatPretty(level: LogLevel, context: string, message: string, data?: unknown): string {
  const color = COLORS[level];
  const reset = COLORS.reset;

  let output = `${color}[${new Date().toISOString()}] [${level.toUpperCase()}] [${context}]${reset} ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      output += `\n${data.stack || data.message}`;
    } else if (typeof data === 'object') {
      output += `\n${JSON.stringify(serializeData(data), null, 2)}`;
    } else {
      output += ` ${String(data)}`;
    }
  }

  return output;
}

function formatJson(level: LogLevel, context: string, message: string, data?: unknown): string {
  return JSON.stringify({
    time: new Date().toISOString(),
    level,
    context,
    message,
    ...(data !== undefined ? { data: serializeData(data) } : {}),
  });
}

export class Logger {
  private readonly context: string;
  private readonly minLevel: number;
  private readonly json: boolean;

  constructor(context: string) {
    this.context = context;
    this.minLevel = getLogLevel();
    this.json = useJsonFormat();
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < this.minLevel) {
      return;
    }
    const output = this.json
      ? formatJson(level, this.context, message, data)
      : formatPretty(level, this.context, message, data);

    if (level === 'error') {
      console.error(output);
    } else if (level === 'warn') {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  child(subContext: string): Logger {
    return new Logger(`${this.context}:${subContext}`);
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}

