import util from 'node:util';
import winston from 'winston';

const WINSTON_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

type WinstonLevel = (typeof WINSTON_LEVELS)[number];

export type LogLevel = WinstonLevel | 'silent';

export type Logger = winston.Logger;

export interface LoggerServiceOptions {
  level?: string;
  file?: string | null;
  console?: boolean;
  defaultMeta?: winston.LoggerOptions['defaultMeta'];
}

const DEFAULT_LOG_LEVEL: WinstonLevel = 'info';

function isWinstonLevel(value: string): value is WinstonLevel {
  return (WINSTON_LEVELS as readonly string[]).includes(value);
}

export function normalizeLevel(level: string | undefined): LogLevel {
  if (!level) {
    return DEFAULT_LOG_LEVEL;
  }

  const normalized = level.trim().toLowerCase();
  if (!normalized) {
    return DEFAULT_LOG_LEVEL;
  }

  if (normalized === 'silent') {
    return 'silent';
  }

  // the collector historically used WARNING rather than npm's warn
  if (normalized === 'warning') {
    return 'warn';
  }

  return isWinstonLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

function formatMeta(meta: object): string {
  if (Object.keys(meta).length === 0) {
    return '';
  }

  return ` ${util.inspect(meta, { depth: 4, breakLength: 80, colors: false })}`;
}

const lineFormat = winston.format.printf((info) => {
  const { timestamp, level, message, stack, context, metadata } = info;
  const meta: object = metadata && typeof metadata === 'object' ? metadata : {};
  const contextLabel = typeof context === 'string' && context ? `[${context}] ` : '';
  const body = typeof stack === 'string' ? stack : String(message);
  return `${String(timestamp)} ${level}: ${contextLabel}${body}${formatMeta(meta)}`;
});

export class LoggerService {
  private readonly logger: winston.Logger;

  constructor(options: LoggerServiceOptions = {}) {
    const level = normalizeLevel(options.level);
    const effectiveLevel: WinstonLevel = level === 'silent' ? DEFAULT_LOG_LEVEL : level;
    const transports: winston.transport[] = [];

    if (options.console !== false) {
      transports.push(
        new winston.transports.Console({
          stderrLevels: ['error', 'warn'],
        }),
      );
    }

    if (options.file) {
      transports.push(new winston.transports.File({ filename: options.file }));
    }

    this.logger = winston.createLogger({
      level: effectiveLevel,
      levels: winston.config.npm.levels,
      defaultMeta: options.defaultMeta,
      transports,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'label', 'context', 'stack'] }),
        lineFormat,
      ),
    });
    this.logger.silent = level === 'silent' || transports.length === 0;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }

  public setLevel(level: string): void {
    const normalized = normalizeLevel(level);
    this.logger.level = normalized === 'silent' ? DEFAULT_LOG_LEVEL : normalized;
    this.logger.silent = normalized === 'silent';
  }

  public getLevel(): LogLevel {
    if (this.logger.silent) {
      return 'silent';
    }
    return normalizeLevel(this.logger.level);
  }

  public forContext(context: string, defaultMeta: Record<string, unknown> = {}): winston.Logger {
    return this.logger.child({ context, ...defaultMeta });
  }

  public close(): void {
    this.logger.close();
  }
}

/** Logger that drops everything; handy for components built without a LoggerService. */
export function createSilentLogger(): winston.Logger {
  return new LoggerService({ level: 'silent', console: false }).getLogger();
}

export default LoggerService;
