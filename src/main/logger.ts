export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMethod = (message: string, ...args: unknown[]) => void;

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in levelRank;

const envLevel = process.env.LOG_LEVEL ?? '';
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

const normalizeLogArg = (arg: unknown) => {
  if (arg instanceof Error) {
    return {
      name: arg.name,
      message: arg.message,
      stack: arg.stack,
    };
  }
  return arg;
};

const safeStringify = (value: unknown): string => {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

const emit = (level: LogLevel, scope: string | undefined, message: string, args: unknown[]) => {
  if (levelRank[level] < levelRank[threshold]) return;

  const timestamp = new Date().toISOString();
  const scopePrefix = scope ? `[${scope}] ` : '';
  const line = `[${timestamp}] [${level.toUpperCase()}] ${scopePrefix}${message}`;
  const printable = args.map(normalizeLogArg).map((arg) => (typeof arg === 'object' ? safeStringify(arg) : arg));

  if (level === 'error') {
    console.error(line, ...printable);
  } else if (level === 'warn') {
    console.warn(line, ...printable);
  } else {
    console.log(line, ...printable);
  }
};

export const createLogger = (scope?: string) => {
  const log = (level: LogLevel): LogMethod => (message, ...args) => emit(level, scope, message, args);

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
};

export type Logger = ReturnType<typeof createLogger>;

export const logger = {
  ...createLogger(),
  scope: (scope: string): Logger => createLogger(scope),
};
