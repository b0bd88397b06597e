export const logLevels = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];

type LogMethod = (message: string, ...details: unknown[]) => void;

export type Logger = {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
};

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function createLogger(tag: string, level: LogLevel = 'warn'): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>): LogMethod => (message, ...details) => {
    if (rank[at] < rank[level]) return;
    console[at](`[${tag}] ${message}`, ...details);
  };
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error')
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
