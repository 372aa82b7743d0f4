export type LogLevel = 'debug' | 'info' | 'error';

type LogPayload = Record<string, unknown>;

const baseFields = {
  service: 'cafeScout'
} as const;

function log(level: LogLevel, message: string, payload?: LogPayload): void {
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...baseFields,
    ...payload
  };
  process.stdout.write(`${JSON.stringify(entry)}\n`);
}

export const logger = {
  debug(message: string, payload?: LogPayload): void {
    if (process.env.LOG_LEVEL === 'debug') {
      log('debug', message, payload);
    }
  },
  info(message: string, payload?: LogPayload): void {
    log('info', message, payload);
  },
  error(message: string, payload?: LogPayload): void {
    log('error', message, payload);
  }
};

export type Logger = typeof logger;
