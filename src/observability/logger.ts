import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  // Secret phrases and plaintext addresses must never reach the log sink
  redact: {
    paths: ['secret', 'secretPhrase', 'address', 'plaintext', '*.secret', '*.address'],
    censor: '[redacted]',
  },
  ...(process.env.NODE_ENV === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});

/** Child logger bound to one chat session */
export function sessionLogger(sessionKey: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ sessionKey, ...extra });
}
