import pino from 'pino';

// Create logger instance with Lambda-friendly settings
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  // Lambda already adds timestamp
  timestamp: false,
  // Structured logging for CloudWatch
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Redact sensitive fields
  redact: {
    paths: ['authorization', 'Authorization', 'token', 'accessToken', 'idToken'],
    censor: '[REDACTED]',
  },
});

export type Logger = typeof logger;

// Create child logger with request context
export function createRequestLogger(requestId: string, userId?: string): Logger {
  return logger.child({
    requestId,
    ...(userId && { userId }),
  });
}

// Child logger scoped to one import batch
export function createBatchLogger(batchId: string, parent: Logger = logger): Logger {
  return parent.child({ batchId });
}
