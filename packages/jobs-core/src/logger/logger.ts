import pino from 'pino';

/**
 * Logger factory - creates structured logger instances
 */
export function createLogger(component: string, bindings: Record<string, unknown> = {}) {
  return pino({
    name: 'typed-jobs',
    level: process.env.LOG_LEVEL || 'info',
    base: { component, ...bindings },
    formatters: {
      level: (label) => {
        return { level: label };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export type Logger = ReturnType<typeof createLogger>;
