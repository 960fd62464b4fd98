import { pino, type Logger } from 'pino';

export type { Logger };

/** Root structured logger. Level from LOG_LEVEL unless given, default info. */
export function createLogger(name: string, level?: string): Logger {
  return pino({
    name,
    level: level ?? (process.env.LOG_LEVEL || 'info'),
  });
}

/** Child logger bound to a component name, under `parent` or a fresh root. */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? createLogger('parley')).child({ component });
}
