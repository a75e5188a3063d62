import pino from 'pino';

export type LogLevel = pino.LevelWithSilent;

/**
 * Level named by the value, or info when it names none. The environment is
 * validated later by the config package; the logger must load before that.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

export const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: { service: 'git-rollout-agent' },
  redact: {
    paths: ['token', '*.token', 'credentials.token', 'password', '*.password'],
    censor: '[REDACTED]'
  }
});

export type Logger = pino.Logger;

// Children copy the level once, at creation
const componentLoggers = new Set<Logger>();

/**
 * Logger scoped to one component of the agent
 */
export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  const child = logger.child({ component, ...bindings });
  componentLoggers.add(child);
  return child;
}

/** Change the level of the root logger and every component logger */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}

export * from './health.js';
