import pino, { Logger, LevelWithSilent } from 'pino';

export type { Logger };

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const resolveLevel = (value: string | undefined): LevelWithSilent => {
  const requested = LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
  if (requested) return requested;
  // Jest sets NODE_ENV=test; keep test output clean unless LOG_LEVEL says otherwise.
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
};

// stdout belongs to the CLI; structured logs go to stderr.
const rootLogger = pino(
  {
    level: resolveLevel(process.env.LOG_LEVEL),
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ fd: 2, sync: true })
);

/**
 * Create a module-scoped logger
 */
export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}

export function setLogLevel(level: string | undefined): void {
  rootLogger.level = resolveLevel(level);
}
