import type { AgentLog, AgentLogger, LogLevel } from './types.js';

export interface BufferedLogger extends AgentLogger {
  entries(): AgentLog[];
}

/**
 * Logger that keeps the entries of one execution and echoes them to the
 * console when LOG_LEVEL=debug (errors are always echoed).
 */
export function createAgentLogger(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): BufferedLogger {
  const logs: AgentLog[] = [];
  const verbose = env.LOG_LEVEL === 'debug';

  const log = (level: LogLevel, message: string, data?: unknown): void => {
    logs.push({ timestamp: new Date(), level, message, data });

    if (verbose || level === 'error') {
      console.log(`[${name}] [${level.toUpperCase()}] ${message}`, data ?? '');
    }
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    entries: () => [...logs],
  };
}

/** Discards everything; the default when a caller passes no logger. */
export const silentLogger: AgentLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
