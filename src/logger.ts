/**
 * stderr logger. stdout carries the MCP protocol, so nothing here may ever
 * write to it.
 */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

const PREFIX = '[SheetsAgent]';

export function createLogger(options: { debug?: boolean } = {}): Logger {
  const debugEnabled = options.debug === true;
  return {
    debug: (...args: unknown[]) => {
      if (debugEnabled) console.error(PREFIX, '[debug]', ...args);
    },
    info: (...args: unknown[]) => console.error(PREFIX, ...args),
    warn: (...args: unknown[]) => console.error(PREFIX, '[warn]', ...args),
    error: (...args: unknown[]) => console.error(PREFIX, '[error]', ...args),
  };
}

/** Logger that drops everything; handy for tests and library use. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
