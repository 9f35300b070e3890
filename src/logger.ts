export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const PREFIX = '[db-session]';

export const consoleLogger: Logger = {
  debug: (msg) => console.debug(`${PREFIX} ${msg}`),
  info: (msg) => console.log(`${PREFIX} ${msg}`),
  warn: (msg) => console.warn(`${PREFIX} ${msg}`),
  error: (msg, error) =>
    error === undefined ? console.error(`${PREFIX} ${msg}`) : console.error(`${PREFIX} ${msg}`, error),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
