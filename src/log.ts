/**
 * Minimal logging surface. Library calls accept any object with these
 * methods; pass `silentLogger` to mute them.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  debug: message => {
    if (process.env['PHOTOMARK_DEBUG']) console.debug(`[DEBUG] ${message}`);
  },
  info: message => console.log(`[INFO] ${message}`),
  warn: message => console.warn(`[WARN] ${message}`),
  error: message => console.error(`[ERROR] ${message}`),
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
