/**
 * Logging
 *
 * Messages go to the console tagged with the component that wrote them,
 * e.g. "[HmpDecoder] subtype: 3D GameStudio A5".
 */

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Create a console-backed logger that prefixes every line with `[tag]`. */
export function createConsoleLogger(tag: string): Logger {
  return {
    debug: (message) => console.debug(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message) => console.error(`[${tag}] ${message}`),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};
