import type { RunLogger } from './types';

export const VOID_LOGGER: RunLogger = {
  log: () => {},
  error: () => {},
  setStatus: () => {},
  setProgress: () => {},
};

export type ConsoleLoggerOptions = {
  /** Prepended to every line, e.g. "[movie.tif]" */
  prefix?: string;
};

/**
 * Console-backed logger. Progress is printed only when the rounded
 * percentage changes.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): RunLogger {
  const prefix = options.prefix ? `${options.prefix} ` : '';
  let lastPercent = -1;

  return {
    log(message) {
      const text = message.replace(/\n+$/, '');
      if (text) console.log(`${prefix}${text}`);
    },
    error(message) {
      const text = message.replace(/\n+$/, '');
      if (text) console.error(`${prefix}⚠️ ${text}`);
    },
    setStatus(status) {
      console.log(`${prefix}▶ ${status}`);
    },
    setProgress(fraction) {
      const percent = Math.round(Math.min(1, Math.max(0, fraction)) * 100);
      if (percent === lastPercent) return;
      lastPercent = percent;
      console.log(`${prefix}   ${percent}%`);
    },
  };
}
