export type Logger = Pick<typeof console, "log" | "warn" | "error">;

function timestamp(): string {
  return `[${new Date().toISOString()}]`;
}

/**
 * Console logger. Info lines (`log`) are only printed in verbose mode,
 * warnings and errors always.
 */
export function consoleLogger(verbose: boolean): Logger {
  return {
    log(...params: unknown[]) {
      if (verbose) {
        console.log(timestamp(), "[INFO]", ...params);
      }
    },
    warn(...params: unknown[]) {
      console.warn(timestamp(), "[WARNING]", ...params);
    },
    error(...params: unknown[]) {
      console.error(timestamp(), "[ERROR]", ...params);
    },
  };
}

export const nullLogger: Logger = {
  log() {},
  warn() {},
  error() {},
};
