export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  verbose: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  return {
    debug(message: string) {
      if (options.verbose) {
        console.log(message);
      }
    },
    info(message: string) {
      console.log(message);
    },
    warn(message: string) {
      console.warn(message);
    }
  };
}
