/**
 * Timestamped diagnostics on stderr. stdout is reserved for data (CSV, JSON, ids)
 * so scripts compose in pipelines.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  /** Clock override for tests */
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const write = (level: string, message: string) => {
    const prefix = level ? `[${tag}] ${level}: ` : `[${tag}] `;
    console.error(`${formatTimestamp(now())}  ${prefix}${message}`);
  };

  return {
    info: (message) => write("", message),
    warn: (message) => write("WARNING", message),
    error: (message) => write("ERROR", message),
    debug: (message) => {
      if (options.debug) {
        write("DEBUG", message);
      }
    },
  };
}

/**
 * Logger that discards everything; default for library classes constructed without one
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
