/**
 * Progress and diagnostic output.
 *
 * Everything goes to stderr so stdout stays clean for results and --json.
 */

export type LogLevel = "quiet" | "normal" | "verbose";

export class Logger {
  constructor(private readonly level: LogLevel = "normal") {}

  /** Always printed, even when quiet */
  error(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    if (this.level !== "quiet") console.error(`Warning: ${message}`);
  }

  info(message: string): void {
    if (this.level !== "quiet") console.error(message);
  }

  debug(message: string): void {
    if (this.level === "verbose") console.error(message);
  }
}

/**
 * Logger from the global -q / -v flags.
 */
export function createLogger(options: {
  quiet?: boolean;
  verbose?: boolean;
}): Logger {
  if (options.quiet) return new Logger("quiet");
  if (options.verbose) return new Logger("verbose");
  return new Logger("normal");
}

/** Logger that discards everything but errors */
export const silentLogger = new Logger("quiet");
