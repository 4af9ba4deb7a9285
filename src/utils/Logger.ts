import winston from 'winston';

export interface LoggerOptions {
  level: string;
  /** Drop all output (tests) */
  silent?: boolean;
}

/**
 * Diagnostics logger. Every level goes to stderr: stdout is reserved for the
 * check output a monitoring supervisor parses.
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  return winston.createLogger({
    level: options.level,
    silent: options.silent,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
        format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
      }),
    ],
  });
}

/**
 * `--debug` wins over `--verbose`, which wins over CHECK_PROXMOX_LOG_LEVEL.
 */
export function resolveLogLevel(
  flags: { debug: boolean; verbose: boolean },
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (flags.debug) return 'debug';
  if (flags.verbose) return 'verbose';
  return env.CHECK_PROXMOX_LOG_LEVEL || 'warn';
}
