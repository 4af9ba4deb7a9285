/**
 * Exit status for invalid invocations, outside the 0-3 severity scale
 */
export const FATAL_EXIT_CODE = 255;

/**
 * Error thrown for malformed user input: filter expressions, rule triples,
 * override values and option values. Always fatal.
 */
export class ProbeUsageError extends Error {
  public readonly details: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ProbeUsageError';
    this.details = details || {};

    Object.setPrototypeOf(this, ProbeUsageError.prototype);
  }
}
