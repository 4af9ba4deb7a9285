/**
 * Monitoring severity scale. The numeric value is the process exit status and
 * the aggregation order: a higher value always wins.
 */
export enum Severity {
  OK = 0,
  WARNING = 1,
  CRITICAL = 2,
  UNKNOWN = 3,
}

export function severityName(severity: Severity): string {
  return Severity[severity];
}
