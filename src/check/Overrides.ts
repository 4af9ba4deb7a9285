import { Logger } from 'winston';
import type { ClusterObject } from './ClusterObject.js';
import { filterObjects } from './ObjectFilter.js';
import type { RuleTriple } from './RuleTriple.js';

/**
 * Force-set fields on matching objects. Overrides run in the order given, so
 * a later override of the same field wins; values fetched from the API are
 * overwritten unconditionally. A pattern matching nothing is not an error.
 */
export function applyOverrides(
  objects: readonly ClusterObject[],
  overrides: readonly RuleTriple[],
  logger?: Logger,
): void {
  for (const override of overrides) {
    const targets = filterObjects(override.pattern, objects);
    logger?.debug(
      `Override '${override.pattern.source}' sets ${override.field}=${override.value} on ${targets.length} object(s)`,
    );
    for (const object of targets) {
      object[override.field] = override.value;
    }
  }
}
