import type { Aggregator } from './Aggregator.js';
import { fieldNumber, fieldText, type ClusterObject } from './ClusterObject.js';
import { filterObjects } from './ObjectFilter.js';
import { sortedPerfFields, type ModeDescriptor, type ResourceMode } from './Modes.js';
import type { RuleTriple } from './RuleTriple.js';
import { Severity, severityName } from './Severity.js';

type BreachSeverity = Severity.WARNING | Severity.CRITICAL;

/**
 * Fire a finding for every object matched by each warnstr/critstr rule,
 * independent of any numeric threshold.
 */
export function evaluateStringRules(
  objects: readonly ClusterObject[],
  rules: readonly RuleTriple[],
  severity: BreachSeverity,
  mode: ModeDescriptor,
  aggregator: Aggregator,
): void {
  for (const rule of rules) {
    for (const object of filterObjects(rule.pattern, objects)) {
      const name = mode.objectName(object);
      aggregator.emit({
        severity,
        short: rule.field ? `${name} ${rule.field}` : name,
        long: `${severityName(severity)}: ${name}: ${rule.value}`,
      });
    }
  }
}

/**
 * Compare each performance field (and its percent variant, when computed)
 * against its warn/crit thresholds and emit one perfdata token per value.
 * Objects must already be augmented.
 */
export function evaluateThresholds(
  objects: readonly ClusterObject[],
  mode: ResourceMode,
  aggregator: Aggregator,
): void {
  const fields = sortedPerfFields(mode);
  for (const object of objects) {
    const name = mode.objectName(object);
    for (const field of fields) {
      const unit = mode.perfFields[field];
      checkValue(aggregator, object, name, field, `warn${field}`, `crit${field}`, unit);
      aggregator.emit({
        perfdata: perfToken(
          `${name}.${field}`,
          `${fieldText(object, field)}${unit}`,
          fieldText(object, `warn${field}`),
          fieldText(object, `crit${field}`),
          fieldText(object, `min${field}`),
          fieldText(object, `max${field}`),
        ),
      });

      const percentField = `${field}percent`;
      if (object[percentField] === undefined) continue;

      checkValue(
        aggregator,
        object,
        name,
        percentField,
        `warn${percentField}`,
        `crit${percentField}`,
        '%',
      );
      aggregator.emit({
        perfdata: perfToken(
          `${name}.${percentField}`,
          `${fieldText(object, percentField)}%`,
          fieldText(object, `warn${percentField}`),
          fieldText(object, `crit${percentField}`),
          '0',
          '100',
        ),
      });
    }
  }
}

/**
 * `name=value;warn;crit;min;max`
 */
export function perfToken(
  label: string,
  value: string,
  warn: string,
  crit: string,
  min: string,
  max: string,
): string {
  return `${label}=${value};${warn};${crit};${min};${max}`;
}

function checkValue(
  aggregator: Aggregator,
  object: ClusterObject,
  name: string,
  field: string,
  warnKey: string,
  critKey: string,
  unit: string,
): void {
  const observed = fieldNumber(object, field);
  const thresholds: Array<[BreachSeverity, string]> = [
    [Severity.WARNING, warnKey],
    [Severity.CRITICAL, critKey],
  ];

  for (const [severity, key] of thresholds) {
    const threshold = fieldText(object, key);
    if (threshold === '' || fieldNumber(object, key) > observed) continue;

    aggregator.emit({
      severity,
      short: `${name} ${field}>${threshold}${unit}`,
      long:
        `${severityName(severity)}: ${name}: ${field} ` +
        `${fieldText(object, field)}${unit} >= ${threshold}${unit}`,
    });
  }
}
