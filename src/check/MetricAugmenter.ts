import { fieldNumber, isTruthy, type ClusterObject, type FieldValue } from './ClusterObject.js';
import { sortedPerfFields, type ResourceMode } from './Modes.js';

/**
 * Threshold sub-fields every performance field carries after augmentation,
 * with the value used when the field is absent or falsy.
 */
const THRESHOLD_DEFAULTS: ReadonlyArray<[prefix: string, suffix: string, value: FieldValue]> = [
  ['warn', '', ''],
  ['crit', '', ''],
  ['min', '', '0'],
  ['max', '', ''],
  ['warn', 'percent', ''],
  ['crit', 'percent', ''],
];

/**
 * Fill in threshold defaults for one performance field and derive
 * `<field>percent` when a positive maximum is known.
 *
 * `max<field>` must be strictly positive for the percent to be computed; a
 * zero or missing maximum leaves `<field>percent` unset.
 */
export function augmentField(object: ClusterObject, field: string): void {
  if (object[field] === undefined) {
    object[field] = 0;
  }

  for (const [prefix, suffix, value] of THRESHOLD_DEFAULTS) {
    const key = `${prefix}${field}${suffix}`;
    if (!isTruthy(object[key])) {
      object[key] = value;
    }
  }

  const max = fieldNumber(object, `max${field}`);
  if (max > 0 && isTruthy(object[field])) {
    object[`${field}percent`] = (fieldNumber(object, field) * 100) / max;
  }
}

/**
 * Augment every object with the performance fields of its mode. Must run
 * after overrides so overridden values take part in the percent computation.
 */
export function augmentObjects(objects: readonly ClusterObject[], mode: ResourceMode): void {
  const fields = sortedPerfFields(mode);
  for (const object of objects) {
    for (const field of fields) {
      augmentField(object, field);
    }
  }
}
