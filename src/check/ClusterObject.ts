/**
 * A monitored entity as returned by the cluster API: a flat field map.
 *
 * Objects have no fixed schema. Fields are read by name and an absent field
 * reads as the empty string (text) or zero (number).
 */
export type FieldValue = string | number;

export type ClusterObject = Record<string, FieldValue>;

/**
 * Text view of a field; absent fields read as ''.
 */
export function fieldText(object: ClusterObject, key: string): string {
  const value = object[key];
  return value === undefined ? '' : formatValue(value);
}

/**
 * Numeric view of a field; absent or non-numeric fields read as 0.
 */
export function fieldNumber(object: ClusterObject, key: string): number {
  const value = object[key];
  if (value === undefined || value === '') return 0;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : 0;
}

/**
 * Truthiness as the threshold options understand it: absent, '', '0' and 0
 * are all "not set".
 */
export function isTruthy(value: FieldValue | undefined): boolean {
  if (value === undefined) return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return value !== '' && value !== '0';
}

export function formatValue(value: FieldValue): string {
  return typeof value === 'number' ? String(value) : value;
}

/**
 * Flatten one raw API item into a ClusterObject. Booleans become 1/0;
 * nested objects, arrays and nulls are dropped. Returns null for non-objects.
 */
export function toClusterObject(raw: unknown): ClusterObject | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;

  const object: ClusterObject = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number') {
      object[key] = value;
    } else if (typeof value === 'boolean') {
      object[key] = value ? 1 : 0;
    }
  }
  return object;
}

export function toClusterObjects(raw: unknown): ClusterObject[] {
  const items = Array.isArray(raw) ? raw : [raw];
  const objects: ClusterObject[] = [];
  for (const item of items) {
    const object = toClusterObject(item);
    if (object) objects.push(object);
  }
  return objects;
}
