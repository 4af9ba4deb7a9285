import type { ClusterObject } from './ClusterObject.js';
import { matchesExpression, parseExpression, type Expression } from './Expression.js';

/**
 * Return the objects matching `expression`, in their original order.
 * The returned array holds the same object references, so later stages can
 * mutate them in place.
 */
export function filterObjects(
  expression: string | Expression,
  objects: readonly ClusterObject[],
): ClusterObject[] {
  const parsed = typeof expression === 'string' ? parseExpression(expression) : expression;
  if (parsed.clauses.length === 0) return [...objects];
  return objects.filter((object) => matchesExpression(parsed, object));
}
