import { globToRegExp } from '../utils/Glob.js';
import { fieldText, type ClusterObject } from './ClusterObject.js';
import { ProbeUsageError } from './errors.js';

/**
 * One `key=glob` or `key!=glob` clause.
 */
export interface Clause {
  key: string;
  negate: boolean;
  pattern: string;
  regex: RegExp;
}

/**
 * A parsed filter expression: space-separated clauses that must all match.
 */
export interface Expression {
  source: string;
  clauses: Clause[];
}

const CLAUSE_PATTERN = /^([^\s=!]+)(!=|=)(.*)$/s;

/**
 * Parse an expression such as `type=qemu node!=pve2 name=web-*`.
 * An empty (or blank) expression has no clauses and matches everything.
 *
 * @throws ProbeUsageError when a clause is not `key=glob` or `key!=glob`
 */
export function parseExpression(source: string): Expression {
  const trimmed = source.trim();
  if (trimmed === '') {
    return { source, clauses: [] };
  }

  const clauses = trimmed.split(/\s+/).map((text) => {
    const match = CLAUSE_PATTERN.exec(text);
    if (!match) {
      throw new ProbeUsageError(`Invalid filter clause '${text}' in '${source}'`, {
        expression: source,
        clause: text,
      });
    }
    const [, key, operator, pattern] = match;
    return { key, negate: operator === '!=', pattern, regex: globToRegExp(pattern) };
  });

  return { source, clauses };
}

export function matchesExpression(expression: Expression, object: ClusterObject): boolean {
  return expression.clauses.every((clause) => {
    const hit = clause.regex.test(fieldText(object, clause.key));
    return clause.negate ? !hit : hit;
  });
}

/**
 * Convenience form taking the expression text.
 */
export function matches(expression: string | Expression, object: ClusterObject): boolean {
  const parsed = typeof expression === 'string' ? parseExpression(expression) : expression;
  return matchesExpression(parsed, object);
}
