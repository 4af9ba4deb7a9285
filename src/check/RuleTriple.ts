import { parseExpression, type Expression } from './Expression.js';
import { ProbeUsageError } from './errors.js';

/**
 * `pattern^field^value` for overrides, `pattern^label^message` for
 * warnstr/critstr string-match rules.
 */
export interface RuleTriple {
  pattern: Expression;
  field: string;
  value: string;
}

export type RuleKind = 'override' | 'warnstr' | 'critstr';

const NUMERIC_VALUE = /^[0-9]*(\.[0-9]*)?$/;

/**
 * Split a rule on `^` into exactly three parts and parse its pattern.
 * Override rules additionally need a field name and a numeric value.
 *
 * @throws ProbeUsageError on malformed input
 */
export function parseRuleTriple(raw: string, kind: RuleKind): RuleTriple {
  const parts = raw.split('^');
  if (parts.length !== 3) {
    throw new ProbeUsageError(
      `Invalid ${kind} '${raw}': expected 'pattern^${kind === 'override' ? 'field^value' : 'label^message'}'`,
      { kind, rule: raw },
    );
  }

  const [pattern, field, value] = parts;

  if (kind === 'override') {
    if (field === '') {
      throw new ProbeUsageError(`Invalid override '${raw}': field name is empty`, {
        kind,
        rule: raw,
      });
    }
    if (!NUMERIC_VALUE.test(value)) {
      throw new ProbeUsageError(`Invalid override '${raw}': value '${value}' is not numeric`, {
        kind,
        rule: raw,
      });
    }
  }

  return { pattern: parseExpression(pattern), field, value };
}

export function parseRuleTriples(raws: readonly string[], kind: RuleKind): RuleTriple[] {
  return raws.map((raw) => parseRuleTriple(raw, kind));
}
