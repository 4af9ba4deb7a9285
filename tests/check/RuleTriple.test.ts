import { ProbeUsageError } from '../../src/check/errors';
import { applyOverrides } from '../../src/check/Overrides';
import { parseRuleTriple, parseRuleTriples } from '../../src/check/RuleTriple';
import type { ClusterObject } from '../../src/check/ClusterObject';

describe('RuleTriple', () => {
  describe('parseRuleTriple', () => {
    it('should parse an override', () => {
      const rule = parseRuleTriple('id=qemu/*^critdisk^80', 'override');
      expect(rule.pattern.source).toBe('id=qemu/*');
      expect(rule.field).toBe('critdisk');
      expect(rule.value).toBe('80');
    });

    it('should require exactly three parts', () => {
      expect(() => parseRuleTriple('a=1^b', 'override')).toThrow(
        "Invalid override 'a=1^b': expected 'pattern^field^value'",
      );
      expect(() => parseRuleTriple('a=1^b^c^d', 'warnstr')).toThrow(
        "Invalid warnstr 'a=1^b^c^d': expected 'pattern^label^message'",
      );
    });

    it('should reject an override without a field name', () => {
      expect(() => parseRuleTriple('type=qemu^^80', 'override')).toThrow(
        "Invalid override 'type=qemu^^80': field name is empty",
      );
    });

    it('should reject a non-numeric override value', () => {
      expect(() => parseRuleTriple('type=qemu^critdisk^high', 'override')).toThrow(
        "Invalid override 'type=qemu^critdisk^high': value 'high' is not numeric",
      );
      expect(() => parseRuleTriple('type=qemu^critdisk^-5', 'override')).toThrow(ProbeUsageError);
    });

    it('should accept decimal override values', () => {
      expect(parseRuleTriple('type=node^warncpu^0.85', 'override').value).toBe('0.85');
    });

    it('should allow an empty label and any message for string rules', () => {
      const rule = parseRuleTriple('name=ct2^^gone fishing', 'critstr');
      expect(rule.field).toBe('');
      expect(rule.value).toBe('gone fishing');
    });

    it('should reject a malformed pattern', () => {
      expect(() => parseRuleTriple('qemu^label^msg', 'warnstr')).toThrow(
        "Invalid filter clause 'qemu' in 'qemu'",
      );
    });
  });

  describe('applyOverrides', () => {
    it('should let the last override of a field win', () => {
      const objects: ClusterObject[] = [{ id: 'storage/x', critdisk: '50' }, { id: 'storage/y' }];
      applyOverrides(
        objects,
        parseRuleTriples(['id=storage/x^critdisk^100', 'id=storage/x^critdisk^200'], 'override'),
      );
      expect(objects[0].critdisk).toBe('200');
      expect(objects[1].critdisk).toBeUndefined();
    });

    it('should overwrite values fetched from the API', () => {
      const objects: ClusterObject[] = [{ id: 'qemu/100', maxdisk: 100 }];
      applyOverrides(objects, parseRuleTriples(['id=qemu/*^maxdisk^400'], 'override'));
      expect(objects[0].maxdisk).toBe('400');
    });

    it('should ignore a pattern that matches nothing', () => {
      const objects: ClusterObject[] = [{ id: 'qemu/100' }];
      applyOverrides(objects, parseRuleTriples(['id=lxc/*^critdisk^1'], 'override'));
      expect(objects).toEqual([{ id: 'qemu/100' }]);
    });
  });
});
