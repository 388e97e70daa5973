import { describe, expect, it } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseDepth, parseKinds, parseLabels } from './options';

describe('parseDepth', () => {
  it('accepts non-negative integers', () => {
    expect(parseDepth('0')).toBe(0);
    expect(parseDepth('4')).toBe(4);
  });

  it('rejects fractions, negatives and text', () => {
    for (const value of ['1.5', '-1', 'deep']) {
      expect(() => parseDepth(value)).toThrow(InvalidArgumentError);
    }
  });
});

describe('parseKinds', () => {
  it('parses a comma-separated kind list', () => {
    expect(parseKinds('lead, child')).toEqual(['lead', 'child']);
  });

  it('rejects an unknown kind', () => {
    expect(() => parseKinds('lead,boss')).toThrow('알 수 없는 kind: boss (허용: lead, member, child)');
  });
});

describe('parseLabels', () => {
  it('splits labels', () => {
    expect(parseLabels('manages,reports_to')).toEqual(['manages', 'reports_to']);
  });
});
