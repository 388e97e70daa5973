import { describe, expect, it } from 'vitest';
import { summarizeView } from './summary';

describe('summarizeView', () => {
  it('counts total and visible elements', () => {
    expect(
      summarizeView({
        nodes: [
          { id: 'A', kind: 'lead', size: 30, visible: true },
          { id: 'B', kind: 'member', size: 25, visible: false },
          { id: 'C', kind: 'child', size: 20, visible: true },
        ],
        links: [
          { id: 'A|B|x', source: 'B', target: 'A', relationship: 'x', visible: false },
          { id: 'A|C|y', source: 'C', target: 'A', relationship: 'y', visible: true },
        ],
        truncated: false,
      }),
    ).toEqual({ totalNodes: 3, visibleNodes: 2, totalLinks: 2, visibleLinks: 1 });
  });

  it('handles an empty delta', () => {
    expect(summarizeView({ nodes: [], links: [] })).toEqual({
      totalNodes: 0,
      visibleNodes: 0,
      totalLinks: 0,
      visibleLinks: 0,
    });
  });
});
