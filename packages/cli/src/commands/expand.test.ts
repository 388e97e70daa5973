import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createExpandCommand } from './expand';

vi.mock('ora', () => ({
  default: () => ({
    start() {
      return this;
    },
    succeed: vi.fn(),
    fail: vi.fn(),
  }),
}));

const ORG = fileURLToPath(new URL('./__fixtures__/org.json', import.meta.url));

afterEach(() => {
  vi.restoreAllMocks();
});

describe('expand command', () => {
  it('prints the accumulated visible set for the next expansion', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    createExpandCommand().parse([ORG, 'Bob', '--visible', 'Bob'], { from: 'user' });

    const output = log.mock.calls.map(([line]) => String(line)).join('\n');
    expect(output).toContain("--visible 'Bob,Project1,TeamA'");
    expect(output).toContain("--visible-edges 'Bob|Project1|manages,Bob|TeamA|reports_to'");
  });

  it('writes only the delta as JSON', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    createExpandCommand().parse(
      [ORG, 'Bob', '--visible', 'Bob,TeamA', '--visible-edges', 'Bob|TeamA|reports_to', '--json'],
      { from: 'user' },
    );

    const delta: unknown = JSON.parse(write.mock.calls.map(([chunk]) => String(chunk)).join(''));
    expect(delta).toEqual({
      nodes: [{ id: 'Project1', kind: 'child', size: 20, visible: true }],
      links: [
        { id: 'Bob|Project1|manages', source: 'Project1', target: 'Bob', relationship: 'manages', visible: true },
      ],
    });
  });
});
