import { describe, expect, it } from 'vitest';
import type { NodeKind, TableRow } from '@hiergraph/shared';
import { GraphStore } from './graphStore';
import {
  DuplicateNodeError,
  InvalidRowError,
  LoadError,
  MissingParentError,
  SelfReferenceError,
  UnknownNodeError,
} from '../errors';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function row(node: string, kind: NodeKind, parent?: string, relationship?: string): TableRow {
  return { node, kind, parent: parent ?? null, relationship: relationship ?? null };
}

function teamRows(): TableRow[] {
  return [
    row('TeamA', 'lead'),
    row('Bob', 'member', 'TeamA', 'reports_to'),
    row('Project1', 'child', 'Bob', 'manages'),
  ];
}

// ---------------------------------------------------------------------------
// load
// ---------------------------------------------------------------------------

describe('GraphStore.load', () => {
  it('registers one node per id and one edge per parent row', () => {
    const store = GraphStore.load(teamRows());
    expect(store.order).toBe(3);
    expect(store.size).toBe(2);
  });

  it('derives size from kind', () => {
    const store = GraphStore.load(teamRows());
    expect(store.nodes()).toEqual([
      { id: 'Bob', kind: 'member', size: 25 },
      { id: 'Project1', kind: 'child', size: 20 },
      { id: 'TeamA', kind: 'lead', size: 30 },
    ]);
  });

  it('uses a custom size mapping', () => {
    const store = GraphStore.load(teamRows(), { kindSizes: { lead: 9, member: 6, child: 3 } });
    expect(store.getNode('TeamA').size).toBe(9);
    expect(store.getNode('Project1').size).toBe(3);
  });

  it('keeps row orientation as source → target', () => {
    const store = GraphStore.load(teamRows());
    expect(store.edges()).toEqual([
      { id: 'Bob|Project1|manages', source: 'Project1', target: 'Bob', relationship: 'manages' },
      { id: 'Bob|TeamA|reports_to', source: 'Bob', target: 'TeamA', relationship: 'reports_to' },
    ]);
  });

  it('accepts a parent declared after its child', () => {
    const store = GraphStore.load([row('Bob', 'member', 'TeamA', 'reports_to'), row('TeamA', 'lead')]);
    expect(store.edges().map((edge) => edge.id)).toEqual(['Bob|TeamA|reports_to']);
  });

  it('accepts the same id repeated with the same kind', () => {
    const store = GraphStore.load([
      row('TeamA', 'lead'),
      row('TeamB', 'lead'),
      row('Bob', 'member', 'TeamA', 'reports_to'),
      row('Bob', 'member', 'TeamB', 'reports_to'),
    ]);
    expect(store.nodeIds()).toEqual(['Bob', 'TeamA', 'TeamB']);
    expect(store.size).toBe(2);
  });

  it('rejects the same id declared with a different kind', () => {
    const rows = [row('Bob', 'member'), row('Bob', 'lead')];
    expect(() => GraphStore.load(rows)).toThrow(DuplicateNodeError);
    expect(() => GraphStore.load(rows)).toThrow(LoadError);
    expect(() => GraphStore.load(rows)).toThrow('Node "Bob" declared as "member" and again as "lead"');
  });

  it('treats ids as case-sensitive', () => {
    const store = GraphStore.load([row('bob', 'member'), row('Bob', 'lead')]);
    expect(store.nodeIds()).toEqual(['Bob', 'bob']);
  });

  it('rejects a parent that is never declared', () => {
    expect(() => GraphStore.load([row('Bob', 'member', 'Ghost', 'reports_to')])).toThrow(
      MissingParentError,
    );
  });

  it('keeps distinct relationships between the same pair as separate edges', () => {
    const store = GraphStore.load([
      row('TeamA', 'lead'),
      row('Bob', 'member', 'TeamA', 'reports_to'),
      row('Bob', 'member', 'TeamA', 'mentored_by'),
    ]);
    expect(store.edgesBetween('TeamA', 'Bob').map((edge) => edge.relationship)).toEqual([
      'mentored_by',
      'reports_to',
    ]);
  });

  it('collapses an identical pair and relationship into one edge', () => {
    const store = GraphStore.load([
      row('TeamA', 'lead', 'Bob', 'works_with'),
      row('Bob', 'member', 'TeamA', 'works_with'),
    ]);
    expect(store.size).toBe(1);
    expect(store.edges()[0]).toEqual({
      id: 'Bob|TeamA|works_with',
      source: 'TeamA',
      target: 'Bob',
      relationship: 'works_with',
    });
  });

  it('keeps edges apart when ids contain the key separator', () => {
    const store = GraphStore.load([
      row('a', 'lead'),
      row('c', 'lead'),
      row('a|b', 'member', 'c', 'r'),
      row('b|c', 'member', 'a', 'r'),
    ]);
    expect(store.size).toBe(2);
    expect(store.edges().map((edge) => edge.id)).toEqual(['a\\|b|c|r', 'a|b\\|c|r']);
    expect(store.edgesBetween('a|b', 'c')).toHaveLength(1);
    expect(store.edgesBetween('a', 'b|c')).toHaveLength(1);
  });

  it('rejects hand-built rows with a parent but no relationship', () => {
    expect(() => GraphStore.load([row('TeamA', 'lead'), row('Bob', 'member', 'TeamA')])).toThrow(
      InvalidRowError,
    );
  });

  it('rejects a node that is its own parent', () => {
    expect(() => GraphStore.load([row('Bob', 'member', 'Bob', 'reports_to')])).toThrow(
      SelfReferenceError,
    );
  });

  it('resolves every edge endpoint to a registered node', () => {
    const store = GraphStore.load([
      row('Root', 'lead'),
      row('A', 'member', 'Root', 'part_of'),
      row('B', 'member', 'Root', 'part_of'),
      row('C', 'child', 'A', 'owned_by'),
      row('C', 'child', 'B', 'shared_with'),
    ]);
    for (const edge of store.edges()) {
      expect(store.hasNode(edge.source)).toBe(true);
      expect(store.hasNode(edge.target)).toBe(true);
    }
  });

  it('builds an empty store from no rows', () => {
    const store = GraphStore.load([]);
    expect(store.nodeIds()).toEqual([]);
    expect(store.relationshipTypes()).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// accessors
// ---------------------------------------------------------------------------

describe('GraphStore accessors', () => {
  const store = GraphStore.load([
    row('TeamA', 'lead'),
    row('Bob', 'member', 'TeamA', 'reports_to'),
    row('Alice', 'member', 'TeamA', 'reports_to'),
    row('Project1', 'child', 'Bob', 'manages'),
    row('Project1', 'child', 'Alice', 'reviews'),
  ]);

  it('nodeIds returns ids in order', () => {
    expect(store.nodeIds()).toEqual(['Alice', 'Bob', 'Project1', 'TeamA']);
  });

  it('relationshipTypes returns sorted unique labels', () => {
    expect(store.relationshipTypes()).toEqual(['manages', 'reports_to', 'reviews']);
  });

  it('neighbors returns the incident edges', () => {
    expect(store.neighbors('Bob').map((edge) => edge.id)).toEqual([
      'Bob|Project1|manages',
      'Bob|TeamA|reports_to',
    ]);
  });

  it('adjacentNodeIds returns sorted unique neighbours', () => {
    expect(store.adjacentNodeIds('Project1')).toEqual(['Alice', 'Bob']);
  });

  it('neighbors fails for an unknown node', () => {
    expect(() => store.neighbors('Nobody')).toThrow(UnknownNodeError);
  });

  it('getEdge returns undefined for an unknown key', () => {
    expect(store.getEdge('x|y|z')).toBeUndefined();
    expect(store.getEdge('Alice|TeamA|reports_to')?.source).toBe('Alice');
  });
});
