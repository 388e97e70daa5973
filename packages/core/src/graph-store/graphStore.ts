/**
 * Graph Store - 입력 행으로 구성한 무방향 멀티 그래프
 * load 이후에는 읽기 전용, 여러 질의가 동시에 공유해도 안전
 */
import { MultiUndirectedGraph } from 'graphology';
import { KIND_SIZES, buildEdgeKey, compareIds, sortIds } from '@hiergraph/shared';
import type { EdgeKey, GraphEdge, GraphNode, KindSizeMap, NodeKind, TableRow } from '@hiergraph/shared';
import {
  DuplicateNodeError,
  InvalidRowError,
  MissingParentError,
  SelfReferenceError,
  UnknownNodeError,
} from '../errors';

type NodeAttributes = {
  kind: NodeKind;
  size: number;
};

// source/target는 입력 행 방향 유지 (node → parent)
type EdgeAttributes = {
  source: string;
  target: string;
  relationship: string;
};

type StoreGraph = MultiUndirectedGraph<NodeAttributes, EdgeAttributes>;

export interface GraphStoreOptions {
  kindSizes?: KindSizeMap;
}

function compareEdges(a: GraphEdge, b: GraphEdge): number {
  return compareIds(a.id, b.id);
}

export class GraphStore {
  private readonly graph: StoreGraph;

  private constructor(graph: StoreGraph) {
    this.graph = graph;
  }

  /**
   * 입력 행으로 스토어 생성 (2-pass)
   * Pass 1: 선언된 노드 등록 / Pass 2: 엣지 등록 + parent 검증
   * 오류 시 부분 구성된 그래프는 버려진다
   */
  static load(rows: readonly TableRow[], options: GraphStoreOptions = {}): GraphStore {
    const kindSizes = options.kindSizes ?? KIND_SIZES;
    const graph: StoreGraph = new MultiUndirectedGraph<NodeAttributes, EdgeAttributes>({
      allowSelfLoops: false,
    });

    // Pass 1: 노드
    for (const row of rows) {
      if (graph.hasNode(row.node)) {
        const existing = graph.getNodeAttributes(row.node);
        if (existing.kind !== row.kind) {
          throw new DuplicateNodeError(row.node, existing.kind, row.kind);
        }
        continue;
      }
      graph.addNode(row.node, { kind: row.kind, size: kindSizes[row.kind] });
    }

    // Pass 2: 엣지
    rows.forEach((row, index) => {
      if (row.parent === null) return;
      if (row.relationship === null) {
        throw new InvalidRowError(index + 1, `relationship is required when parent is set (node "${row.node}")`);
      }
      if (row.parent === row.node) {
        throw new SelfReferenceError(index + 1, row.node);
      }
      if (!graph.hasNode(row.parent)) {
        throw new MissingParentError(row.node, row.parent);
      }

      const key = buildEdgeKey(row.node, row.parent, row.relationship);
      if (graph.hasEdge(key)) return;

      graph.addEdgeWithKey(key, row.node, row.parent, {
        source: row.node,
        target: row.parent,
        relationship: row.relationship,
      });
    });

    return new GraphStore(graph);
  }

  /** 노드 수 */
  get order(): number {
    return this.graph.order;
  }

  /** 엣지 수 */
  get size(): number {
    return this.graph.size;
  }

  hasNode(nodeId: string): boolean {
    return this.graph.hasNode(nodeId);
  }

  /** 노드 조회 - 미등록이면 UnknownNodeError */
  getNode(nodeId: string): GraphNode {
    this.assertNode(nodeId);
    const attrs = this.graph.getNodeAttributes(nodeId);
    return { id: nodeId, kind: attrs.kind, size: attrs.size };
  }

  getEdge(edgeKey: EdgeKey): GraphEdge | undefined {
    if (!this.graph.hasEdge(edgeKey)) return undefined;
    return this.toEdge(edgeKey);
  }

  /** 전체 노드 id (정렬) */
  nodeIds(): string[] {
    return sortIds(this.graph.nodes());
  }

  /** 전체 노드 (id 순) */
  nodes(): GraphNode[] {
    return this.nodeIds().map((id) => this.getNode(id));
  }

  /** 전체 엣지 (키 순) */
  edges(): GraphEdge[] {
    return this.graph.edges().map((key) => this.toEdge(key)).sort(compareEdges);
  }

  /** 중복 없는 relationship 목록 (정렬) */
  relationshipTypes(): string[] {
    const labels = new Set<string>();
    this.graph.forEachEdge((_key, attrs) => {
      labels.add(attrs.relationship);
    });
    return sortIds(labels);
  }

  /** nodeId에 연결된 엣지 (키 순) */
  neighbors(nodeId: string): GraphEdge[] {
    this.assertNode(nodeId);
    return this.graph.edges(nodeId).map((key) => this.toEdge(key)).sort(compareEdges);
  }

  /** 직접 연결된 노드 id (정렬, 중복 제거) */
  adjacentNodeIds(nodeId: string): string[] {
    this.assertNode(nodeId);
    return sortIds(new Set(this.graph.neighbors(nodeId)));
  }

  /** 두 노드 사이의 모든 병렬 엣지 */
  edgesBetween(a: string, b: string): GraphEdge[] {
    this.assertNode(a);
    this.assertNode(b);
    return this.graph.edges(a, b).map((key) => this.toEdge(key)).sort(compareEdges);
  }

  private assertNode(nodeId: string): void {
    if (!this.graph.hasNode(nodeId)) {
      throw new UnknownNodeError(nodeId);
    }
  }

  private toEdge(key: string): GraphEdge {
    const attrs = this.graph.getEdgeAttributes(key);
    return {
      id: key,
      source: attrs.source,
      target: attrs.target,
      relationship: attrs.relationship,
    };
  }
}
