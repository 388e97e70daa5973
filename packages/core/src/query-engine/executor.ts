/**
 * Query Engine - GraphStore + VisibilityState로 질의 수행
 * 질의마다 새 VisibilityState를 만들고, 전체 노드/엣지에 가시성 플래그를 붙여 반환
 */
import type { EngineConfig } from '@hiergraph/config';
import type { EdgeKey, ExpansionDelta, GraphView, QueryOptions } from '@hiergraph/shared';
import type { GraphStore } from '../graph-store/index';
import { InvalidQueryError, UnknownNodeError } from '../errors';
import { VisibilityState } from '../visibility/index';
import { allSimplePaths, pathEdgeKeys } from './pathDiscovery';
import { expandNode, type ExpandOptions } from './expansion';

/** 경로 탐색 한도 */
export type QueryLimits = Pick<EngineConfig, 'maxPathDepth' | 'maxPaths'>;

interface PathCollection {
  paths: string[][];
  truncated: boolean;
}

export class QueryEngine {
  constructor(
    private readonly store: GraphStore,
    private readonly limits: QueryLimits = {},
  ) {}

  /**
   * 질의 메인 진입점
   * 필터는 path → node → kind → relationship 순으로 교집합 적용
   */
  query(options: QueryOptions = {}): GraphView {
    const { filterNode, pathStart, pathEnd } = options;
    const maxDepth = options.maxDepth ?? this.limits.maxPathDepth;

    // 검증이 끝나기 전에는 아무것도 계산하지 않는다
    this.validate(options, maxDepth);

    const state = new VisibilityState();
    for (const id of this.store.nodeIds()) state.showNode(id);
    for (const edge of this.store.edges()) state.showEdge(edge.id);

    let paths: string[][] | undefined;
    let truncated = false;

    // 경로 필터: 모든 단순 경로 위의 노드/엣지
    if (pathStart !== undefined && pathEnd !== undefined) {
      const collected = this.collectPaths(pathStart, pathEnd, maxDepth);
      paths = collected.paths;
      truncated = collected.truncated;

      const pathNodes = new Set<string>();
      const pathEdges = new Set<EdgeKey>();
      for (const path of paths) {
        for (const id of path) pathNodes.add(id);
        for (const key of pathEdgeKeys(this.store, path)) pathEdges.add(key);
      }
      state.retainNodes((id) => pathNodes.has(id));
      state.retainEdges((key) => pathEdges.has(key));
    }

    // 노드 필터: 자신 + 직접 이웃, 자신에 연결된 엣지
    if (filterNode !== undefined) {
      const nodeSet = new Set<string>([filterNode, ...this.store.adjacentNodeIds(filterNode)]);
      const edgeSet = new Set<EdgeKey>(this.store.neighbors(filterNode).map((edge) => edge.id));
      state.retainNodes((id) => nodeSet.has(id));
      state.retainEdges((key) => edgeSet.has(key));
    }

    if (options.visibleKinds !== undefined) {
      const kinds = new Set<string>(options.visibleKinds);
      state.retainNodes((id) => kinds.has(this.store.getNode(id).kind));
    }

    // relationship 필터는 엣지만 숨긴다 (노드는 유지)
    if (options.visibleRelationships !== undefined) {
      const labels = new Set<string>(options.visibleRelationships);
      state.retainEdges((key) => {
        const edge = this.store.getEdge(key);
        return edge !== undefined && labels.has(edge.relationship);
      });
    }

    return {
      nodes: this.store.nodes().map((node) => ({ ...node, visible: state.hasNode(node.id) })),
      links: this.store.edges().map((edge) => ({ ...edge, visible: state.isEdgeVisible(edge) })),
      ...(paths !== undefined ? { paths } : {}),
      truncated,
    };
  }

  /** 노드 확장 - 새로 드러난 요소만 반환 */
  expand(nodeId: string, options: ExpandOptions = {}): ExpansionDelta {
    return expandNode(this.store, nodeId, options);
  }

  /** 단순 경로 열거 (maxPaths 초과 시 중단) */
  paths(start: string, end: string, maxDepth = this.limits.maxPathDepth): PathCollection {
    this.validateDepth(maxDepth);
    return this.collectPaths(start, end, maxDepth);
  }

  private collectPaths(start: string, end: string, maxDepth: number | undefined): PathCollection {
    const paths: string[][] = [];
    const limit = this.limits.maxPaths;

    for (const path of allSimplePaths(this.store, start, end, { maxDepth })) {
      if (limit !== undefined && paths.length >= limit) {
        return { paths, truncated: true };
      }
      paths.push(path);
    }
    return { paths, truncated: false };
  }

  private validate(options: QueryOptions, maxDepth: number | undefined): void {
    const { filterNode, pathStart, pathEnd } = options;

    if ((pathStart === undefined) !== (pathEnd === undefined)) {
      throw new InvalidQueryError('pathStart and pathEnd must be given together');
    }
    for (const id of [pathStart, pathEnd, filterNode]) {
      if (id !== undefined && !this.store.hasNode(id)) {
        throw new UnknownNodeError(id);
      }
    }
    this.validateDepth(maxDepth);
  }

  private validateDepth(maxDepth: number | undefined): void {
    if (maxDepth !== undefined && !(Number.isInteger(maxDepth) && maxDepth >= 0)) {
      throw new InvalidQueryError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
    }
  }
}
