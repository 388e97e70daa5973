import type { NODE_KINDS, TABLE_FORMATS } from '../constants/index';

// === 기본 유틸리티 타입 ===

/** 배열 타입에서 원소 타입 추출 */
export type ArrayElement<T extends readonly unknown[]> = T[number];

/** 노드 종류 유니온 */
export type NodeKind = ArrayElement<typeof NODE_KINDS>;

/** 입력 파일 형식 유니온 */
export type TableFormat = ArrayElement<typeof TABLE_FORMATS>;

/** 정규화된 엣지 식별자 (lo|hi|relationship) */
export type EdgeKey = string;

/** Kind → 노드 크기 매핑 */
export type KindSizeMap = Record<NodeKind, number>;

/** 값 목록 (배열 또는 Set) */
export type ValueSet<T> = readonly T[] | ReadonlySet<T>;

// === 입력 ===

/** 검증을 통과한 입력 행 */
export interface TableRow {
  node: string;
  parent: string | null;
  kind: NodeKind;
  relationship: string | null;
}

// === 그래프 엔티티 ===

/** 그래프 노드 */
export interface GraphNode {
  id: string;
  kind: NodeKind;
  size: number;
}

/** 그래프 엣지 (source = 행의 node, target = 행의 parent) */
export interface GraphEdge {
  id: EdgeKey;
  source: string;
  target: string;
  relationship: string;
}

// === Query Engine 타입 ===

/** Query 옵션 - 모든 필터는 교집합으로 합성 */
export interface QueryOptions {
  filterNode?: string;
  pathStart?: string;
  pathEnd?: string;
  visibleRelationships?: ValueSet<string>;
  visibleKinds?: ValueSet<NodeKind>;
  maxDepth?: number;
}

/** 경로 탐색 옵션 */
export interface PathOptions {
  maxDepth?: number;
}

/** 결과 노드 */
export interface NodeView extends GraphNode {
  visible: boolean;
}

/** 결과 링크 */
export interface LinkView extends GraphEdge {
  visible: boolean;
}

/** Query 결과 - 전체 노드/엣지와 가시성 플래그 */
export interface GraphView {
  nodes: NodeView[];
  links: LinkView[];
  paths?: string[][];
  truncated: boolean;
}

/** 이미 보이는 요소 (확장 요청 시 호출자가 전달) */
export interface VisibleSnapshot {
  nodes?: ValueSet<string>;
  edges?: ValueSet<EdgeKey>;
}

/** 노드 확장 결과 - 새로 드러난 요소만 포함 */
export interface ExpansionDelta {
  nodes: NodeView[];
  links: LinkView[];
}

/** 그래프 통계 */
export interface ViewSummary {
  totalNodes: number;
  visibleNodes: number;
  totalLinks: number;
  visibleLinks: number;
}
