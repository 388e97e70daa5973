/**
 * Visibility State - 질의 한 번 동안의 가시 노드/엣지 집합
 * 질의마다 새로 만들고 응답 생성 후 버린다
 */
import { sortIds } from '@hiergraph/shared';
import type { EdgeKey, ExpansionDelta, GraphEdge, GraphView, VisibleSnapshot } from '@hiergraph/shared';

export class VisibilityState {
  readonly visibleNodes = new Set<string>();
  readonly visibleEdges = new Set<EdgeKey>();

  /** 호출자가 가진 가시 요소로 상태 구성 */
  static from(snapshot: VisibleSnapshot = {}): VisibilityState {
    const state = new VisibilityState();
    for (const id of snapshot.nodes ?? []) state.visibleNodes.add(id);
    for (const key of snapshot.edges ?? []) state.visibleEdges.add(key);
    return state;
  }

  showNode(nodeId: string): void {
    this.visibleNodes.add(nodeId);
  }

  showEdge(edgeKey: EdgeKey): void {
    this.visibleEdges.add(edgeKey);
  }

  hasNode(nodeId: string): boolean {
    return this.visibleNodes.has(nodeId);
  }

  hasEdge(edgeKey: EdgeKey): boolean {
    return this.visibleEdges.has(edgeKey);
  }

  /** predicate를 만족하는 노드만 남김 */
  retainNodes(predicate: (nodeId: string) => boolean): void {
    for (const id of [...this.visibleNodes]) {
      if (!predicate(id)) this.visibleNodes.delete(id);
    }
  }

  /** predicate를 만족하는 엣지만 남김 */
  retainEdges(predicate: (edgeKey: EdgeKey) => boolean): void {
    for (const key of [...this.visibleEdges]) {
      if (!predicate(key)) this.visibleEdges.delete(key);
    }
  }

  /** 양 끝 노드가 모두 보일 때만 엣지가 보인다 */
  isEdgeVisible(edge: GraphEdge): boolean {
    return (
      this.visibleEdges.has(edge.id) &&
      this.visibleNodes.has(edge.source) &&
      this.visibleNodes.has(edge.target)
    );
  }

  /** 확장 결과나 질의 결과의 가시 요소를 누적 */
  absorb(update: ExpansionDelta | GraphView): void {
    for (const node of update.nodes) {
      if (node.visible) this.visibleNodes.add(node.id);
    }
    for (const link of update.links) {
      if (link.visible) this.visibleEdges.add(link.id);
    }
  }

  /** 현재 가시 요소 (id 순) - 다음 확장의 alreadyVisible로 넘길 수 있다 */
  snapshot(): Required<VisibleSnapshot> {
    return { nodes: sortIds(this.visibleNodes), edges: sortIds(this.visibleEdges) };
  }
}
