/**
 * NODE_EXPANSION - 노드의 직접 이웃을 드러낸다
 * 이미 보이는 요소는 제외하므로 같은 가시 집합으로 다시 호출하면 빈 결과
 */
import { sortIds } from '@hiergraph/shared';
import type { ExpansionDelta, ValueSet, VisibleSnapshot } from '@hiergraph/shared';
import type { GraphStore } from '../graph-store/index';
import { VisibilityState } from '../visibility/index';

export interface ExpandOptions {
  /** 생략 시 모든 relationship 허용 */
  visibleRelationships?: ValueSet<string>;
  /** 호출자 세션에서 이미 보이는 요소 */
  alreadyVisible?: VisibleSnapshot | VisibilityState;
}

export function expandNode(
  store: GraphStore,
  nodeId: string,
  options: ExpandOptions = {},
): ExpansionDelta {
  // 미등록 노드면 UnknownNodeError
  const incident = store.neighbors(nodeId);

  const labels = options.visibleRelationships
    ? new Set<string>(options.visibleRelationships)
    : undefined;
  const kept = labels ? incident.filter((edge) => labels.has(edge.relationship)) : incident;

  const known =
    options.alreadyVisible instanceof VisibilityState
      ? options.alreadyVisible
      : VisibilityState.from(options.alreadyVisible);

  const revealed = new Set<string>([nodeId]);
  for (const edge of kept) {
    revealed.add(edge.source === nodeId ? edge.target : edge.source);
  }

  return {
    nodes: sortIds(revealed)
      .filter((id) => !known.hasNode(id))
      .map((id) => ({ ...store.getNode(id), visible: true })),
    links: kept
      .filter((edge) => !known.hasEdge(edge.id))
      .map((edge) => ({ ...edge, visible: true })),
  };
}
