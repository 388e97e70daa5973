import type { ExpansionDelta, GraphView, ViewSummary } from '@hiergraph/shared';

/** 전체/가시 노드·링크 수 집계 */
export function summarizeView(view: GraphView | ExpansionDelta): ViewSummary {
  return {
    totalNodes: view.nodes.length,
    visibleNodes: view.nodes.filter((node) => node.visible).length,
    totalLinks: view.links.length,
    visibleLinks: view.links.filter((link) => link.visible).length,
  };
}
