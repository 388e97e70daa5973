/**
 * 출력 포맷 - 색상 없는 순수 문자열 (색상은 커맨드에서 입힘)
 */
import { HiergraphError } from '@hiergraph/shared';
import type { GraphEdge, GraphNode, ViewSummary, VisibleSnapshot } from '@hiergraph/shared';

/** 에러 → 한 줄 메시지 */
export function formatError(error: unknown): string {
  if (error instanceof HiergraphError) return `[${error.code}] ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatNode(node: GraphNode): string {
  return `[${node.kind}] ${node.id}`;
}

export function formatLink(link: GraphEdge): string {
  return `${link.source} -[${link.relationship}]- ${link.target}`;
}

export function formatPath(path: readonly string[]): string {
  return path.join(' -> ');
}

export function formatSummary(summary: ViewSummary): string[] {
  return [
    `Nodes: ${summary.visibleNodes}/${summary.totalNodes} visible`,
    `Links: ${summary.visibleLinks}/${summary.totalLinks} visible`,
  ];
}

/** 가시 집합 → 다음 expand 호출용 옵션 */
export function formatVisibleFlags(snapshot: Required<VisibleSnapshot>): string[] {
  const lines = [`--visible '${[...snapshot.nodes].join(',')}'`];
  const edges = [...snapshot.edges];
  if (edges.length > 0) lines.push(`--visible-edges '${edges.join(',')}'`);
  return lines;
}

/** JSON 직렬화 (파일/표준출력 공용) */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}
