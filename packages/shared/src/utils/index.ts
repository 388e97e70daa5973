import { NODE_KINDS, EDGE_KEY_SEPARATOR } from '../constants/index';
import type { NodeKind, EdgeKey } from '../types/index';

/**
 * 식별자 비교 (코드 유닛 순서)
 * 로케일과 무관하게 항상 같은 순서를 보장
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** 식별자 배열을 정렬된 새 배열로 반환 */
export function sortIds(ids: Iterable<string>): string[] {
  return [...ids].sort(compareIds);
}

/**
 * 키 구성 요소 이스케이프 (\ → \\, | → \|)
 * id나 relationship에 구분자가 들어 있어도 키가 겹치지 않는다
 */
export function escapeKeyPart(part: string): string {
  return part.replace(/[\\|]/g, (char) => `\\${char}`);
}

/**
 * 순서 없는 노드 쌍 키
 * 형식: {lo}|{hi}
 */
export function pairKey(a: string, b: string): string {
  const [lo, hi] = compareIds(a, b) <= 0 ? [a, b] : [b, a];
  return `${escapeKeyPart(lo)}${EDGE_KEY_SEPARATOR}${escapeKeyPart(hi)}`;
}

/**
 * 엣지 키 생성
 * 형식: {lo}|{hi}|{relationship} - 방향과 무관하게 같은 키
 */
export function buildEdgeKey(a: string, b: string, relationship: string): EdgeKey {
  return `${pairKey(a, b)}${EDGE_KEY_SEPARATOR}${escapeKeyPart(relationship)}`;
}

/** NodeKind 타입 가드 */
export function isNodeKind(value: string): value is NodeKind {
  return NODE_KINDS.some((kind) => kind === value);
}

/**
 * 쉼표 구분 목록 파싱
 * 공백 제거 후 빈 항목 제외
 */
export function parseList(input: string | undefined): string[] {
  if (!input) return [];
  return input
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
