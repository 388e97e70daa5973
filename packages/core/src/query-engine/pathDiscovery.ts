/**
 * PATH_DISCOVERY - DFS 기반 단순 경로 열거
 * 각 분기에서 이웃을 id 오름차순으로 방문하므로 동일 입력 → 동일 출력
 */
import type { EdgeKey, PathOptions } from '@hiergraph/shared';
import type { GraphStore } from '../graph-store/index';
import { UnknownNodeError } from '../errors';

/**
 * start → end 사이의 모든 단순 경로 (노드를 두 번 방문하지 않는 경로)
 * 반환값은 지연 평가되며 순회할 때마다 처음부터 다시 탐색한다
 * maxDepth: 경로의 최대 엣지 수 (기본 무제한)
 */
export function allSimplePaths(
  store: GraphStore,
  start: string,
  end: string,
  options: PathOptions = {},
): Iterable<string[]> {
  if (!store.hasNode(start)) throw new UnknownNodeError(start);
  if (!store.hasNode(end)) throw new UnknownNodeError(end);

  const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;

  return {
    [Symbol.iterator]: () => walk(store, start, end, maxDepth),
  };
}

function* walk(
  store: GraphStore,
  start: string,
  end: string,
  maxDepth: number,
): Generator<string[]> {
  // 시작 = 끝: 길이 0 경로 하나
  if (start === end) {
    yield [start];
    return;
  }
  yield* extend(store, start, [start], new Set([start]), end, maxDepth);
}

function* extend(
  store: GraphStore,
  current: string,
  path: string[],
  onPath: Set<string>,
  end: string,
  maxDepth: number,
): Generator<string[]> {
  // 엣지를 하나 더 붙이면 path.length개가 된다
  if (path.length > maxDepth) return;

  for (const next of store.adjacentNodeIds(current)) {
    if (onPath.has(next)) continue;

    if (next === end) {
      yield [...path, next];
      continue;
    }

    path.push(next);
    onPath.add(next);
    yield* extend(store, next, path, onPath, end, maxDepth);
    onPath.delete(next);
    path.pop();
  }
}

/** 경로의 연속된 노드 쌍 */
export function* pathHops(path: readonly string[]): Generator<[string, string]> {
  let previous: string | undefined;
  for (const nodeId of path) {
    if (previous !== undefined) yield [previous, nodeId];
    previous = nodeId;
  }
}

/** 경로를 이루는 엣지 키 (각 구간의 병렬 엣지 모두 포함) */
export function pathEdgeKeys(store: GraphStore, path: readonly string[]): EdgeKey[] {
  const keys: EdgeKey[] = [];
  for (const [a, b] of pathHops(path)) {
    for (const edge of store.edgesBetween(a, b)) {
      keys.push(edge.id);
    }
  }
  return keys;
}
