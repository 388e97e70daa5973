/**
 * 커맨드 옵션 파서 (commander argParser)
 */
import { InvalidArgumentError } from 'commander';
import { isNodeKind, parseList, NODE_KINDS } from '@hiergraph/shared';
import type { NodeKind } from '@hiergraph/shared';

/** --max-depth: 0 이상의 정수 */
export function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidArgumentError('0 이상의 정수를 입력하세요.');
  }
  return depth;
}

/** --kind: 쉼표 구분 kind 목록 */
export function parseKinds(value: string): NodeKind[] {
  const kinds: NodeKind[] = [];
  for (const item of parseList(value)) {
    if (!isNodeKind(item)) {
      throw new InvalidArgumentError(`알 수 없는 kind: ${item} (허용: ${NODE_KINDS.join(', ')})`);
    }
    kinds.push(item);
  }
  return kinds;
}

/** --rel, --visible: 쉼표 구분 목록 */
export function parseLabels(value: string): string[] {
  return parseList(value);
}
