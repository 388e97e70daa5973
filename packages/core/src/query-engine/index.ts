/**
 * Query Engine - 결정론적 그래프 질의
 * 동일 입력 → 동일 출력 보장
 */
export { QueryEngine } from './executor';
export type { QueryLimits } from './executor';
export { allSimplePaths, pathEdgeKeys, pathHops } from './pathDiscovery';
export { expandNode } from './expansion';
export type { ExpandOptions } from './expansion';
export { summarizeView } from './summary';
