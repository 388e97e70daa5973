export * from './errors';
export * from './graph-store/index';
export * from './query-engine/index';
export { VisibilityState } from './visibility/index';
export { buildGraph, loadGraph } from './graph-index/index';
export type { LoadedGraph } from './graph-index/index';
