/**
 * Graph Index - 테이블 파일에서 GraphStore + QueryEngine 구성
 */
import { loadEngineConfig, type EngineConfig } from '@hiergraph/config';
import type { TableRow } from '@hiergraph/shared';
import { GraphStore, readTable } from '../graph-store/index';
import { QueryEngine } from '../query-engine/index';

export interface LoadedGraph {
  store: GraphStore;
  engine: QueryEngine;
}

/** 검증된 행으로 스토어/엔진 구성 */
export function buildGraph(rows: readonly TableRow[], config: EngineConfig = loadEngineConfig()): LoadedGraph {
  const store = GraphStore.load(rows, { kindSizes: config.kindSizes });
  const engine = new QueryEngine(store, {
    maxPathDepth: config.maxPathDepth,
    maxPaths: config.maxPaths,
  });
  return { store, engine };
}

/** 파일 경로에서 바로 구성 */
export function loadGraph(filePath: string, config: EngineConfig = loadEngineConfig()): LoadedGraph {
  return buildGraph(readTable(filePath), config);
}
