/**
 * Graph Store - 입력 테이블 읽기, 행 검증, 그래프 구성
 */
export { GraphStore } from './graphStore';
export type { GraphStoreOptions } from './graphStore';
export { parseRow, parseRows } from './rows';
export {
  readTable,
  parseTable,
  parseCsvRecords,
  parseJsonRecords,
  parseWorkbookRecords,
  detectFormat,
} from './tableReader';
export type { TextTableFormat } from './tableReader';
