/**
 * Table Reader - CSV/JSON/XLSX 파일을 읽어 TableRow 목록으로 변환
 */
import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { read, utils } from 'xlsx';
import type { TableFormat, TableRow } from '@hiergraph/shared';
import { LoadError, UnsupportedFormatError } from '../errors';
import { parseRows } from './rows';

/** 확장자로 입력 형식 판별 */
export function detectFormat(filePath: string): TableFormat {
  const ext = extname(filePath).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.json') return 'json';
  if (ext === '.xlsx') return 'xlsx';
  throw new UnsupportedFormatError(filePath);
}

/** 헤더 행이 있는 CSV 텍스트 → 레코드 목록 */
export function parseCsvRecords(content: string): unknown[] {
  const records: unknown = parse(content, {
    columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
    skip_empty_lines: true,
    bom: true,
  });
  if (!Array.isArray(records)) {
    throw new LoadError('CSV input did not produce a list of records');
  }
  return records;
}

/** JSON 배열 텍스트 → 레코드 목록 */
export function parseJsonRecords(content: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError(`Invalid JSON table: ${reason}`);
  }
  if (!Array.isArray(data)) {
    throw new LoadError('JSON table must be an array of records');
  }
  return data;
}

/** 헤더 정규화 (CSV와 동일하게 trim + 소문자) */
function normalizeHeader(cell: unknown): string {
  return cell === null || cell === undefined ? '' : String(cell).trim().toLowerCase();
}

/**
 * 워크북 바이너리 → 첫 번째 시트의 레코드 목록
 * 첫 행은 헤더, 빈 셀은 null
 */
export function parseWorkbookRecords(data: Uint8Array): unknown[] {
  const workbook = read(data, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (sheet === undefined) {
    throw new LoadError('Workbook has no sheets');
  }

  const [header = [], ...body] = utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
  });
  const columns = header.map(normalizeHeader);

  return body.map((cells) => {
    const record: Record<string, unknown> = {};
    columns.forEach((column, index) => {
      record[column] = cells[index] ?? null;
    });
    return record;
  });
}

/** 텍스트 형식 (csv, json) */
export type TextTableFormat = Exclude<TableFormat, 'xlsx'>;

/** 텍스트 내용을 형식에 맞게 파싱 후 검증 */
export function parseTable(content: string, format: TextTableFormat): TableRow[] {
  const records = format === 'csv' ? parseCsvRecords(content) : parseJsonRecords(content);
  return parseRows(records);
}

/** 파일 경로에서 테이블 읽기 */
export function readTable(filePath: string): TableRow[] {
  const format = detectFormat(filePath);
  if (format === 'xlsx') {
    return parseRows(parseWorkbookRecords(readFileSync(filePath)));
  }
  return parseTable(readFileSync(filePath, 'utf-8'), format);
}
