/**
 * 입력 행 검증 - 느슨한 레코드를 TableRow로 변환
 * 누락/형식 오류 처리는 전부 이 경계에서 끝낸다
 */
import { z } from 'zod';
import { isNodeKind } from '@hiergraph/shared';
import type { TableRow } from '@hiergraph/shared';
import { InvalidKindError, InvalidRowError, SelfReferenceError } from '../errors';

const rawCell = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

// id 셀은 원문 그대로 (공백만 있으면 빈 값)
const idCell = rawCell.transform((value) => (value.trim() === '' ? '' : value));

// type/relationship 셀은 앞뒤 공백 제거
const labelCell = rawCell.transform((value) => value.trim());

// 추가 컬럼은 무시 (strip)
const rawRowSchema = z.object({
  node: idCell,
  parent: idCell,
  type: labelCell,
  relationship: labelCell,
});

/** 단일 레코드 검증 (row는 1부터 시작) */
export function parseRow(record: unknown, row: number): TableRow {
  const parsed = rawRowSchema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidRowError(row, `${where}${issue?.message ?? 'invalid record'}`);
  }

  const { node, parent, type, relationship } = parsed.data;

  if (!node) {
    throw new InvalidRowError(row, 'node is required');
  }
  if (!isNodeKind(type)) {
    throw new InvalidKindError(row, type);
  }
  if (parent && !relationship) {
    throw new InvalidRowError(row, `relationship is required when parent is set (node "${node}")`);
  }
  if (parent === node) {
    throw new SelfReferenceError(row, node);
  }

  return {
    node,
    parent: parent || null,
    kind: type,
    relationship: parent ? relationship : null,
  };
}

/** 레코드 목록 검증 - 첫 오류에서 중단 */
export function parseRows(records: readonly unknown[]): TableRow[] {
  return records.map((record, index) => parseRow(record, index + 1));
}
