/**
 * 엔진 에러 분류
 * LoadError 계열은 그래프 구성 실패, 나머지는 질의 거부
 */
import { HiergraphError } from '@hiergraph/shared';

/** 입력 데이터 오류 - 그래프 구성 자체가 실패 */
export class LoadError extends HiergraphError {
  constructor(message: string, code = 'LOAD_ERROR') {
    super(code, message);
  }
}

export class InvalidRowError extends LoadError {
  readonly row: number;

  constructor(row: number, message: string) {
    super(`Row ${row}: ${message}`, 'INVALID_ROW');
    this.row = row;
  }
}

export class InvalidKindError extends LoadError {
  readonly row: number;
  readonly kind: string;

  constructor(row: number, kind: string) {
    super(`Row ${row}: unknown node type "${kind}"`, 'INVALID_KIND');
    this.row = row;
    this.kind = kind;
  }
}

export class SelfReferenceError extends LoadError {
  readonly nodeId: string;

  constructor(row: number, nodeId: string) {
    super(`Row ${row}: node "${nodeId}" lists itself as parent`, 'SELF_REFERENCE');
    this.nodeId = nodeId;
  }
}

export class DuplicateNodeError extends LoadError {
  readonly nodeId: string;

  constructor(nodeId: string, existingKind: string, kind: string) {
    super(
      `Node "${nodeId}" declared as "${existingKind}" and again as "${kind}"`,
      'DUPLICATE_NODE',
    );
    this.nodeId = nodeId;
  }
}

export class MissingParentError extends LoadError {
  readonly nodeId: string;
  readonly parentId: string;

  constructor(nodeId: string, parentId: string) {
    super(`Parent "${parentId}" of node "${nodeId}" is never declared`, 'MISSING_PARENT');
    this.nodeId = nodeId;
    this.parentId = parentId;
  }
}

export class UnsupportedFormatError extends LoadError {
  constructor(filePath: string) {
    super(`Unsupported table format: ${filePath}`, 'UNSUPPORTED_FORMAT');
  }
}

/** 질의가 존재하지 않는 노드를 참조 */
export class UnknownNodeError extends HiergraphError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super('UNKNOWN_NODE', `Unknown node: ${nodeId}`);
    this.nodeId = nodeId;
  }
}

/** 질의 옵션 조합 오류 */
export class InvalidQueryError extends HiergraphError {
  constructor(message: string) {
    super('INVALID_QUERY', message);
  }
}
