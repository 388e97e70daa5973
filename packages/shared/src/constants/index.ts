// 노드 종류 상수 - 입력 테이블의 type 컬럼 허용값
export const NODE_KINDS = ['lead', 'member', 'child'] as const;

// 지원 입력 파일 확장자
export const TABLE_FORMATS = ['csv', 'json', 'xlsx'] as const;

// 엣지 키 구분자 (lo|hi|relationship)
export const EDGE_KEY_SEPARATOR = '|';

// 기본 설정값
export const DEFAULTS = {
  SIZE_LEAD: 30,
  SIZE_MEMBER: 25,
  SIZE_CHILD: 20,
} as const;

// Kind별 기본 노드 크기 매핑
export const KIND_SIZES: Record<(typeof NODE_KINDS)[number], number> = {
  lead: DEFAULTS.SIZE_LEAD,
  member: DEFAULTS.SIZE_MEMBER,
  child: DEFAULTS.SIZE_CHILD,
} as const;
