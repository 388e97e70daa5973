/**
 * 공통 에러 베이스
 * code는 호출자가 분기에 사용하는 안정적인 식별자
 */
export class HiergraphError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}
