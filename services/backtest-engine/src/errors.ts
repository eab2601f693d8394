/**
 * 백테스트 엔진 에러 클래스
 */

export class CandleValidationError extends Error {
  row: number | null;
  field: string | null;

  constructor(message: string, location: { row?: number; field?: string } = {}) {
    const where = [
      location.row !== undefined ? `row ${location.row}` : null,
      location.field !== undefined ? `field '${location.field}'` : null,
    ]
      .filter((part): part is string => part !== null)
      .join(', ');

    super(where ? `[candles] ${message} (${where})` : `[candles] ${message}`);
    this.name = 'CandleValidationError';
    this.row = location.row ?? null;
    this.field = location.field ?? null;
  }
}

export class ConfigValidationError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`[config] 설정 값이 올바르지 않습니다: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
