import Big from 'big.js';
import { z } from 'zod';
import { CandleValidationError } from '../errors.js';
import type { Candle } from '../types.js';

export const REQUIRED_COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;

const price = z.coerce.number().finite().positive();

/**
 * CSV 한 행 검증 스키마
 */
export const CandleRowSchema = z
  .object({
    timestamp: z.coerce.number().int().positive(),
    open: price,
    high: price,
    low: price,
    close: price,
    volume: z.coerce.number().finite().nonnegative(),
  })
  .superRefine((row, ctx) => {
    if (row.high < row.low) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['high'],
        message: `high (${row.high}) < low (${row.low})`,
      });
      return;
    }
    if (row.high < row.open || row.high < row.close) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['high'],
        message: `high (${row.high})가 최고가가 아닙니다`,
      });
    }
    if (row.low > row.open || row.low > row.close) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['low'],
        message: `low (${row.low})가 최저가가 아닙니다`,
      });
    }
  });

export type CandleRow = z.infer<typeof CandleRowSchema>;

/**
 * 원시 행을 캔들로 변환. 첫 번째 문제에서 CandleValidationError.
 *
 * @param record - 컬럼명 → 문자열 값
 * @param row - 파일 기준 행 번호 (헤더 = 1)
 */
export function parseCandleRow(record: Record<string, string | undefined>, row: number): Candle {
  const parsed = CandleRowSchema.safeParse(record);

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue?.path[0];
    throw new CandleValidationError(issue?.message ?? '알 수 없는 검증 오류', {
      row,
      field: field === undefined ? undefined : String(field),
    });
  }

  const { timestamp, open, high, low, close, volume } = parsed.data;
  return Object.freeze({
    timestamp,
    open: new Big(open),
    high: new Big(high),
    low: new Big(low),
    close: new Big(close),
    volume: new Big(volume),
  });
}

/**
 * 캔들 시퀀스 구조 검증
 *
 * - 비어 있지 않을 것
 * - timestamp는 양의 정수, 엄격한 오름차순
 * - low <= open, close <= high
 *
 * 0 이하 가격은 여기서 막지 않는다 (엔진이 해당 캔들만 건너뜀).
 *
 * @param rowNumbers - 에러 메시지에 쓸 파일 행 번호 (없으면 0부터 시작하는 인덱스)
 */
export function validateCandleSequence(
  candles: readonly Candle[],
  rowNumbers?: readonly number[]
): void {
  if (candles.length === 0) {
    throw new CandleValidationError('캔들 데이터가 없습니다');
  }

  let previous: Candle | undefined;
  for (const [index, candle] of candles.entries()) {
    const row = rowNumbers?.[index] ?? index;

    if (!Number.isInteger(candle.timestamp) || candle.timestamp <= 0) {
      throw new CandleValidationError(`timestamp가 올바르지 않습니다: ${candle.timestamp}`, {
        row,
        field: 'timestamp',
      });
    }
    if (previous && candle.timestamp <= previous.timestamp) {
      throw new CandleValidationError(
        `timestamp가 오름차순이 아닙니다: ${previous.timestamp} → ${candle.timestamp}`,
        { row, field: 'timestamp' }
      );
    }
    if (candle.high.lt(candle.low)) {
      throw new CandleValidationError(
        `high (${candle.high.toString()}) < low (${candle.low.toString()})`,
        { row, field: 'high' }
      );
    }
    if (candle.open.gt(candle.high) || candle.close.gt(candle.high)) {
      throw new CandleValidationError(`high (${candle.high.toString()})가 최고가가 아닙니다`, {
        row,
        field: 'high',
      });
    }
    if (candle.open.lt(candle.low) || candle.close.lt(candle.low)) {
      throw new CandleValidationError(`low (${candle.low.toString()})가 최저가가 아닙니다`, {
        row,
        field: 'low',
      });
    }

    previous = candle;
  }
}
