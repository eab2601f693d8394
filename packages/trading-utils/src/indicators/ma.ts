import Big from 'big.js';
import type { Candle, CrossDirection, MAType } from '../types.js';

/**
 * 단순 이동평균 (SMA) 계산
 *
 * @param values - 값 배열
 * @param period - 이동평균 기간
 * @returns SMA 값
 */
export function calculateSMA(values: readonly Big[], period: number): Big {
  if (period <= 0) {
    throw new Error(`이동평균 기간은 1 이상이어야 합니다. 현재: ${period}`);
  }
  if (values.length < period) {
    throw new Error(`SMA 계산에 최소 ${period}개의 값이 필요합니다. 현재: ${values.length}개`);
  }

  const slice = values.slice(-period);
  const sum = slice.reduce((acc, val) => acc.plus(val), new Big(0));
  return sum.div(period);
}

/**
 * 지수 이동평균 (EMA) 계산
 *
 * 첫 EMA는 처음 period개 값의 SMA로 시작한다.
 *
 * @param values - 값 배열
 * @param period - 이동평균 기간
 * @returns EMA 값
 */
export function calculateEMA(values: readonly Big[], period: number): Big {
  if (values.length < period) {
    throw new Error(`EMA 계산에 최소 ${period}개의 값이 필요합니다. 현재: ${values.length}개`);
  }

  let ema = calculateSMA(values.slice(0, period), period);
  for (const value of values.slice(period)) {
    ema = nextEMA(ema, value, period);
  }

  return ema;
}

/**
 * EMA 한 단계 갱신
 *
 * previous가 없으면 value 자체로 시드한다.
 * EMA = (현재값 - 이전EMA) * 평활계수 + 이전EMA, 평활계수 = 2 / (period + 1)
 */
export function nextEMA(previous: Big | null, value: Big, period: number): Big {
  if (period <= 0) {
    throw new Error(`EMA 기간은 1 이상이어야 합니다. 현재: ${period}`);
  }
  if (previous === null) {
    return value;
  }

  const multiplier = new Big(2).div(period + 1);
  return value.minus(previous).times(multiplier).plus(previous);
}

/**
 * 이동평균 계산 (SMA, EMA)
 *
 * @param candles - OHLCV 캔들 배열
 * @param period - 이동평균 기간
 * @param type - 이동평균 타입 (기본값: SMA)
 * @returns 종가 기준 이동평균 값
 *
 * @example
 * ```typescript
 * const sma20 = calculateMA(candles, 20, 'SMA');
 * const ema20 = calculateMA(candles, 20, 'EMA');
 * ```
 */
export function calculateMA(candles: readonly Candle[], period: number, type: MAType = 'SMA'): Big {
  const closes = candles.map((c) => c.close);

  switch (type) {
    case 'SMA':
      return calculateSMA(closes, period);
    case 'EMA':
      return calculateEMA(closes, period);
    default:
      throw new Error(`지원하지 않는 이동평균 타입: ${String(type)}`);
  }
}

/**
 * 직전/현재 이동평균 쌍으로 크로스오버 판정
 *
 * 직전 값이 없으면 (첫 계산) 크로스오버로 보지 않는다.
 */
export function detectCrossover(
  prevFast: Big | null,
  prevSlow: Big | null,
  fast: Big,
  slow: Big
): CrossDirection | null {
  if (prevFast === null || prevSlow === null) {
    return null;
  }

  if (prevFast.lte(prevSlow) && fast.gt(slow)) {
    return 'BULLISH';
  }
  if (prevFast.gte(prevSlow) && fast.lt(slow)) {
    return 'BEARISH';
  }
  return null;
}

/**
 * 캔들 구간의 최고가
 */
export function highestHigh(candles: readonly Candle[]): Big {
  const [first, ...rest] = candles;
  if (!first) {
    throw new Error('최고가 계산에 최소 1개의 캔들이 필요합니다');
  }

  return rest.reduce((max, candle) => (candle.high.gt(max) ? candle.high : max), first.high);
}
