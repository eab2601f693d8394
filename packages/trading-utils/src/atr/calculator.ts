import Big from 'big.js';
import type { Candle, ATRResult } from '../types.js';

/**
 * 단일 캔들의 True Range 계산
 * TR = max(고가 - 저가, abs(고가 - 이전종가), abs(저가 - 이전종가))
 */
export function calculateTrueRange(current: Candle, previous: Candle): Big {
  const highLow = current.high.minus(current.low).abs();
  const highPrevClose = current.high.minus(previous.close).abs();
  const lowPrevClose = current.low.minus(previous.close).abs();

  // Big.js에 max가 없으므로 수동 비교
  let max = highLow;
  if (highPrevClose.gt(max)) max = highPrevClose;
  if (lowPrevClose.gt(max)) max = lowPrevClose;

  return max;
}

/**
 * ATR (Average True Range) 계산
 *
 * 첫 period개 TR의 단순 평균으로 시작하고 이후는 Wilder 평활.
 * 캔들을 정확히 period + 1개 넘기면 최근 period개 TR의 단순 평균과 같다.
 *
 * @param candles - OHLCV 캔들 배열 (최소 길이: period + 1)
 * @param period - ATR 기간 (기본값: 14)
 * @returns ATR 결과 (값 및 true range 배열)
 */
export function calculateATR(candles: readonly Candle[], period = 14): ATRResult {
  if (candles.length < period + 1) {
    throw new Error(`ATR 계산에 최소 ${period + 1}개의 캔들이 필요합니다. 현재: ${candles.length}개`);
  }

  const trueRanges: Big[] = [];
  let previous: Candle | undefined;
  for (const candle of candles) {
    if (previous) {
      trueRanges.push(calculateTrueRange(candle, previous));
    }
    previous = candle;
  }

  let atr = trueRanges
    .slice(0, period)
    .reduce((sum, tr) => sum.plus(tr), new Big(0))
    .div(period);

  // ATR = ((이전ATR * (기간 - 1)) + 현재TR) / 기간
  for (const tr of trueRanges.slice(period)) {
    atr = atr.times(period - 1).plus(tr).div(period);
  }

  return {
    atr,
    period,
    trueRanges,
  };
}

/**
 * 마지막 종가 대비 ATR 퍼센트 (예: 0.5 = 0.5%)
 *
 * @param candles - OHLCV 캔들 배열
 * @param period - ATR 기간 (기본값: 14)
 */
export function calculateATRPercent(candles: readonly Candle[], period = 14): Big {
  const { atr } = calculateATR(candles, period);
  const last = candles[candles.length - 1];
  if (!last || last.close.lte(0)) {
    return new Big(0);
  }

  return atr.div(last.close).times(100);
}
