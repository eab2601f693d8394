import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { calculateATR, calculateATRPercent, calculateTrueRange } from '../../atr/calculator.js';
import type { Candle } from '../../types.js';

function createCandle(high: number, low: number, close: number): Candle {
  return {
    timestamp: 1704067200000,
    open: new Big(close),
    high: new Big(high),
    low: new Big(low),
    close: new Big(close),
    volume: new Big(1000),
  };
}

const candles: Candle[] = [
  createCandle(10, 8, 9),
  createCandle(11, 9, 10), // TR = max(2, 2, 0) = 2
  createCandle(12, 9, 11), // TR = max(3, 2, 1) = 3
  createCandle(13, 12, 12.5), // TR = max(1, 2, 1) = 2
];

describe('calculateTrueRange', () => {
  it('이전 종가와의 갭을 반영해야 함', () => {
    const prev = createCandle(10, 8, 9);
    const gapUp = createCandle(15, 14, 14.5);
    // max(1, |15 - 9| = 6, |14 - 9| = 5) = 6
    expect(calculateTrueRange(gapUp, prev).toString()).toBe('6');
  });
});

describe('calculateATR', () => {
  it('period + 1개 캔들이면 TR 단순 평균', () => {
    const result = calculateATR(candles.slice(0, 3), 2);

    // (2 + 3) / 2 = 2.5
    expect(result.atr.toString()).toBe('2.5');
    expect(result.trueRanges.map((tr) => tr.toString())).toEqual(['2', '3']);
  });

  it('이후 캔들은 Wilder 평활', () => {
    const result = calculateATR(candles, 2);

    // (2.5 * 1 + 2) / 2 = 2.25
    expect(result.atr.toString()).toBe('2.25');
  });

  it('캔들이 부족하면 에러를 던져야 함', () => {
    expect(() => calculateATR(candles.slice(0, 2), 2)).toThrow('ATR 계산에 최소 3개');
  });
});

describe('calculateATRPercent', () => {
  it('마지막 종가 대비 퍼센트', () => {
    // 2.5 / 11 * 100 ≈ 22.7273
    expect(calculateATRPercent(candles.slice(0, 3), 2).toFixed(4)).toBe('22.7273');
  });
});
