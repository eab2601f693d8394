import type Big from 'big.js';
import { calculateATRPercent, calculateMA, detectCrossover } from '@backtester/trading-utils';
import type { Strategy, StrategySignal, Candle, LedgerView } from '../types.js';

/**
 * EMA Crossover + 변동성 필터 전략
 *
 * - 매수: 단기 EMA가 장기 EMA를 상향 돌파하고 ATR/가격이 기준 이상일 때
 * - 매도: 단기 EMA가 장기 EMA를 하향 돌파할 때
 */
export class EmaCrossStrategy implements Strategy {
  name = 'EMA Crossover';
  params: {
    fastPeriod: number;
    slowPeriod: number;
    atrPeriod: number;
    atrThresholdPct: number; // ATR / 가격 (%) 최소값
  };

  private prevFastEMA: Big | null = null;
  private prevSlowEMA: Big | null = null;

  constructor(params?: {
    fastPeriod?: number;
    slowPeriod?: number;
    atrPeriod?: number;
    atrThresholdPct?: number;
  }) {
    this.params = {
      fastPeriod: params?.fastPeriod ?? 20,
      slowPeriod: params?.slowPeriod ?? 50,
      atrPeriod: params?.atrPeriod ?? 14,
      atrThresholdPct: params?.atrThresholdPct ?? 0.3,
    };

    if (this.params.fastPeriod <= 0 || this.params.fastPeriod >= this.params.slowPeriod) {
      throw new Error(
        `단기 EMA 기간은 0보다 크고 장기 기간보다 작아야 합니다 (단기: ${this.params.fastPeriod}, 장기: ${this.params.slowPeriod})`
      );
    }
  }

  generateSignal(candles: readonly Candle[], ledger: LedgerView, symbol: string): StrategySignal {
    const { fastPeriod, slowPeriod, atrPeriod, atrThresholdPct } = this.params;

    if (candles.length < Math.max(slowPeriod, atrPeriod) + 10) {
      return { action: 'HOLD' };
    }

    const fastEMA = calculateMA(candles, fastPeriod, 'EMA');
    const slowEMA = calculateMA(candles, slowPeriod, 'EMA');

    const cross = detectCrossover(this.prevFastEMA, this.prevSlowEMA, fastEMA, slowEMA);
    this.prevFastEMA = fastEMA;
    this.prevSlowEMA = slowEMA;

    const hasPosition = ledger.hasPosition(symbol);

    if (hasPosition && cross === 'BEARISH') {
      return { action: 'SELL', reason: `EMA 데드 크로스 (${fastEMA.toFixed(2)} < ${slowEMA.toFixed(2)})` };
    }

    if (!hasPosition && cross === 'BULLISH') {
      // 최근 atrPeriod개 TR의 평균
      const atrPct = calculateATRPercent(candles.slice(-(atrPeriod + 1)), atrPeriod);
      if (atrPct.gte(atrThresholdPct)) {
        return {
          action: 'BUY',
          reason: `EMA 골든 크로스 (${fastEMA.toFixed(2)} > ${slowEMA.toFixed(2)}, ATR ${atrPct.toFixed(2)}%)`,
        };
      }
    }

    return { action: 'HOLD' };
  }

  reset(): void {
    this.prevFastEMA = null;
    this.prevSlowEMA = null;
  }
}
