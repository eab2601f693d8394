import type Big from 'big.js';
import { calculateMA, detectCrossover } from '@backtester/trading-utils';
import type { Strategy, StrategySignal, Candle, LedgerView } from '../types.js';

/**
 * Simple Moving Average Crossover 전략
 *
 * 골든 크로스 (단기 이평선 상향 돌파) → 매수 (포지션 없을 때)
 * 데드 크로스 (단기 이평선 하향 돌파) → 매도 (포지션 있을 때)
 *
 * 직전 호출의 이평선 값과 비교해 크로스를 판정한다.
 */
export class SimpleMAStrategy implements Strategy {
  name = 'Simple MA Crossover';
  params: {
    shortPeriod: number;
    longPeriod: number;
  };

  private prevShortMA: Big | null = null;
  private prevLongMA: Big | null = null;

  constructor(params?: { shortPeriod?: number; longPeriod?: number }) {
    this.params = {
      shortPeriod: params?.shortPeriod ?? 10,
      longPeriod: params?.longPeriod ?? 30,
    };

    if (this.params.shortPeriod <= 0 || this.params.shortPeriod >= this.params.longPeriod) {
      throw new Error(
        `단기 기간은 0보다 크고 장기 기간보다 작아야 합니다 (단기: ${this.params.shortPeriod}, 장기: ${this.params.longPeriod})`
      );
    }
  }

  generateSignal(candles: readonly Candle[], ledger: LedgerView, symbol: string): StrategySignal {
    // 충분한 캔들이 없으면 HOLD
    if (candles.length < this.params.longPeriod + 5) {
      return { action: 'HOLD' };
    }

    const shortMA = calculateMA(candles, this.params.shortPeriod);
    const longMA = calculateMA(candles, this.params.longPeriod);

    const cross = detectCrossover(this.prevShortMA, this.prevLongMA, shortMA, longMA);
    this.prevShortMA = shortMA;
    this.prevLongMA = longMA;

    const hasPosition = ledger.hasPosition(symbol);

    if (hasPosition && cross === 'BEARISH') {
      return {
        action: 'SELL',
        reason: `데드 크로스 (단기 MA: ${shortMA.toFixed(2)}, 장기 MA: ${longMA.toFixed(2)})`,
      };
    }

    if (!hasPosition && cross === 'BULLISH') {
      return {
        action: 'BUY',
        reason: `골든 크로스 (단기 MA: ${shortMA.toFixed(2)}, 장기 MA: ${longMA.toFixed(2)})`,
      };
    }

    return { action: 'HOLD' };
  }

  reset(): void {
    this.prevShortMA = null;
    this.prevLongMA = null;
  }
}
