import { calculateMA, highestHigh } from '@backtester/trading-utils';
import type { Strategy, StrategySignal, Candle, LedgerView } from '../types.js';

/**
 * 고점 돌파 + 이동평균 필터 전략
 *
 * - 매수: 종가가 직전 lookback개 캔들의 최고가와 이동평균을 모두 넘을 때
 * - 매도: 종가가 이동평균 아래로 내려갈 때
 */
export class BreakoutMAStrategy implements Strategy {
  name = 'Breakout MA';
  params: {
    lookback: number;
    maPeriod: number;
  };

  constructor(params?: { lookback?: number; maPeriod?: number }) {
    this.params = {
      lookback: params?.lookback ?? 20,
      maPeriod: params?.maPeriod ?? 50,
    };
  }

  generateSignal(candles: readonly Candle[], ledger: LedgerView, symbol: string): StrategySignal {
    const { lookback, maPeriod } = this.params;
    const last = candles[candles.length - 1];

    if (!last || candles.length < Math.max(lookback, maPeriod) + 5) {
      return { action: 'HOLD' };
    }

    const price = last.close;
    const ma = calculateMA(candles, maPeriod);
    // 현재 캔들 제외
    const highest = highestHigh(candles.slice(-lookback - 1, -1));

    const hasPosition = ledger.hasPosition(symbol);

    if (hasPosition && price.lt(ma)) {
      return { action: 'SELL', reason: `MA 이탈 (${price.toFixed(2)} < ${ma.toFixed(2)})` };
    }

    if (!hasPosition && price.gt(highest) && price.gt(ma)) {
      return { action: 'BUY', reason: `고점 돌파 (${price.toFixed(2)} > ${highest.toFixed(2)})` };
    }

    return { action: 'HOLD' };
  }
}
