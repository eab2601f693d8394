import type { Strategy, StrategySignal, Candle, LedgerView } from '../types.js';

/**
 * Buy & Hold: 포지션을 한 번 잡을 때까지 매수, 이후 매도하지 않음
 */
export class BuyAndHoldStrategy implements Strategy {
  name = 'Buy and Hold';
  params: Record<string, unknown> = {};

  private entered = false;

  generateSignal(_candles: readonly Candle[], ledger: LedgerView, symbol: string): StrategySignal {
    if (ledger.hasPosition(symbol)) {
      this.entered = true;
      return { action: 'HOLD' };
    }

    return this.entered ? { action: 'HOLD' } : { action: 'BUY', reason: '최초 진입' };
  }

  reset(): void {
    this.entered = false;
  }
}
