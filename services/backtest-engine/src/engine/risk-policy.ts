import type Big from 'big.js';
import {
  calculateRiskBasedPositionSize,
  evaluateExitRules,
  nextEMA,
} from '@backtester/trading-utils';
import type { BacktestConfig, ExitTrigger, Position } from '../types.js';

/**
 * 매도 후 재진입 쿨다운
 *
 * 첫 매도 전에는 비활성(null). 매도 시 0, 이후 캔들마다 +1.
 * 카운터가 설정 값보다 작은 동안 매수 차단.
 */
export class CooldownTracker {
  private counter: number | null = null;

  constructor(private readonly length: number) {}

  get candlesSinceLastSell(): number | null {
    return this.counter;
  }

  tick(): void {
    if (this.counter !== null) {
      this.counter += 1;
    }
  }

  markSell(): void {
    this.counter = 0;
  }

  canEnter(): boolean {
    return this.counter === null || this.counter >= this.length;
  }

  reset(): void {
    this.counter = null;
  }
}

/**
 * 종가 EMA 추세 필터
 *
 * 엔진이 직전 캔들의 종가를 넣어 갱신한다 (같은 캔들 참조 방지).
 * 시드 전에는 모든 매수를 막는다.
 */
export class TrendFilter {
  private ema: Big | null = null;

  constructor(private readonly period: number) {
    if (!Number.isInteger(period) || period <= 0) {
      throw new Error(`추세 EMA 기간은 양의 정수여야 합니다: ${period}`);
    }
  }

  get value(): Big | null {
    return this.ema;
  }

  update(close: Big): Big | null {
    if (close.lte(0)) {
      return this.ema;
    }
    this.ema = nextEMA(this.ema, close, this.period);
    return this.ema;
  }

  allows(price: Big): boolean {
    return this.ema !== null && price.gt(this.ema);
  }

  reset(): void {
    this.ema = null;
  }
}

export type EntryBlock = 'COOLDOWN' | 'TREND_FILTER';

/**
 * 실행 1회 동안의 리스크/필터 상태
 */
export class RiskPolicy {
  readonly cooldown: CooldownTracker;
  readonly trend: TrendFilter;

  constructor(private readonly config: BacktestConfig) {
    this.cooldown = new CooldownTracker(config.cooldownCandles);
    this.trend = new TrendFilter(config.trendEmaPeriod);
  }

  positionSize(cash: Big, price: Big): Big {
    return calculateRiskBasedPositionSize({
      cash,
      price,
      riskPct: this.config.riskPerTradePct,
      stopLossPct: this.config.stopLossPct,
    }).size;
  }

  checkExit(position: Position | null, price: Big): ExitTrigger | null {
    if (!position) {
      return null;
    }
    return evaluateExitRules({
      entry: position.entryPrice,
      price,
      stopLossPct: this.config.stopLossPct,
      takeProfitPct: this.config.takeProfitPct,
    });
  }

  /**
   * 매수를 막는 필터 (없으면 null)
   */
  entryBlock(price: Big): EntryBlock | null {
    if (!this.cooldown.canEnter()) {
      return 'COOLDOWN';
    }
    if (!this.trend.allows(price)) {
      return 'TREND_FILTER';
    }
    return null;
  }

  reset(): void {
    this.cooldown.reset();
    this.trend.reset();
  }
}
