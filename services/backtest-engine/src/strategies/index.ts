import type { Strategy } from '../types.js';
import { SimpleMAStrategy } from './simple-ma-crossover.js';
import { EmaCrossStrategy } from './ema-cross-strategy.js';
import { BreakoutMAStrategy } from './breakout-ma-strategy.js';
import { BuyAndHoldStrategy } from './buy-and-hold-strategy.js';

export const STRATEGY_NAMES = ['sma-cross', 'ema-cross', 'breakout-ma', 'buy-and-hold'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

export interface StrategyParams {
  fastPeriod?: number;
  slowPeriod?: number;
  lookback?: number;
  maPeriod?: number;
  atrPeriod?: number;
  atrThresholdPct?: number;
}

export function isStrategyName(name: string): name is StrategyName {
  return STRATEGY_NAMES.some((candidate) => candidate === name);
}

/**
 * 이름으로 전략 생성
 */
export function createStrategy(name: string, params: StrategyParams = {}): Strategy {
  if (!isStrategyName(name)) {
    throw new Error(`알 수 없는 전략: ${name} (사용 가능: ${STRATEGY_NAMES.join(', ')})`);
  }

  switch (name) {
    case 'sma-cross':
      return new SimpleMAStrategy({ shortPeriod: params.fastPeriod, longPeriod: params.slowPeriod });
    case 'ema-cross':
      return new EmaCrossStrategy({
        fastPeriod: params.fastPeriod,
        slowPeriod: params.slowPeriod,
        atrPeriod: params.atrPeriod,
        atrThresholdPct: params.atrThresholdPct,
      });
    case 'breakout-ma':
      return new BreakoutMAStrategy({ lookback: params.lookback, maPeriod: params.maPeriod });
    case 'buy-and-hold':
      return new BuyAndHoldStrategy();
  }
}

export { SimpleMAStrategy, EmaCrossStrategy, BreakoutMAStrategy, BuyAndHoldStrategy };
