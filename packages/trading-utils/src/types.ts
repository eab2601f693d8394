import type Big from 'big.js';

// =============================================================================
// Candle Data
// =============================================================================

/**
 * OHLCV candle (timestamp = epoch milliseconds)
 */
export interface Candle {
  readonly timestamp: number;
  readonly open: Big;
  readonly high: Big;
  readonly low: Big;
  readonly close: Big;
  readonly volume: Big;
}

// =============================================================================
// Indicators
// =============================================================================

/**
 * Moving Average types
 */
export type MAType = 'SMA' | 'EMA';

/**
 * Direction of a fast/slow moving average crossover
 */
export type CrossDirection = 'BULLISH' | 'BEARISH';

/**
 * ATR calculation result
 */
export interface ATRResult {
  atr: Big;
  period: number;
  trueRanges: Big[];
}

// =============================================================================
// Risk Management
// =============================================================================

/**
 * Risk-based position sizing parameters
 */
export interface RiskSizingParams {
  cash: Big;
  price: Big;
  riskPct: number;      // 1 = 계좌의 1%
  stopLossPct: number;  // 부호 무시 (-2 와 2 동일)
  sizeDecimals?: number; // 기본 8
}

/**
 * Risk-based position sizing result
 */
export interface RiskSizingResult {
  size: Big;            // 매수 수량
  riskAmount: Big;      // 손절 시 손실 금액 상한
  stopDistance: Big;    // 가격 기준 손절 거리
  maxAffordable: Big;   // 현금으로 살 수 있는 최대 수량
  limitedByCash: boolean;
}

/**
 * Risk exit reasons
 */
export type ExitTrigger = 'STOP_LOSS' | 'TAKE_PROFIT';

export interface ExitRuleParams {
  entry: Big;
  price: Big;
  stopLossPct: number;   // 음수 (예: -2)
  takeProfitPct: number; // 양수 (예: 4)
}
