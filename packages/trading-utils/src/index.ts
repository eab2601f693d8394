/**
 * Trading Utils
 *
 * 백테스트 엔진과 전략이 공유하는 지표/리스크 계산
 */

export type * from './types.js';

// 이동평균
export {
  calculateSMA,
  calculateEMA,
  nextEMA,
  calculateMA,
  detectCrossover,
  highestHigh,
} from './indicators/ma.js';

// ATR
export { calculateTrueRange, calculateATR, calculateATRPercent } from './atr/calculator.js';

// 리스크
export { calculateRiskBasedPositionSize, DEFAULT_SIZE_DECIMALS } from './risk/position-sizing.js';
export { calculatePnlPct, evaluateExitRules } from './risk/exit-rules.js';
