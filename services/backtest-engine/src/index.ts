/**
 * Backtest Engine
 *
 * 단일 자산 롱 전용 백테스팅 하네스
 * - 페이퍼 원장 (현금 + 최대 1개 포지션)
 * - 리스크 정책 (포지션 사이징, 손절/익절, 쿨다운, 추세 EMA 필터)
 * - 성과 지표 (수익률, Max DD, Win Rate, Profit Factor)
 */

// 타입
export type * from './types.js';
export { CandleValidationError, ConfigValidationError } from './errors.js';

// 설정
export {
  BacktestSettingsSchema,
  parseBacktestSettings,
  loadBacktestSettings,
  toBacktestConfig,
  createBacktestConfig,
} from './config.js';
export type { BacktestSettings, BacktestSettingsInput } from './config.js';

// 데이터 로더
export { loadCandlesFromCsv, parseCandlesCsv, RECOMMENDED_MIN_CANDLES } from './data/loader.js';
export { CandleRowSchema, REQUIRED_COLUMNS, parseCandleRow, validateCandleSequence } from './data/validation.js';

// 백테스트 엔진
export { runBacktest } from './engine/backtest.js';
export type { BacktestOptions } from './engine/backtest.js';
export { PaperLedger } from './engine/paper-ledger.js';
export { RiskPolicy, CooldownTracker, TrendFilter } from './engine/risk-policy.js';
export type { EntryBlock } from './engine/risk-policy.js';
export { normalizeSignal } from './engine/signal.js';

// 성과 지표
export {
  calculateMetrics,
  calculateEndingBalance,
  calculateTotalReturn,
  calculateMaxDrawdown,
  calculateWinRate,
  calculateProfitFactor,
  calculateAvgWinLoss,
  calculateAvgTradeDuration,
  calculateDrawdowns,
} from './metrics/calculator.js';

// 리포트 / 로그 파일
export { generateBacktestReport, formatMetrics, formatTradeLine } from './reports/reporter.js';
export {
  CsvTradeLog,
  CsvEquityLog,
  combineRecorders,
  formatTradeRow,
  formatEquityRow,
  TRADE_LOG_HEADER,
  EQUITY_LOG_HEADER,
} from './storage/csv-log.js';

// 전략
export {
  createStrategy,
  isStrategyName,
  STRATEGY_NAMES,
  SimpleMAStrategy,
  EmaCrossStrategy,
  BreakoutMAStrategy,
  BuyAndHoldStrategy,
} from './strategies/index.js';
export type { StrategyName, StrategyParams } from './strategies/index.js';
