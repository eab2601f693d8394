import Big from 'big.js';
import { z } from 'zod';
import { env, envInteger, envNumber } from '@backtester/shared-utils';
import { ConfigValidationError } from './errors.js';
import type { BacktestConfig } from './types.js';

/**
 * 백테스트 설정 스키마 (기본값 포함)
 */
export const BacktestSettingsSchema = z.object({
  symbol: z.string().min(1).default('SOL-USD'),
  dataFile: z.string().min(1).default('data/SOL_5m.csv'),

  // 계좌
  initialBalance: z.number().finite().positive().default(1000),

  // 리스크
  riskPerTradePct: z.number().finite().positive().max(100).default(1.0),
  stopLossPct: z.number().finite().negative().default(-2.0),
  takeProfitPct: z.number().finite().positive().default(4.0),

  // 쿨다운 / 추세 필터 / 워밍업
  cooldownCandles: z.number().int().nonnegative().default(6),
  trendEmaPeriod: z.number().int().positive().default(200),
  minCandlesBeforeTrading: z.number().int().nonnegative().default(60),

  // 출력
  tradesLogFile: z.string().min(1).default('trades.csv'),
  equityLogFile: z.string().min(1).default('equity.csv'),
});

export type BacktestSettings = z.infer<typeof BacktestSettingsSchema>;
export type BacktestSettingsInput = z.input<typeof BacktestSettingsSchema>;

/**
 * 환경 변수 → 설정 키
 */
function settingsFromEnv(): BacktestSettingsInput {
  return {
    symbol: env('BACKTEST_SYMBOL'),
    dataFile: env('BACKTEST_DATA_FILE'),
    initialBalance: envNumber('BACKTEST_INITIAL_BALANCE'),
    riskPerTradePct: envNumber('BACKTEST_RISK_PER_TRADE_PCT'),
    stopLossPct: envNumber('BACKTEST_STOP_LOSS_PCT'),
    takeProfitPct: envNumber('BACKTEST_TAKE_PROFIT_PCT'),
    cooldownCandles: envInteger('BACKTEST_COOLDOWN_CANDLES'),
    trendEmaPeriod: envInteger('BACKTEST_TREND_EMA_PERIOD'),
    minCandlesBeforeTrading: envInteger('BACKTEST_MIN_CANDLES'),
    tradesLogFile: env('BACKTEST_TRADES_LOG'),
    equityLogFile: env('BACKTEST_EQUITY_LOG'),
  };
}

/**
 * 설정 검증. 문제가 있으면 모든 항목을 모아 ConfigValidationError.
 */
export function parseBacktestSettings(input: BacktestSettingsInput = {}): BacktestSettings {
  const parsed = BacktestSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * 기본값 < 환경 변수 < overrides (CLI 옵션) 순으로 병합
 */
export function loadBacktestSettings(overrides: BacktestSettingsInput = {}): BacktestSettings {
  const fromEnv = settingsFromEnv();

  return parseBacktestSettings({
    symbol: overrides.symbol ?? fromEnv.symbol,
    dataFile: overrides.dataFile ?? fromEnv.dataFile,
    initialBalance: overrides.initialBalance ?? fromEnv.initialBalance,
    riskPerTradePct: overrides.riskPerTradePct ?? fromEnv.riskPerTradePct,
    stopLossPct: overrides.stopLossPct ?? fromEnv.stopLossPct,
    takeProfitPct: overrides.takeProfitPct ?? fromEnv.takeProfitPct,
    cooldownCandles: overrides.cooldownCandles ?? fromEnv.cooldownCandles,
    trendEmaPeriod: overrides.trendEmaPeriod ?? fromEnv.trendEmaPeriod,
    minCandlesBeforeTrading: overrides.minCandlesBeforeTrading ?? fromEnv.minCandlesBeforeTrading,
    tradesLogFile: overrides.tradesLogFile ?? fromEnv.tradesLogFile,
    equityLogFile: overrides.equityLogFile ?? fromEnv.equityLogFile,
  });
}

/**
 * 엔진용 설정 값으로 변환
 */
export function toBacktestConfig(settings: BacktestSettings): BacktestConfig {
  return {
    symbol: settings.symbol,
    initialCapital: new Big(settings.initialBalance),
    riskPerTradePct: settings.riskPerTradePct,
    stopLossPct: settings.stopLossPct,
    takeProfitPct: settings.takeProfitPct,
    cooldownCandles: settings.cooldownCandles,
    trendEmaPeriod: settings.trendEmaPeriod,
    minCandlesBeforeTrading: settings.minCandlesBeforeTrading,
  };
}

/**
 * 부분 입력으로 바로 엔진 설정 생성 (환경 변수 미사용)
 */
export function createBacktestConfig(input: BacktestSettingsInput = {}): BacktestConfig {
  return toBacktestConfig(parseBacktestSettings(input));
}
