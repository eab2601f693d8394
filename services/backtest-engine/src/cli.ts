import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { createLogger, formatEpochMillis, parseLogLevel, setLogLevel } from '@backtester/shared-utils';
import type { LogLevel } from '@backtester/shared-utils';
import { loadBacktestSettings, toBacktestConfig } from './config.js';
import { loadCandlesFromCsv } from './data/loader.js';
import { runBacktest } from './engine/backtest.js';
import { generateBacktestReport } from './reports/reporter.js';
import { CsvEquityLog, CsvTradeLog, combineRecorders } from './storage/csv-log.js';
import { STRATEGY_NAMES, createStrategy } from './strategies/index.js';
import type { BacktestRecorder } from './types.js';

const logger = createLogger('backtest-cli');
const program = new Command();

interface RunOptions {
  data?: string;
  symbol?: string;
  strategy: string;
  capital?: number;
  risk?: number;
  stopLoss?: number;
  takeProfit?: number;
  cooldown?: number;
  trendEma?: number;
  warmup?: number;
  tradesLog?: string;
  equityLog?: string;
  logs: boolean;
  quiet?: boolean;
  logLevel?: LogLevel;
  fast?: number;
  slow?: number;
  lookback?: number;
  maPeriod?: number;
  atrPeriod?: number;
  atrThreshold?: number;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`숫자가 아닙니다: ${value}`);
  }
  return parsed;
}

function parseLevel(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError(`로그 레벨은 DEBUG, INFO, WARN, ERROR 중 하나여야 합니다: ${value}`);
  }
  return level;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`정수가 아닙니다: ${value}`);
  }
  return parsed;
}

program
  .name('backtest')
  .description('단일 자산 롱 전용 백테스트 CLI')
  .version('1.0.0');

/**
 * 백테스트 실행 명령
 *
 * 지정하지 않은 설정은 BACKTEST_* 환경 변수, 그다음 기본값을 쓴다.
 */
program
  .command('run')
  .description('CSV 캔들로 백테스트 실행')
  .option('-d, --data <file>', '캔들 CSV 파일 (timestamp,open,high,low,close,volume)')
  .option('-s, --symbol <symbol>', '심볼 (예: SOL-USD)')
  .option('--strategy <name>', `전략 (${STRATEGY_NAMES.join(' | ')})`, 'sma-cross')
  .option('--capital <amount>', '초기 자본', parseNumber)
  .option('--risk <pct>', '거래당 리스크 (%)', parseNumber)
  .option('--stop-loss <pct>', '손절 기준 (%, 음수)', parseNumber)
  .option('--take-profit <pct>', '익절 기준 (%)', parseNumber)
  .option('--cooldown <candles>', '매도 후 재진입 대기 캔들 수', parseInteger)
  .option('--trend-ema <period>', '추세 필터 EMA 기간', parseInteger)
  .option('--warmup <candles>', '거래 시작 전 최소 캔들 수', parseInteger)
  .option('--trades-log <file>', '거래 로그 CSV 경로')
  .option('--equity-log <file>', '자본 곡선 CSV 경로')
  .option('--no-logs', 'CSV 로그 파일을 쓰지 않음')
  .option('-q, --quiet', '경고 이상만 로그 출력')
  .option('--log-level <level>', '로그 레벨 (DEBUG | INFO | WARN | ERROR, 기본: LOG_LEVEL)', parseLevel)
  .option('--fast <period>', '단기 이평선 기간 (sma-cross, ema-cross)', parseInteger)
  .option('--slow <period>', '장기 이평선 기간 (sma-cross, ema-cross)', parseInteger)
  .option('--lookback <candles>', '고점 룩백 캔들 수 (breakout-ma)', parseInteger)
  .option('--ma-period <period>', '이동평균 기간 (breakout-ma)', parseInteger)
  .option('--atr-period <period>', 'ATR 기간 (ema-cross)', parseInteger)
  .option('--atr-threshold <pct>', '최소 ATR/가격 % (ema-cross)', parseNumber)
  .action((options: RunOptions) => {
    try {
      if (options.logLevel) {
        setLogLevel(options.logLevel);
      }
      if (options.quiet) {
        setLogLevel('WARN');
      }

      const settings = loadBacktestSettings({
        symbol: options.symbol,
        dataFile: options.data,
        initialBalance: options.capital,
        riskPerTradePct: options.risk,
        stopLossPct: options.stopLoss,
        takeProfitPct: options.takeProfit,
        cooldownCandles: options.cooldown,
        trendEmaPeriod: options.trendEma,
        minCandlesBeforeTrading: options.warmup,
        tradesLogFile: options.tradesLog,
        equityLogFile: options.equityLog,
      });

      const strategy = createStrategy(options.strategy, {
        fastPeriod: options.fast,
        slowPeriod: options.slow,
        lookback: options.lookback,
        maPeriod: options.maPeriod,
        atrPeriod: options.atrPeriod,
        atrThresholdPct: options.atrThreshold,
      });

      logger.info('백테스트 설정', { ...settings, strategy: strategy.name, params: strategy.params });

      const candles = loadCandlesFromCsv(settings.dataFile);

      const recorders: BacktestRecorder[] = options.logs
        ? [new CsvTradeLog(settings.tradesLogFile), new CsvEquityLog(settings.equityLogFile)]
        : [];

      const result = runBacktest(strategy, candles, toBacktestConfig(settings), {
        recorder: combineRecorders(...recorders),
      });

      console.log(generateBacktestReport(result));

      if (options.logs) {
        console.log(`거래 로그: ${settings.tradesLogFile}`);
        console.log(`자본 곡선: ${settings.equityLogFile}`);
      }
    } catch (error) {
      logger.error('백테스트 실패', error);
      console.error(`❌ 백테스트 실패: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

/**
 * 캔들 CSV 검증 명령 (백테스트 없이 로드만)
 */
program
  .command('check-data')
  .description('캔들 CSV 파일 검증')
  .argument('<file>', '캔들 CSV 파일')
  .action((file: string) => {
    try {
      const candles = loadCandlesFromCsv(file);
      const first = candles[0];
      const last = candles[candles.length - 1];

      console.log(`✅ 유효한 캔들 ${candles.length}개`);
      if (first && last) {
        console.log(`   기간: ${formatEpochMillis(first.timestamp)} ~ ${formatEpochMillis(last.timestamp)} (UTC)`);
      }
    } catch (error) {
      logger.error('캔들 검증 실패', error);
      console.error(`❌ 캔들 검증 실패: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    }
  });

// CLI 실행
program.parse();
