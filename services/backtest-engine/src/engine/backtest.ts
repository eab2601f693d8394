import Big from 'big.js';
import { createLogger, formatEpochMillis } from '@backtester/shared-utils';
import type {
  Strategy,
  StrategySignal,
  BacktestConfig,
  BacktestRecorder,
  BacktestResult,
  Trade,
  TradeTrigger,
  EquityPoint,
  Candle,
  LedgerView,
} from '../types.js';
import { validateCandleSequence } from '../data/validation.js';
import { calculateMetrics, calculateDrawdowns } from '../metrics/calculator.js';
import { PaperLedger } from './paper-ledger.js';
import { RiskPolicy } from './risk-policy.js';
import { normalizeSignal } from './signal.js';

const logger = createLogger('backtest-engine');

export interface BacktestOptions {
  recorder?: BacktestRecorder;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 백테스트 실행 (롱 전용, 단일 심볼)
 *
 * 캔들마다:
 * 1. 히스토리에 추가 → 2. 종가 0 이하면 건너뜀 → 3. 직전 종가로 추세 EMA 갱신
 * → 4. 자본 기록 → 5. 쿨다운 진행 → 6. 워밍업 중이면 종료
 * → 7. 손절/익절 (걸리면 전략 호출 없이 매도) → 8. 전략 시그널 → 9. 주문
 *
 * 체결가는 캔들 종가. 종료 시 열린 포지션은 청산하지 않고 평가금액으로 남긴다.
 *
 * @param strategy - 전략
 * @param candles - 오름차순 캔들
 * @param config - 백테스트 설정
 * @returns 백테스트 결과
 * @throws CandleValidationError 캔들 시퀀스가 비었거나 순서/OHLC가 잘못된 경우
 */
export function runBacktest(
  strategy: Strategy,
  candles: readonly Candle[],
  config: BacktestConfig,
  options: BacktestOptions = {}
): BacktestResult {
  validateCandleSequence(candles);

  logger.info('백테스트 시작', {
    strategy: strategy.name,
    symbol: config.symbol,
    candles: candles.length,
    initialCapital: config.initialCapital.toFixed(2),
  });

  const run = new BacktestRun(strategy, config, options.recorder ?? {});
  run.start(candles.length);

  let previous: Candle | undefined;
  for (const [index, candle] of candles.entries()) {
    run.step(candle, index, previous);
    previous = candle;
  }

  const result = run.finish(candles);

  logger.info('백테스트 완료', {
    endingBalance: result.finalCapital.toFixed(2),
    totalReturn: `${result.totalReturn.toFixed(2)}%`,
    maxDrawdown: `${result.metrics.maxDrawdown.toFixed(2)}%`,
    totalTrades: result.metrics.totalTrades,
  });

  return result;
}

/**
 * 실행 1회의 상태 (원장, 리스크 정책, 히스토리, 결과)
 */
class BacktestRun {
  private readonly ledger: PaperLedger;
  private readonly ledgerView: LedgerView;
  private readonly policy: RiskPolicy;
  private readonly history: Candle[] = [];
  private readonly trades: Trade[] = [];
  private readonly equity: EquityPoint[] = [];
  private entryPrice: Big | null = null;
  private skippedCandles = 0;

  constructor(
    private readonly strategy: Strategy,
    private readonly config: BacktestConfig,
    private readonly recorder: BacktestRecorder
  ) {
    this.ledger = new PaperLedger(config.initialCapital);
    this.ledgerView = this.ledger.view();
    this.policy = new RiskPolicy(config);
  }

  start(candleCount: number): void {
    if (this.strategy.reset) {
      try {
        this.strategy.reset();
      } catch (error) {
        logger.warn('전략 초기화 실패, 계속 진행', {
          strategy: this.strategy.name,
          error: errorMessage(error),
        });
      }
    }

    this.notify('onStart', () =>
      this.recorder.onStart?.({
        strategy: this.strategy.name,
        symbol: this.config.symbol,
        candleCount,
        initialCapital: this.config.initialCapital,
      })
    );
  }

  step(candle: Candle, index: number, previous: Candle | undefined): void {
    this.history.push(candle);

    const price = candle.close;
    if (price.lte(0)) {
      this.skippedCandles++;
      logger.warn('종가가 0 이하인 캔들 건너뜀', { index, timestamp: candle.timestamp });
      return;
    }

    // 직전 캔들 종가로 갱신 (현재 캔들은 아직 반영하지 않음)
    if (previous) {
      this.policy.trend.update(previous.close);
    }

    const point: EquityPoint = Object.freeze({
      timestamp: candle.timestamp,
      equity: this.ledger.equity(price),
    });
    this.equity.push(point);
    this.notify('onEquity', () => this.recorder.onEquity?.(point));

    this.policy.cooldown.tick();

    if (index < this.config.minCandlesBeforeTrading) {
      return;
    }

    const position = this.ledger.hasPosition(this.config.symbol) ? this.ledger.position() : null;
    const exit = this.policy.checkExit(position, price);
    if (exit) {
      this.executeSell(candle, exit);
      return;
    }

    const signal = this.querySignal(index);
    if (signal.action === 'BUY') {
      this.executeBuy(candle, signal.reason);
    } else if (signal.action === 'SELL') {
      this.executeSell(candle, 'STRATEGY', signal.reason);
    }
  }

  finish(candles: readonly Candle[]): BacktestResult {
    const first = candles[0];
    const last = candles[candles.length - 1];
    const metrics = calculateMetrics(
      this.trades,
      this.equity,
      this.config.initialCapital,
      this.ledger.cash
    );

    if (this.skippedCandles > 0) {
      logger.warn('가격이 유효하지 않아 건너뛴 캔들', { count: this.skippedCandles });
    }

    return {
      strategy: this.strategy.name,
      symbol: this.config.symbol,
      startTime: first?.timestamp ?? 0,
      endTime: last?.timestamp ?? 0,
      candleCount: candles.length,
      initialCapital: this.config.initialCapital,
      finalCapital: metrics.endingBalance,
      finalCash: this.ledger.cash,
      openPosition: this.ledger.position(),
      totalReturn: metrics.totalReturn,
      metrics,
      trades: this.trades,
      equity: this.equity,
      drawdowns: calculateDrawdowns(this.equity),
    };
  }

  /**
   * 전략 호출. 예외는 HOLD로 처리하고 실행은 계속한다.
   *
   * 히스토리는 이번 스텝까지의 동결 사본으로 넘긴다 (전략이 엔진 상태를 바꿀 수 없음).
   */
  private querySignal(index: number): StrategySignal {
    const history: readonly Candle[] = Object.freeze(this.history.slice());
    try {
      return normalizeSignal(this.strategy.generateSignal(history, this.ledgerView, this.config.symbol));
    } catch (error) {
      logger.warn('전략 오류, HOLD로 처리', {
        strategy: this.strategy.name,
        index,
        error: errorMessage(error),
      });
      return { action: 'HOLD' };
    }
  }

  private executeBuy(candle: Candle, reason?: string): void {
    const { symbol } = this.config;
    const price = candle.close;

    if (this.ledger.position() !== null) {
      return;
    }

    const block = this.policy.entryBlock(price);
    if (block) {
      logger.debug('매수 차단', { timestamp: candle.timestamp, block });
      return;
    }

    const size = this.policy.positionSize(this.ledger.cash, price);
    if (size.lte(0)) {
      return;
    }

    if (!this.ledger.buy(symbol, size, price)) {
      logger.debug('원장이 매수를 거절', { timestamp: candle.timestamp, size: size.toString() });
      return;
    }

    this.entryPrice = price;
    const trade = this.record({
      timestamp: candle.timestamp,
      action: 'BUY',
      symbol,
      price,
      size,
      realizedPnL: new Big(0),
      equityAfter: this.ledger.equity(price),
      trigger: 'STRATEGY',
    });

    logger.info('매수 체결', {
      time: formatEpochMillis(trade.timestamp),
      price: price.toFixed(2),
      size: size.toFixed(6),
      reason,
    });
  }

  private executeSell(candle: Candle, trigger: TradeTrigger, reason?: string): void {
    const { symbol } = this.config;
    const price = candle.close;
    const position = this.ledger.position();

    if (!position || !this.ledger.hasPosition(symbol)) {
      return;
    }

    const entry = this.entryPrice ?? position.entryPrice;
    if (!this.ledger.sell(symbol, price)) {
      logger.debug('원장이 매도를 거절', { timestamp: candle.timestamp });
      return;
    }

    const realizedPnL = price.minus(entry).times(position.size);
    this.policy.cooldown.markSell();
    this.entryPrice = null;

    const trade = this.record({
      timestamp: candle.timestamp,
      action: 'SELL',
      symbol,
      price,
      size: position.size,
      realizedPnL,
      equityAfter: this.ledger.equity(price),
      trigger,
    });

    logger.info('매도 체결', {
      time: formatEpochMillis(trade.timestamp),
      price: price.toFixed(2),
      pnl: realizedPnL.toFixed(2),
      balance: trade.equityAfter.toFixed(2),
      trigger,
      reason,
    });
  }

  private record(trade: Trade): Trade {
    const frozen = Object.freeze(trade);
    this.trades.push(frozen);
    this.notify('onTrade', () => this.recorder.onTrade?.(frozen));
    return frozen;
  }

  /**
   * 기록 훅 호출. 실패해도 시뮬레이션은 멈추지 않는다.
   */
  private notify(hook: keyof BacktestRecorder, call: () => void): void {
    try {
      call();
    } catch (error) {
      logger.warn('기록 훅 실패, 계속 진행', { hook, error: errorMessage(error) });
    }
  }
}
