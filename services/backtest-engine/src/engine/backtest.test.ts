import { describe, it, expect, vi } from 'vitest';
import Big from 'big.js';
import { runBacktest } from './backtest.js';
import { CandleValidationError } from '../errors.js';
import type { BacktestConfig, BacktestRecorder, Candle, LedgerView, Strategy, StrategyOutput } from '../types.js';

const SYMBOL = 'SOL-USD';
const START = 1_704_067_200_000; // 2024-01-01 00:00 UTC
const FIVE_MINUTES = 300_000;

function createCandle(close: number, index: number): Candle {
  return {
    timestamp: START + index * FIVE_MINUTES,
    open: new Big(close),
    high: new Big(close),
    low: new Big(close),
    close: new Big(close),
    volume: new Big(100),
  };
}

function series(closes: number[]): Candle[] {
  return closes.map((close, i) => createCandle(close, i));
}

/**
 * 캔들 인덱스별로 정해진 시그널을 내는 테스트 전략
 */
class ScriptedStrategy implements Strategy {
  name = 'Scripted';
  params: Record<string, unknown> = {};
  readonly calls: { index: number; lastTimestamp: number | undefined; cash: string }[] = [];

  constructor(private readonly script: Record<number, StrategyOutput>) {}

  generateSignal(history: readonly Candle[], ledger: LedgerView): StrategyOutput {
    const index = history.length - 1;
    this.calls.push({
      index,
      lastTimestamp: history[index]?.timestamp,
      cash: ledger.cash.toString(),
    });
    return this.script[index];
  }
}

interface MomentumStep {
  index: number;
  closes: string;
  action: 'BUY' | 'SELL' | 'HOLD';
}

/**
 * 지금까지의 히스토리 전체로 시그널을 정하고 스텝마다 기록하는 테스트 전략
 * (직전 대비 상승 + 평균 이상이면 BUY, 하락이면 SELL)
 */
class MomentumRecorder implements Strategy {
  name = 'MomentumRecorder';
  params: Record<string, unknown> = {};
  readonly steps: MomentumStep[] = [];

  generateSignal(history: readonly Candle[]): StrategyOutput {
    const last = history[history.length - 1];
    const previous = history[history.length - 2];
    let action: MomentumStep['action'] = 'HOLD';
    if (last && previous) {
      const average = history.reduce((sum, c) => sum.plus(c.close), new Big(0)).div(history.length);
      if (last.close.gt(previous.close) && last.close.gte(average)) action = 'BUY';
      else if (last.close.lt(previous.close)) action = 'SELL';
    }
    this.steps.push({
      index: history.length - 1,
      closes: history.map((c) => c.close.toString()).join('|'),
      action,
    });
    return action;
  }
}

const baseConfig: BacktestConfig = {
  symbol: SYMBOL,
  initialCapital: new Big(1000),
  riskPerTradePct: 1,
  stopLossPct: -5,
  takeProfitPct: 50,
  cooldownCandles: 0,
  trendEmaPeriod: 3,
  minCandlesBeforeTrading: 0,
};

describe('runBacktest', () => {
  const closes = [90, 95, 100, 105, 110];

  it('매수 2 @ 100 → 매도 @ 110: 현금 1020, 손익 20', () => {
    const strategy = new ScriptedStrategy({ 2: 'buy', 4: 'sell' });

    const result = runBacktest(strategy, series(closes), baseConfig);

    expect(result.trades).toHaveLength(2);
    const [buy, sell] = result.trades;
    expect(buy?.action).toBe('BUY');
    expect(buy?.price.toString()).toBe('100');
    expect(buy?.size.toString()).toBe('2');
    expect(buy?.realizedPnL.toString()).toBe('0');
    expect(buy?.equityAfter.toString()).toBe('1000');
    expect(buy?.trigger).toBe('STRATEGY');

    // 매수 다음 캔들에서 전략이 본 현금
    expect(strategy.calls[3]?.cash).toBe('800');

    expect(sell?.action).toBe('SELL');
    expect(sell?.realizedPnL.toString()).toBe('20');
    expect(sell?.equityAfter.toString()).toBe('1020');

    expect(result.finalCash.toString()).toBe('1020');
    expect(result.openPosition).toBeNull();
    expect(result.equity.map((p) => p.equity.toString())).toEqual(['1000', '1000', '1000', '1010', '1020']);
    expect(result.metrics.pnl.toString()).toBe('20');
    expect(result.metrics.winRate).toBe(100);
    expect(result.metrics.buyTrades).toBe(1);
    expect(result.metrics.sellTrades).toBe(1);
  });

  it('거래 기록은 변경 불가', () => {
    const result = runBacktest(new ScriptedStrategy({ 2: 'BUY' }), series(closes), baseConfig);

    expect(Object.isFrozen(result.trades[0])).toBe(true);
    expect(Object.isFrozen(result.equity[0])).toBe(true);
  });

  it('전략은 현재 캔들까지만 본다', () => {
    const strategy = new ScriptedStrategy({});
    const candles = series(closes);

    runBacktest(strategy, candles, baseConfig);

    expect(strategy.calls.map((c) => c.index)).toEqual([0, 1, 2, 3, 4]);
    expect(strategy.calls.map((c) => c.lastTimestamp)).toEqual(candles.map((c) => c.timestamp));
  });

  it('이후 캔들을 바꿔도 그 이전 스텝의 시그널과 체결은 같음', () => {
    const cut = 3;
    const original = series([90, 95, 100, 105, 110, 104, 98, 120]);
    // cut 이후 종가를 뒤섞고 망가뜨린 사본 (타임스탬프는 그대로)
    const altered = original.map((candle, i) =>
      i <= cut ? candle : createCandle([1, 500, 60, 3000][i - cut - 1] ?? 1, i)
    );

    const first = new MomentumRecorder();
    const second = new MomentumRecorder();
    const a = runBacktest(first, original, baseConfig);
    const b = runBacktest(second, altered, baseConfig);

    const upToCut = (steps: MomentumStep[]) => steps.filter((step) => step.index <= cut);
    expect(upToCut(first.steps)).toHaveLength(cut + 1);
    expect(upToCut(second.steps)).toEqual(upToCut(first.steps));

    const cutTime = START + cut * FIVE_MINUTES;
    const tradesUpToCut = (trades: typeof a.trades) =>
      trades.filter((t) => t.timestamp <= cutTime).map((t) => `${t.action}@${t.price.toString()}`);
    expect(tradesUpToCut(a.trades)).toEqual(['BUY@95']);
    expect(tradesUpToCut(b.trades)).toEqual(tradesUpToCut(a.trades));

    const equityUpToCut = (points: typeof a.equity) => points.slice(0, cut + 1).map((p) => p.equity.toString());
    expect(equityUpToCut(b.equity)).toEqual(equityUpToCut(a.equity));
  });

  it('전략이 받는 히스토리는 스텝마다 동결된 사본', () => {
    const seen: (readonly Candle[])[] = [];
    const strategy: Strategy = {
      name: 'Mutating',
      params: {},
      generateSignal(history) {
        seen.push(history);
        // 동결 배열에 push 하면 TypeError → HOLD 처리
        Reflect.apply(Array.prototype.push, history, [createCandle(1, 99)]);
        return 'BUY';
      },
    };
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = runBacktest(strategy, series(closes), baseConfig);
    vi.restoreAllMocks();

    expect(seen.map((h) => h.length)).toEqual([1, 2, 3, 4, 5]);
    expect(seen.every((h) => Object.isFrozen(h))).toBe(true);
    expect(seen[0]).not.toBe(seen[1]);
    expect(result.trades).toHaveLength(0);
    expect(result.equity).toHaveLength(5);
  });

  it('워밍업 동안은 전략을 호출하지 않지만 자본은 기록', () => {
    const strategy = new ScriptedStrategy({});

    const result = runBacktest(strategy, series(closes), { ...baseConfig, minCandlesBeforeTrading: 3 });

    expect(strategy.calls.map((c) => c.index)).toEqual([3, 4]);
    expect(result.equity).toHaveLength(5);
  });

  it('손절은 전략보다 먼저 실행되고 그 캔들에서는 전략을 부르지 않음', () => {
    const strategy = new ScriptedStrategy({ 2: 'BUY', 3: 'SELL' });

    // 100 → 94: -6% <= -5%
    const result = runBacktest(strategy, series([90, 95, 100, 94, 94]), baseConfig);

    expect(result.trades).toHaveLength(2);
    expect(result.trades[1]?.trigger).toBe('STOP_LOSS');
    expect(result.trades[1]?.realizedPnL.toString()).toBe('-12');
    expect(result.finalCash.toString()).toBe('988');
    expect(strategy.calls.map((c) => c.index)).toEqual([0, 1, 2, 4]);
  });

  it('익절 기준 도달 시 TAKE_PROFIT', () => {
    const strategy = new ScriptedStrategy({ 2: 'BUY' });

    const result = runBacktest(strategy, series(closes), { ...baseConfig, takeProfitPct: 5 });

    // 105: +5% >= 5%
    expect(result.trades[1]?.trigger).toBe('TAKE_PROFIT');
    expect(result.trades[1]?.timestamp).toBe(START + 3 * FIVE_MINUTES);
  });

  it('포지션 보유 중 추가 매수는 무시', () => {
    const result = runBacktest(new ScriptedStrategy({ 2: 'BUY', 3: 'BUY' }), series(closes), baseConfig);

    expect(result.trades).toHaveLength(1);
  });

  it('포지션이 없으면 SELL 무시', () => {
    const result = runBacktest(new ScriptedStrategy({ 1: 'SELL' }), series(closes), baseConfig);

    expect(result.trades).toHaveLength(0);
  });

  it('매도 후 쿨다운 동안 재진입 차단', () => {
    const strategy = new ScriptedStrategy({ 2: 'BUY', 3: 'SELL', 4: 'BUY', 5: 'BUY', 6: 'BUY' });
    const candles = series([90, 95, 100, 105, 110, 115, 120]);

    const result = runBacktest(strategy, candles, { ...baseConfig, cooldownCandles: 2 });

    expect(result.trades.map((t) => t.action)).toEqual(['BUY', 'SELL', 'BUY']);
    expect(result.trades[2]?.timestamp).toBe(candles[5]?.timestamp);
  });

  it('쿨다운 0이면 다음 캔들에서 바로 재진입', () => {
    const strategy = new ScriptedStrategy({ 2: 'BUY', 3: 'SELL', 4: 'BUY' });
    const candles = series([90, 95, 100, 105, 110]);

    const result = runBacktest(strategy, candles, baseConfig);

    expect(result.trades[2]?.timestamp).toBe(candles[4]?.timestamp);
  });

  it('하락 추세에서는 추세 필터가 매수를 막음', () => {
    const strategy = new ScriptedStrategy({ 0: 'BUY', 1: 'BUY', 2: 'BUY', 3: 'BUY' });

    const result = runBacktest(strategy, series([110, 105, 100, 95]), baseConfig);

    expect(result.trades).toHaveLength(0);
  });

  it('열린 포지션은 청산하지 않고 평가금액으로 보고', () => {
    const result = runBacktest(new ScriptedStrategy({ 2: 'BUY' }), series(closes), baseConfig);

    expect(result.openPosition?.size.toString()).toBe('2');
    expect(result.finalCash.toString()).toBe('800');
    expect(result.finalCapital.toString()).toBe('1020');
  });

  it('전략 예외는 HOLD로 처리하고 계속 진행', () => {
    const strategy: Strategy = {
      name: 'Broken',
      params: {},
      generateSignal: () => {
        throw new Error('indicator failure');
      },
    };

    const result = runBacktest(strategy, series(closes), baseConfig);

    expect(result.trades).toHaveLength(0);
    expect(result.equity).toHaveLength(5);
  });

  it('종가가 0 이하인 캔들은 건너뛰고 자본도 기록하지 않음', () => {
    const candles = series([90, 95, 100, 105]);
    const zero = createCandle(0, 4);
    candles.push(zero, createCandle(110, 5));

    const result = runBacktest(new ScriptedStrategy({}), candles, baseConfig);

    expect(result.equity).toHaveLength(5);
    expect(result.equity.map((p) => p.timestamp)).not.toContain(zero.timestamp);
  });

  it('빈 캔들이나 순서가 잘못된 캔들은 실패', () => {
    const strategy = new ScriptedStrategy({});

    expect(() => runBacktest(strategy, [], baseConfig)).toThrow(CandleValidationError);

    const unordered = [createCandle(100, 1), createCandle(100, 0)];
    expect(() => runBacktest(strategy, unordered, baseConfig)).toThrow('(row 1, field \'timestamp\')');
  });

  it('기록 훅에 시작/자본/거래 이벤트 전달', () => {
    const recorder = {
      onStart: vi.fn(),
      onEquity: vi.fn(),
      onTrade: vi.fn(),
    } satisfies BacktestRecorder;

    runBacktest(new ScriptedStrategy({ 2: 'BUY', 4: 'SELL' }), series(closes), baseConfig, { recorder });

    expect(recorder.onStart).toHaveBeenCalledWith(
      expect.objectContaining({ strategy: 'Scripted', symbol: SYMBOL, candleCount: 5 })
    );
    expect(recorder.onEquity).toHaveBeenCalledTimes(5);
    expect(recorder.onTrade).toHaveBeenCalledTimes(2);
  });

  it('기록 훅이 실패해도 결과는 같음', () => {
    const recorder: BacktestRecorder = {
      onEquity: () => {
        throw new Error('disk full');
      },
      onTrade: () => {
        throw new Error('disk full');
      },
    };

    const result = runBacktest(new ScriptedStrategy({ 2: 'BUY', 4: 'SELL' }), series(closes), baseConfig, {
      recorder,
    });

    expect(result.trades).toHaveLength(2);
    expect(result.finalCash.toString()).toBe('1020');
  });

  it('실행 시작 시 전략 reset 호출, 같은 입력이면 같은 결과', () => {
    const strategy = new ScriptedStrategy({ 2: 'BUY', 4: 'SELL' });
    const reset = vi.fn();
    const withReset: Strategy = {
      name: strategy.name,
      params: strategy.params,
      generateSignal: (history, ledger) => strategy.generateSignal(history, ledger),
      reset,
    };
    const candles = series(closes);

    const first = runBacktest(withReset, candles, baseConfig);
    const second = runBacktest(withReset, candles, baseConfig);

    expect(reset).toHaveBeenCalledTimes(2);
    expect(second.trades.map((t) => t.realizedPnL.toString())).toEqual(
      first.trades.map((t) => t.realizedPnL.toString())
    );
    expect(second.finalCash.toString()).toBe(first.finalCash.toString());
  });
});
