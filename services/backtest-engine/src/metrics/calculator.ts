import Big from 'big.js';
import { hoursBetween } from '@backtester/shared-utils';
import type { Trade, PerformanceMetrics, EquityPoint, DrawdownPoint } from '../types.js';

/**
 * 성과 지표 계산
 *
 * @param trades - 거래 목록 (매수/매도 각각 1건)
 * @param equity - 자본 곡선
 * @param initialCapital - 초기 자본
 * @param fallbackBalance - 자본 곡선이 비었을 때의 최종 자본 (보통 원장 현금)
 * @returns 성과 지표
 */
export function calculateMetrics(
  trades: readonly Trade[],
  equity: readonly EquityPoint[],
  initialCapital: Big,
  fallbackBalance: Big = initialCapital
): PerformanceMetrics {
  const endingBalance = calculateEndingBalance(equity, fallbackBalance);
  const { winRate, winningTrades, losingTrades, sellTrades } = calculateWinRate(trades);
  const { avgWin, avgLoss } = calculateAvgWinLoss(trades);

  return {
    endingBalance,
    pnl: endingBalance.minus(initialCapital),
    totalReturn: calculateTotalReturn(initialCapital, endingBalance),
    maxDrawdown: calculateMaxDrawdown(equity),
    winRate,
    profitFactor: calculateProfitFactor(trades),
    avgWin,
    avgLoss,
    totalTrades: trades.length,
    buyTrades: trades.length - sellTrades,
    sellTrades,
    winningTrades,
    losingTrades,
    avgTradeDuration: calculateAvgTradeDuration(trades),
  };
}

/**
 * 최종 자본: 자본 곡선의 마지막 값, 없으면 fallback
 */
export function calculateEndingBalance(equity: readonly EquityPoint[], fallback: Big): Big {
  const last = equity[equity.length - 1];
  return last ? last.equity : fallback;
}

/**
 * 총 수익률 계산
 *
 * @returns 수익률 (%)
 */
export function calculateTotalReturn(initialCapital: Big, finalCapital: Big): number {
  if (initialCapital.lte(0)) {
    return 0;
  }

  return finalCapital
    .minus(initialCapital)
    .div(initialCapital)
    .times(100)
    .toNumber();
}

/**
 * 최대 낙폭 (Max Drawdown) 계산
 *
 * @returns 최대 낙폭 (%)
 */
export function calculateMaxDrawdown(equity: readonly EquityPoint[]): number {
  return calculateDrawdowns(equity).reduce((max, point) => Math.max(max, point.drawdown), 0);
}

/**
 * 승률 계산 (매도 거래 기준)
 *
 * @returns 승률(%), 승리/손실/전체 매도 수
 */
export function calculateWinRate(trades: readonly Trade[]): {
  winRate: number;
  winningTrades: number;
  losingTrades: number;
  sellTrades: number;
} {
  const sells = trades.filter((trade) => trade.action === 'SELL');
  if (sells.length === 0) {
    return { winRate: 0, winningTrades: 0, losingTrades: 0, sellTrades: 0 };
  }

  const winningTrades = sells.filter((trade) => trade.realizedPnL.gt(0)).length;
  const losingTrades = sells.filter((trade) => trade.realizedPnL.lt(0)).length;

  return {
    winRate: (winningTrades / sells.length) * 100,
    winningTrades,
    losingTrades,
    sellTrades: sells.length,
  };
}

/**
 * Profit Factor = 총 수익 / 총 손실
 */
export function calculateProfitFactor(trades: readonly Trade[]): number {
  let totalProfit = new Big(0);
  let totalLoss = new Big(0);

  for (const trade of trades) {
    if (trade.realizedPnL.gt(0)) {
      totalProfit = totalProfit.plus(trade.realizedPnL);
    } else if (trade.realizedPnL.lt(0)) {
      totalLoss = totalLoss.plus(trade.realizedPnL.abs());
    }
  }

  if (totalLoss.lte(0)) {
    return totalProfit.gt(0) ? Infinity : 0;
  }

  return totalProfit.div(totalLoss).toNumber();
}

/**
 * 평균 승리/손실 금액 계산
 */
export function calculateAvgWinLoss(trades: readonly Trade[]): {
  avgWin: Big;
  avgLoss: Big;
} {
  let totalWin = new Big(0);
  let totalLoss = new Big(0);
  let winCount = 0;
  let lossCount = 0;

  for (const trade of trades) {
    if (trade.realizedPnL.gt(0)) {
      totalWin = totalWin.plus(trade.realizedPnL);
      winCount++;
    } else if (trade.realizedPnL.lt(0)) {
      totalLoss = totalLoss.plus(trade.realizedPnL.abs());
      lossCount++;
    }
  }

  const avgWin = winCount > 0 ? totalWin.div(winCount) : new Big(0);
  const avgLoss = lossCount > 0 ? totalLoss.div(lossCount) : new Big(0);

  return { avgWin, avgLoss };
}

/**
 * 평균 보유 시간 (시간 단위)
 *
 * 매수와 다음 매도를 한 쌍으로 본다.
 */
export function calculateAvgTradeDuration(trades: readonly Trade[]): number {
  const durations: number[] = [];
  let lastBuyTimestamp: number | null = null;

  for (const trade of trades) {
    if (trade.action === 'BUY') {
      lastBuyTimestamp = trade.timestamp;
    } else if (lastBuyTimestamp !== null) {
      durations.push(hoursBetween(lastBuyTimestamp, trade.timestamp));
      lastBuyTimestamp = null;
    }
  }

  if (durations.length === 0) {
    return 0;
  }

  return durations.reduce((sum, d) => sum + d, 0) / durations.length;
}

/**
 * Drawdown 포인트 계산
 *
 * 자본 곡선을 왼쪽에서 오른쪽으로 한 번 순회하며 고점을 추적한다.
 */
export function calculateDrawdowns(equity: readonly EquityPoint[]): DrawdownPoint[] {
  const [first] = equity;
  if (!first) {
    return [];
  }

  const drawdowns: DrawdownPoint[] = [];
  let peak = first.equity;

  for (const point of equity) {
    if (point.equity.gt(peak)) {
      peak = point.equity;
    }

    const drawdown = peak.gt(0) ? peak.minus(point.equity).div(peak).times(100).toNumber() : 0;

    drawdowns.push({
      timestamp: point.timestamp,
      drawdown,
      peak,
    });
  }

  return drawdowns;
}
