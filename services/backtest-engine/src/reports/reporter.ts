import { formatEpochMillis } from '@backtester/shared-utils';
import type { BacktestResult, PerformanceMetrics, Trade } from '../types.js';

function signed(value: string): string {
  return value.startsWith('-') ? value : `+${value}`;
}

/**
 * 백테스트 결과 리포트 생성
 */
export function generateBacktestReport(result: BacktestResult): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('='.repeat(60));
  lines.push(`백테스트 결과 리포트 - ${result.symbol} - LONG ONLY`);
  lines.push('='.repeat(60));
  lines.push('');

  // 기본 정보
  lines.push('## 기본 정보');
  lines.push(`전략명: ${result.strategy}`);
  lines.push(`심볼: ${result.symbol}`);
  lines.push(`기간: ${formatEpochMillis(result.startTime)} ~ ${formatEpochMillis(result.endTime)}`);
  lines.push(`캔들 수: ${result.candleCount}`);
  lines.push(`초기 자본: ${result.initialCapital.toFixed(2)}`);
  lines.push(`최종 자본: ${result.finalCapital.toFixed(2)}`);
  lines.push(`손익: ${signed(result.metrics.pnl.toFixed(2))}`);
  lines.push(`총 수익률: ${signed(result.totalReturn.toFixed(2))}%`);
  if (result.openPosition) {
    lines.push(
      `미청산 포지션: ${result.openPosition.size.toFixed(6)} @ ${result.openPosition.entryPrice.toFixed(2)}`
    );
  }
  lines.push('');

  // 성과 지표
  lines.push('## 성과 지표');
  lines.push(...formatMetrics(result.metrics));
  lines.push('');

  // 최근 10개 거래
  if (result.trades.length > 0) {
    lines.push('## 최근 거래 내역 (최대 10개)');
    for (const trade of result.trades.slice(-10)) {
      lines.push(formatTradeLine(trade));
    }
    lines.push('');
  }

  lines.push('='.repeat(60));
  lines.push('');

  return lines.join('\n');
}

/**
 * 성과 지표 포맷
 */
export function formatMetrics(metrics: PerformanceMetrics): string[] {
  const profitFactor =
    metrics.profitFactor === Infinity ? '∞' : metrics.profitFactor.toFixed(2);

  return [
    `거래 횟수: ${metrics.totalTrades} (매수 ${metrics.buyTrades} / 매도 ${metrics.sellTrades})`,
    `승률: ${metrics.winRate.toFixed(1)}% (${metrics.winningTrades}승 ${metrics.losingTrades}패)`,
    `최대 낙폭: ${metrics.maxDrawdown.toFixed(2)}%`,
    `Profit Factor: ${profitFactor}`,
    `평균 수익: ${metrics.avgWin.toFixed(2)}`,
    `평균 손실: ${metrics.avgLoss.toFixed(2)}`,
    `평균 보유 시간: ${metrics.avgTradeDuration.toFixed(1)}시간`,
  ];
}

/**
 * 거래 한 줄 요약
 */
export function formatTradeLine(trade: Trade): string {
  const head = `${formatEpochMillis(trade.timestamp)} | ${trade.action.padEnd(4)} | ${trade.symbol} | ${trade.price.toFixed(2)} | ${trade.size.toFixed(6)}`;
  if (trade.action === 'BUY') {
    return head;
  }
  return `${head} | 손익 ${signed(trade.realizedPnL.toFixed(2))} | 잔고 ${trade.equityAfter.toFixed(2)} | ${trade.trigger}`;
}
