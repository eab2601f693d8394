import { appendFileSync, writeFileSync } from 'node:fs';
import { stringify } from 'csv-stringify/sync';
import { createLogger, formatEpochMillis } from '@backtester/shared-utils';
import type { BacktestRecorder, EquityPoint, Trade } from '../types.js';

const logger = createLogger('backtest-csv-log');

const TRADE_LOG_COLUMNS = ['timestamp', 'action', 'symbol', 'price', 'size', 'pnl', 'balance'];
const EQUITY_LOG_COLUMNS = ['timestamp', 'equity'];

export const TRADE_LOG_HEADER = TRADE_LOG_COLUMNS.join(',');
export const EQUITY_LOG_HEADER = EQUITY_LOG_COLUMNS.join(',');

/** 필드 배열 → 줄바꿈으로 끝나는 CSV 한 줄 (쉼표나 따옴표가 든 값은 인용) */
function toCsvLine(fields: string[]): string {
  return stringify([fields]);
}

/**
 * 거래 로그 한 줄 (금액 소수 2자리, 수량 6자리)
 */
export function formatTradeRow(trade: Trade): string {
  return toCsvLine([
    formatEpochMillis(trade.timestamp),
    trade.action,
    trade.symbol,
    trade.price.toFixed(2),
    trade.size.toFixed(6),
    trade.realizedPnL.toFixed(2),
    trade.equityAfter.toFixed(2),
  ]);
}

export function formatEquityRow(point: EquityPoint): string {
  return toCsvLine([formatEpochMillis(point.timestamp), point.equity.toFixed(2)]);
}

/**
 * 추가 전용 CSV 파일
 *
 * 쓰기 실패는 경고 한 번만 남기고 이후 기록을 중단한다. 실행 결과(메모리)는 영향 없음.
 */
class AppendOnlyCsv {
  private failed = false;

  constructor(
    readonly path: string,
    private readonly columns: string[]
  ) {}

  get disabled(): boolean {
    return this.failed;
  }

  open(): void {
    this.write(() => writeFileSync(this.path, toCsvLine(this.columns)));
  }

  append(line: string): void {
    this.write(() => appendFileSync(this.path, line));
  }

  private write(action: () => void): void {
    if (this.failed) return;
    try {
      action();
    } catch (error) {
      this.failed = true;
      logger.warn('CSV 로그 쓰기 실패, 이후 기록 중단', {
        path: this.path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export class CsvTradeLog implements BacktestRecorder {
  private readonly file: AppendOnlyCsv;

  constructor(path: string) {
    this.file = new AppendOnlyCsv(path, TRADE_LOG_COLUMNS);
  }

  get disabled(): boolean {
    return this.file.disabled;
  }

  onStart(): void {
    this.file.open();
  }

  onTrade(trade: Trade): void {
    this.file.append(formatTradeRow(trade));
  }
}

export class CsvEquityLog implements BacktestRecorder {
  private readonly file: AppendOnlyCsv;

  constructor(path: string) {
    this.file = new AppendOnlyCsv(path, EQUITY_LOG_COLUMNS);
  }

  get disabled(): boolean {
    return this.file.disabled;
  }

  onStart(): void {
    this.file.open();
  }

  onEquity(point: EquityPoint): void {
    this.file.append(formatEquityRow(point));
  }
}

/**
 * 여러 기록 훅을 하나로 묶는다 (등록 순서대로 호출)
 *
 * 한 훅이 실패해도 나머지 훅은 호출된다.
 */
export function combineRecorders(...recorders: BacktestRecorder[]): BacktestRecorder {
  const each = (hook: string, call: (recorder: BacktestRecorder) => void): void => {
    recorders.forEach((recorder, index) => {
      try {
        call(recorder);
      } catch (error) {
        logger.warn('기록 훅 실패, 계속 진행', {
          hook,
          index,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
  };

  return {
    onStart: (info) => each('onStart', (r) => r.onStart?.(info)),
    onEquity: (point) => each('onEquity', (r) => r.onEquity?.(point)),
    onTrade: (trade) => each('onTrade', (r) => r.onTrade?.(trade)),
  };
}
