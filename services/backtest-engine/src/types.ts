import type Big from 'big.js';
import type { Candle, ExitTrigger } from '@backtester/trading-utils';

export type { Candle, ExitTrigger } from '@backtester/trading-utils';

// ============================================================
// 포지션 / 원장
// ============================================================

export interface Position {
  readonly symbol: string;
  readonly size: Big;
  readonly entryPrice: Big;
}

/**
 * 전략에 넘기는 읽기 전용 원장 뷰
 */
export interface LedgerView {
  readonly cash: Big;
  readonly initialCash: Big;
  hasPosition(symbol: string): boolean;
  positionSize(symbol: string): Big;
  positionEntryPrice(symbol: string): Big;
  equity(price?: Big): Big;
}

// ============================================================
// 거래
// ============================================================

export type OrderSide = 'BUY' | 'SELL';
export type TradeTrigger = 'STRATEGY' | ExitTrigger;

export interface Trade {
  readonly timestamp: number;
  readonly action: OrderSide;
  readonly symbol: string;
  readonly price: Big;
  readonly size: Big;
  readonly realizedPnL: Big; // 매수는 0
  readonly equityAfter: Big;
  readonly trigger: TradeTrigger;
}

// ============================================================
// 전략 인터페이스
// ============================================================

export type SignalAction = 'BUY' | 'SELL' | 'HOLD';

export interface StrategySignal {
  action: SignalAction;
  reason?: string;
}

/**
 * 전략 반환값: 시그널 객체 또는 'buy' / 'SELL' 같은 문자열.
 * 인식할 수 없는 값과 빈 값은 HOLD로 처리된다.
 */
export type StrategyOutput = StrategySignal | string | null | undefined;

export interface Strategy {
  name: string;
  params: Record<string, unknown>;

  /**
   * 전략 시그널 생성
   * @param history - 현재 캔들까지의 캔들 (이후 캔들은 포함되지 않음)
   * @param ledger - 읽기 전용 원장
   * @param symbol - 거래 심볼
   */
  generateSignal(history: readonly Candle[], ledger: LedgerView, symbol: string): StrategyOutput;

  /** 실행 사이에 내부 지표 상태 초기화 */
  reset?(): void;
}

// ============================================================
// 백테스트 설정
// ============================================================

export interface BacktestConfig {
  symbol: string;
  initialCapital: Big;
  riskPerTradePct: number; // 거래당 리스크 (%)
  stopLossPct: number; // 손절 기준 (%, 음수)
  takeProfitPct: number; // 익절 기준 (%, 양수)
  cooldownCandles: number; // 매도 후 재진입 금지 캔들 수
  trendEmaPeriod: number; // 추세 필터 EMA 기간
  minCandlesBeforeTrading: number; // 워밍업 캔들 수
}

// ============================================================
// 기록 훅 (CSV 로그 등)
// ============================================================

export interface BacktestRunInfo {
  strategy: string;
  symbol: string;
  candleCount: number;
  initialCapital: Big;
}

/**
 * 실행 중 발생하는 결과를 외부로 흘려보내는 훅.
 * 훅에서 던진 에러는 경고로만 남고 실행을 멈추지 않는다.
 */
export interface BacktestRecorder {
  onStart?(info: BacktestRunInfo): void;
  onEquity?(point: EquityPoint): void;
  onTrade?(trade: Trade): void;
}

// ============================================================
// 성과 지표
// ============================================================

export interface PerformanceMetrics {
  endingBalance: Big; // 마지막 자본 곡선 값
  pnl: Big; // 최종 자본 - 초기 자본
  totalReturn: number; // 총 수익률 (%)
  maxDrawdown: number; // 최대 낙폭 (%)
  winRate: number; // 승률 (%, 매도 기준)
  profitFactor: number; // 총 수익 / 총 손실
  avgWin: Big;
  avgLoss: Big;
  totalTrades: number; // 매수 + 매도
  buyTrades: number;
  sellTrades: number;
  winningTrades: number;
  losingTrades: number;
  avgTradeDuration: number; // 평균 보유 시간 (시간)
}

// ============================================================
// 백테스트 결과
// ============================================================

export interface EquityPoint {
  readonly timestamp: number;
  readonly equity: Big;
}

export interface DrawdownPoint {
  timestamp: number;
  drawdown: number; // %
  peak: Big;
}

export interface BacktestResult {
  strategy: string;
  symbol: string;
  startTime: number;
  endTime: number;
  candleCount: number;
  initialCapital: Big;
  finalCapital: Big;
  finalCash: Big;
  openPosition: Position | null;
  totalReturn: number;
  metrics: PerformanceMetrics;
  trades: Trade[];
  equity: EquityPoint[];
  drawdowns: DrawdownPoint[];
}
