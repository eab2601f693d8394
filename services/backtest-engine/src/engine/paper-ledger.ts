import Big from 'big.js';
import type { LedgerView, Position } from '../types.js';

/**
 * 롱 전용 페이퍼 원장
 *
 * - 현금 + 최대 1개의 포지션
 * - 포지션이 있으면 어떤 심볼이든 추가 매수 불가
 * - 매도는 항상 전량
 * - 레버리지 없음: 매수 비용이 현금을 넘으면 거절
 *
 * 거절된 주문은 false를 반환하고 상태를 바꾸지 않는다.
 */
export class PaperLedger implements LedgerView {
  private readonly startingCash: Big;
  private balance: Big;
  private openPosition: Position | null = null;

  constructor(initialCash: Big) {
    if (initialCash.lte(0)) {
      throw new Error(`초기 자본은 0보다 커야 합니다: ${initialCash.toString()}`);
    }
    this.startingCash = initialCash;
    this.balance = initialCash;
  }

  get cash(): Big {
    return this.balance;
  }

  get initialCash(): Big {
    return this.startingCash;
  }

  hasPosition(symbol: string): boolean {
    return this.openPosition !== null && this.openPosition.symbol === symbol && this.openPosition.size.gt(0);
  }

  positionSize(symbol: string): Big {
    return this.openPosition && this.hasPosition(symbol) ? this.openPosition.size : new Big(0);
  }

  positionEntryPrice(symbol: string): Big {
    return this.openPosition && this.hasPosition(symbol) ? this.openPosition.entryPrice : new Big(0);
  }

  /**
   * 현재 보유 포지션 (없으면 null)
   */
  position(): Position | null {
    return this.openPosition;
  }

  /**
   * 현금 + 평가금액. 가격이 없거나 0 이하이면 현금만.
   */
  equity(price?: Big): Big {
    if (!this.openPosition || !price || price.lte(0)) {
      return this.balance;
    }
    return this.balance.plus(this.openPosition.size.times(price));
  }

  buy(symbol: string, size: Big, price: Big): boolean {
    if (!symbol || this.openPosition !== null) {
      return false;
    }
    if (size.lte(0) || price.lte(0)) {
      return false;
    }

    const cost = size.times(price);
    if (cost.gt(this.balance)) {
      return false;
    }

    this.balance = this.balance.minus(cost);
    this.openPosition = Object.freeze({ symbol, size, entryPrice: price });
    return true;
  }

  /**
   * 포지션 전량 매도
   */
  sell(symbol: string, price: Big): boolean {
    if (!this.openPosition || !this.hasPosition(symbol) || price.lte(0)) {
      return false;
    }

    this.balance = this.balance.plus(this.openPosition.size.times(price));
    this.openPosition = null;
    return true;
  }

  /**
   * 전략에 넘길 읽기 전용 뷰 (buy/sell/reset 노출 안 함)
   */
  view(): LedgerView {
    const ledger = this;
    return Object.freeze({
      get cash() {
        return ledger.cash;
      },
      get initialCash() {
        return ledger.initialCash;
      },
      hasPosition: (symbol: string) => ledger.hasPosition(symbol),
      positionSize: (symbol: string) => ledger.positionSize(symbol),
      positionEntryPrice: (symbol: string) => ledger.positionEntryPrice(symbol),
      equity: (price?: Big) => ledger.equity(price),
    });
  }

  reset(): void {
    this.balance = this.startingCash;
    this.openPosition = null;
  }
}
