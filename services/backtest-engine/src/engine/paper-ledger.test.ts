import { describe, it, expect } from 'vitest';
import Big from 'big.js';
import { PaperLedger } from './paper-ledger.js';

const SYMBOL = 'SOL-USD';

describe('PaperLedger', () => {
  it('매수 후 매도 시 현금 정산', () => {
    const ledger = new PaperLedger(new Big(1000));

    expect(ledger.buy(SYMBOL, new Big(2), new Big(100))).toBe(true);
    expect(ledger.cash.toString()).toBe('800');
    expect(ledger.hasPosition(SYMBOL)).toBe(true);
    expect(ledger.positionSize(SYMBOL).toString()).toBe('2');
    expect(ledger.positionEntryPrice(SYMBOL).toString()).toBe('100');
    expect(ledger.equity(new Big(105)).toString()).toBe('1010');

    expect(ledger.sell(SYMBOL, new Big(110))).toBe(true);
    expect(ledger.cash.toString()).toBe('1020');
    expect(ledger.hasPosition(SYMBOL)).toBe(false);
    expect(ledger.position()).toBeNull();
  });

  it('현금을 넘는 매수는 거절하고 상태를 바꾸지 않음', () => {
    const ledger = new PaperLedger(new Big(1000));

    expect(ledger.buy(SYMBOL, new Big(20), new Big(100))).toBe(false);
    expect(ledger.cash.toString()).toBe('1000');
    expect(ledger.position()).toBeNull();
  });

  it('정확히 현금만큼은 매수 가능', () => {
    const ledger = new PaperLedger(new Big(1000));

    expect(ledger.buy(SYMBOL, new Big(10), new Big(100))).toBe(true);
    expect(ledger.cash.toString()).toBe('0');
  });

  it('포지션 보유 중에는 어떤 심볼도 추가 매수 불가', () => {
    const ledger = new PaperLedger(new Big(1000));
    ledger.buy(SYMBOL, new Big(1), new Big(100));

    expect(ledger.buy(SYMBOL, new Big(1), new Big(100))).toBe(false);
    expect(ledger.buy('BTC-USD', new Big(1), new Big(100))).toBe(false);
    expect(ledger.cash.toString()).toBe('900');
    expect(ledger.positionSize(SYMBOL).toString()).toBe('1');
  });

  it.each([
    ['수량 0', SYMBOL, 0, 100],
    ['음수 수량', SYMBOL, -1, 100],
    ['가격 0', SYMBOL, 1, 0],
    ['빈 심볼', '', 1, 100],
  ])('잘못된 매수 거절: %s', (_label, symbol, size, price) => {
    const ledger = new PaperLedger(new Big(1000));

    expect(ledger.buy(symbol, new Big(size), new Big(price))).toBe(false);
    expect(ledger.cash.toString()).toBe('1000');
  });

  it('포지션이 없거나 다른 심볼이면 매도 거절', () => {
    const ledger = new PaperLedger(new Big(1000));
    expect(ledger.sell(SYMBOL, new Big(100))).toBe(false);

    ledger.buy(SYMBOL, new Big(1), new Big(100));
    expect(ledger.sell('BTC-USD', new Big(100))).toBe(false);
    expect(ledger.sell(SYMBOL, new Big(0))).toBe(false);
    expect(ledger.positionSize(SYMBOL).toString()).toBe('1');
  });

  it('포지션이 없으면 조회 값은 0, 평가금액은 현금', () => {
    const ledger = new PaperLedger(new Big(1000));

    expect(ledger.positionSize(SYMBOL).toString()).toBe('0');
    expect(ledger.positionEntryPrice(SYMBOL).toString()).toBe('0');
    expect(ledger.equity(new Big(50)).toString()).toBe('1000');
    expect(ledger.equity().toString()).toBe('1000');
  });

  it('reset은 초기 상태로 되돌리고 여러 번 불러도 같음', () => {
    const ledger = new PaperLedger(new Big(1000));
    ledger.buy(SYMBOL, new Big(3), new Big(100));

    ledger.reset();
    ledger.reset();

    expect(ledger.cash.toString()).toBe('1000');
    expect(ledger.position()).toBeNull();
  });

  it('뷰는 읽기 전용이며 원장 변경을 반영', () => {
    const ledger = new PaperLedger(new Big(1000));
    const view = ledger.view();

    expect(Object.isFrozen(view)).toBe(true);
    expect('buy' in view).toBe(false);

    ledger.buy(SYMBOL, new Big(2), new Big(100));

    expect(view.cash.toString()).toBe('800');
    expect(view.hasPosition(SYMBOL)).toBe(true);
    expect(view.initialCash.toString()).toBe('1000');
  });

  it('초기 자본이 0 이하면 생성 실패', () => {
    expect(() => new PaperLedger(new Big(0))).toThrow('초기 자본');
  });
});
