import Big from 'big.js';
import type { RiskSizingParams, RiskSizingResult } from '../types.js';

export const DEFAULT_SIZE_DECIMALS = 8;

/**
 * 리스크 기반 포지션 사이징 (레버리지 없음)
 *
 * 손절에 걸렸을 때의 손실이 현재 현금의 riskPct%를 넘지 않도록 수량을 정하고,
 * 현금으로 살 수 있는 수량을 상한으로 둔다.
 *
 * size = min(리스크 금액 / 손절 거리, 현금 / 가격)
 *
 * @example
 * ```typescript
 * const result = calculateRiskBasedPositionSize({
 *   cash: new Big(1000),
 *   price: new Big(100),
 *   riskPct: 1,        // 1% 리스크 → 10
 *   stopLossPct: -2,   // 손절 거리 = 2
 * });
 * // result.size = 5
 * ```
 */
export function calculateRiskBasedPositionSize(params: RiskSizingParams): RiskSizingResult {
  const { cash, price, riskPct, stopLossPct } = params;
  const sizeDecimals = params.sizeDecimals ?? DEFAULT_SIZE_DECIMALS;
  const zero = new Big(0);

  if (price.lte(0) || cash.lte(0)) {
    return { size: zero, riskAmount: zero, stopDistance: zero, maxAffordable: zero, limitedByCash: false };
  }

  // 리스크 금액 = 현금 * 리스크 퍼센트
  const riskAmount = cash.times(riskPct).div(100);

  // 손절 거리 (가격 기준)
  const stopDistance = price.times(Math.abs(stopLossPct)).div(100);

  // 현금 상한: 내림 처리 후에도 비용이 현금을 넘으면 한 단위 줄인다
  let maxAffordable = cash.div(price).round(sizeDecimals, Big.roundDown);
  if (maxAffordable.times(price).gt(cash)) {
    maxAffordable = maxAffordable.minus(new Big(1).div(new Big(10).pow(sizeDecimals)));
  }

  if (stopDistance.lte(0) || riskAmount.lte(0)) {
    return { size: zero, riskAmount, stopDistance, maxAffordable, limitedByCash: false };
  }

  const riskSize = riskAmount.div(stopDistance);
  const limitedByCash = riskSize.gte(maxAffordable);
  const size = limitedByCash ? maxAffordable : riskSize.round(sizeDecimals, Big.roundDown);

  return {
    size: size.gt(0) ? size : zero,
    riskAmount,
    stopDistance,
    maxAffordable,
    limitedByCash,
  };
}
