import Big from 'big.js';
import type { ExitRuleParams, ExitTrigger } from '../types.js';

/**
 * 진입가 대비 손익률 (%)
 */
export function calculatePnlPct(entry: Big, price: Big): Big {
  if (entry.lte(0)) {
    return new Big(0);
  }
  return price.minus(entry).div(entry).times(100);
}

/**
 * 손절/익절 판정 (롱 포지션)
 *
 * - 손익률 <= stopLossPct → STOP_LOSS
 * - 손익률 >= takeProfitPct → TAKE_PROFIT
 *
 * @example
 * ```typescript
 * evaluateExitRules({ entry: new Big(100), price: new Big(97), stopLossPct: -2, takeProfitPct: 4 });
 * // 'STOP_LOSS' (-3% <= -2%)
 * ```
 */
export function evaluateExitRules(params: ExitRuleParams): ExitTrigger | null {
  const { entry, price, stopLossPct, takeProfitPct } = params;
  if (entry.lte(0) || price.lte(0)) {
    return null;
  }

  const pnlPct = calculatePnlPct(entry, price);

  if (pnlPct.lte(stopLossPct)) {
    return 'STOP_LOSS';
  }
  if (pnlPct.gte(takeProfitPct)) {
    return 'TAKE_PROFIT';
  }
  return null;
}
