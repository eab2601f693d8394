import type { SignalAction, StrategySignal } from '../types.js';

const ACTIONS: readonly SignalAction[] = ['BUY', 'SELL', 'HOLD'];

function toAction(value: string): SignalAction {
  const upper = value.trim().toUpperCase();
  return ACTIONS.find((action) => action === upper) ?? 'HOLD';
}

/**
 * 전략 반환값을 BUY / SELL / HOLD 중 하나로 정규화
 *
 * - 문자열: 대소문자 무시
 * - { action, reason } 객체: action 문자열을 같은 규칙으로
 * - 그 밖의 값 (빈 값, 숫자, 알 수 없는 문자열): HOLD
 */
export function normalizeSignal(output: unknown): StrategySignal {
  if (typeof output === 'string') {
    return { action: toAction(output) };
  }

  if (typeof output === 'object' && output !== null && 'action' in output) {
    const { action } = output;
    if (typeof action !== 'string') {
      return { action: 'HOLD' };
    }
    const reason = 'reason' in output && typeof output.reason === 'string' ? output.reason : undefined;
    return reason === undefined ? { action: toAction(action) } : { action: toAction(action), reason };
  }

  return { action: 'HOLD' };
}
