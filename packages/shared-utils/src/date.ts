import { DateTime } from 'luxon';

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

/** 거래/자본 로그에 쓰는 기본 포맷 (UTC) */
export const LOG_TIME_FORMAT = 'yyyy-MM-dd HH:mm';

/**
 * epoch 밀리초를 사람이 읽을 수 있는 UTC 문자열로 변환
 *
 * 유효하지 않은 값(0 이하, NaN)은 원래 숫자를 문자열로 그대로 돌려준다.
 */
export function formatEpochMillis(ms: number, format = LOG_TIME_FORMAT): string {
  if (!Number.isFinite(ms) || ms <= 0) return String(ms);

  const dt = DateTime.fromMillis(ms, { zone: 'utc' });
  if (!dt.isValid) return String(ms);
  return dt.toFormat(format);
}

export function epochMillisToIso(ms: number): string {
  const iso = DateTime.fromMillis(ms, { zone: 'utc' }).toISO();
  if (!iso) throw new Error(`ISO 변환 실패: ${ms}`);
  return iso;
}

/**
 * 두 epoch 밀리초 사이의 시간 차 (시간 단위)
 */
export function hoursBetween(startMs: number, endMs: number): number {
  return DateTime.fromMillis(endMs).diff(DateTime.fromMillis(startMs), 'hours').hours;
}
