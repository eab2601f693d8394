import { describe, it, expect } from 'vitest';
import { formatEpochMillis, epochMillisToIso, hoursBetween } from '../date.js';

describe('formatEpochMillis', () => {
  it('UTC 기준 yyyy-MM-dd HH:mm 포맷으로 변환해야 함', () => {
    // 2024-01-01T00:00:00Z
    expect(formatEpochMillis(1704067200000)).toBe('2024-01-01 00:00');
    // + 5분
    expect(formatEpochMillis(1704067500000)).toBe('2024-01-01 00:05');
  });

  it('0 이하나 NaN은 숫자 그대로 문자열로 반환해야 함', () => {
    expect(formatEpochMillis(0)).toBe('0');
    expect(formatEpochMillis(-5)).toBe('-5');
    expect(formatEpochMillis(Number.NaN)).toBe('NaN');
  });
});

describe('epochMillisToIso', () => {
  it('UTC ISO 문자열을 반환해야 함', () => {
    expect(epochMillisToIso(1704067200000)).toBe('2024-01-01T00:00:00.000Z');
  });
});

describe('hoursBetween', () => {
  it('두 시각 사이의 시간 차를 계산해야 함', () => {
    expect(hoursBetween(1704067200000, 1704067200000 + 90 * 60 * 1000)).toBe(1.5);
  });
});
