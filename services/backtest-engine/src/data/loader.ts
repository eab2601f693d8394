import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { createLogger } from '@backtester/shared-utils';
import { CandleValidationError } from '../errors.js';
import type { Candle } from '../types.js';
import { REQUIRED_COLUMNS, parseCandleRow, validateCandleSequence } from './validation.js';

const logger = createLogger('data-loader');

/** 이보다 적으면 경고만 남긴다 */
export const RECOMMENDED_MIN_CANDLES = 100;

/**
 * CSV 파일에서 캔들 로드
 *
 * 형식: timestamp,open,high,low,close,volume (timestamp = epoch 밀리초, 헤더 필수)
 * 컬럼 순서는 자유, 추가 컬럼은 무시.
 *
 * 잘못된 행이 하나라도 있으면 건너뛰지 않고 실패한다 (지표 연속성 보장).
 *
 * @param path - CSV 파일 경로
 * @returns 오름차순 캔들 배열
 * @throws CandleValidationError 파일 없음, 빈 파일, 컬럼 누락, 잘못된 행, 순서 오류
 */
export function loadCandlesFromCsv(path: string): Candle[] {
  if (!existsSync(path)) {
    throw new CandleValidationError(`파일을 찾을 수 없습니다: ${path}`);
  }

  logger.info('캔들 데이터 로드 시작', { path });

  const raw = readFileSync(path, 'utf8');
  const candles = parseCandlesCsv(raw);

  if (candles.length < RECOMMENDED_MIN_CANDLES) {
    logger.warn('캔들 수가 적습니다', {
      count: candles.length,
      recommended: RECOMMENDED_MIN_CANDLES,
    });
  }

  logger.info('캔들 데이터 로드 완료', { path, count: candles.length });
  return candles;
}

const ParsedRecordSchema = z.object({
  record: z.array(z.string()),
  info: z.object({ lines: z.number().int() }),
});

const ParsedRecordsSchema = z.array(ParsedRecordSchema);

/**
 * csv-parse 결과를 행 번호와 함께 읽는다 (빈 줄은 건너뛰지만 줄 번호는 유지)
 */
function readCsvRecords(content: string): z.infer<typeof ParsedRecordsSchema> {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      info: true,
    });
  } catch (error) {
    throw new CandleValidationError(`CSV 형식 오류: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = ParsedRecordsSchema.safeParse(parsed);
  if (!result.success) {
    throw new CandleValidationError('CSV 파싱 결과를 읽을 수 없습니다');
  }
  return result.data;
}

/**
 * CSV 문자열 파싱 + 검증
 *
 * 따옴표로 감싼 필드, CRLF, BOM 허용. 오류의 row 는 파일 줄 번호 (헤더 = 1).
 */
export function parseCandlesCsv(content: string): Candle[] {
  const [headerRecord, ...rows] = readCsvRecords(content);

  if (headerRecord === undefined || headerRecord.record.every((column) => column === '')) {
    throw new CandleValidationError('파일이 비어 있거나 헤더가 없습니다', { row: 1 });
  }

  const header = headerRecord.record.map((column) => column.toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new CandleValidationError(`필수 컬럼 누락: ${missing.join(', ')}`, {
      row: headerRecord.info.lines,
      field: missing.join(','),
    });
  }

  const candles: Candle[] = [];
  const rowNumbers: number[] = [];

  for (const { record: values, info } of rows) {
    const row = info.lines;
    const record: Record<string, string | undefined> = {};
    header.forEach((column, i) => {
      record[column] = values[i];
    });

    candles.push(parseCandleRow(record, row));
    rowNumbers.push(row);
  }

  if (candles.length === 0) {
    throw new CandleValidationError('유효한 캔들이 없습니다');
  }

  validateCandleSequence(candles, rowNumbers);
  return candles;
}
