import { nowIso } from './date.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = process.env['LOG_LEVEL']?.trim().toUpperCase();
  return raw && isLogLevel(raw) ? raw : 'INFO';
}

// setLogLevel 로 지정한 레벨. 없으면 매번 LOG_LEVEL 을 읽는다 (.env 로드 순서 무관)
let explicitLevel: LogLevel | null = null;

export function setLogLevel(level: LogLevel): void {
  explicitLevel = level;
}

/** setLogLevel 지정을 지우고 LOG_LEVEL 환경 변수로 되돌림 */
export function resetLogLevel(): void {
  explicitLevel = null;
}

export function getLogLevel(): LogLevel {
  return explicitLevel ?? levelFromEnv();
}

export function parseLogLevel(value: string): LogLevel | null {
  const upper = value.trim().toUpperCase();
  return isLogLevel(upper) ? upper : null;
}

export class Logger {
  constructor(private serviceName: string) {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    const formatted = JSON.stringify(entry);

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'ERROR':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    const errorData =
      error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error;
    this.log('ERROR', message, errorData);
  }
}

export function createLogger(serviceName: string): Logger {
  return new Logger(serviceName);
}
