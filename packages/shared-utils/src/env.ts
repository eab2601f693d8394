import 'dotenv/config';

export function env(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function envNumber(key: string, defaultValue?: number): number | undefined {
  const value = env(key);
  if (!value) return defaultValue;
  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return num;
}

export function envInteger(key: string, defaultValue?: number): number | undefined {
  const num = envNumber(key, defaultValue);
  if (num !== undefined && !Number.isInteger(num)) {
    throw new Error(`Environment variable ${key} must be an integer, got: ${num}`);
  }
  return num;
}
