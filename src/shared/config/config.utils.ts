import { ConfigService } from '@nestjs/config';

/**
 * Read a numeric setting. Env vars are always strings, so the value is
 * coerced and the default is used for anything non-finite.
 */
export function getNumber(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === null || raw === '') {
    return defaultValue;
  }

  const value = Number(raw);
  return Number.isFinite(value) ? value : defaultValue;
}

/**
 * Read a numeric setting that must be a positive integer (sizes, counts).
 */
export function getPositiveInt(
  configService: ConfigService,
  key: string,
  defaultValue: number,
): number {
  const value = Math.floor(getNumber(configService, key, defaultValue));
  return value >= 1 ? value : defaultValue;
}
