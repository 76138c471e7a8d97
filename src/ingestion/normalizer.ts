import type { Logger } from 'pino';

import type { NewReading, ReadingValues } from '../repositories/types';

export type RawReading = Record<string, unknown>;

export type TimestampFormat = 'thingspeak' | 'iso';

type NumericKind = 'float' | 'int';

interface FieldRule {
  aliases: readonly string[];
  kind: NumericKind;
  required: boolean;
}

/**
 * Accepted source field names per canonical attribute, in priority order.
 * The first alias holding a non-empty value wins.
 */
export const READING_FIELD_RULES: Readonly<Record<keyof ReadingValues, FieldRule>> = {
  temperature: { aliases: ['temperature', 'temp_C', 'temp', 'field1'], kind: 'float', required: true },
  humidity: { aliases: ['humidity', 'rh_pct', 'rh', 'field2'], kind: 'float', required: true },
  gas: { aliases: ['gas', 'co2_ppm_est', 'co2', 'field3'], kind: 'float', required: false },
  luminosityAlert: { aliases: ['luminosity_alert', 'luminosityAlert', 'field5'], kind: 'int', required: false },
  lux: { aliases: ['lux', 'field6'], kind: 'float', required: false }
};

const READING_FIELDS: readonly (keyof ReadingValues)[] = ['temperature', 'humidity', 'gas', 'luminosityAlert', 'lux'];

export const TIMESTAMP_ALIASES: readonly string[] = ['created_at', 'timestamp'];

const THINGSPEAK_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

export interface NormalizeContext {
  siloId: string;
  deviceId: string | null;
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  return !(typeof value === 'string' && value.trim().length === 0);
}

export function pickFirstPresent(raw: RawReading, aliases: readonly string[]): unknown {
  for (const alias of aliases) {
    const value = raw[alias];
    if (isPresent(value)) {
      return value;
    }
  }
  return undefined;
}

function toNumber(value: unknown, kind: NumericKind): number | null {
  let parsed: number | null = null;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = Number(value.trim());
  } else if (typeof value === 'boolean') {
    parsed = value ? 1 : 0;
  }

  if (parsed === null || !Number.isFinite(parsed)) {
    return null;
  }
  if (kind === 'int' && !Number.isInteger(parsed)) {
    return null;
  }
  return parsed;
}

export function parseSourceTimestamp(value: unknown, format: TimestampFormat): Date | null {
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim();

  if (format === 'iso') {
    const millis = Date.parse(text);
    return Number.isFinite(millis) ? new Date(millis) : null;
  }

  const match = THINGSPEAK_TIMESTAMP.exec(text);
  if (!match) {
    return null;
  }
  const [year, month, day, hour, minute, second] = match.slice(1).map(part => Number.parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls over out-of-range parts (month 13, day 32); reject those instead.
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day || date.getUTCHours() !== hour) {
    return null;
  }
  return date;
}

export class ReadingNormalizer {
  constructor(
    private readonly logger: Logger,
    private readonly timestampFormat: TimestampFormat = 'thingspeak'
  ) {}

  normalize(raw: RawReading, context: NormalizeContext): NewReading | null {
    const timestamp = parseSourceTimestamp(pickFirstPresent(raw, TIMESTAMP_ALIASES), this.timestampFormat);
    if (!timestamp) {
      this.reject(context, 'timestamp', raw);
      return null;
    }

    const values: ReadingValues = {
      temperature: null,
      humidity: null,
      gas: null,
      luminosityAlert: null,
      lux: null
    };

    for (const field of READING_FIELDS) {
      const rule = READING_FIELD_RULES[field];
      const value = toNumber(pickFirstPresent(raw, rule.aliases), rule.kind);
      if (value === null && rule.required) {
        this.reject(context, field, raw);
        return null;
      }
      values[field] = value;
    }

    const entryId = raw.entry_id;
    const deviceId = context.deviceId ?? (isPresent(entryId) ? String(entryId) : context.siloId);

    return {
      siloId: context.siloId,
      deviceId,
      timestamp,
      ...values,
      raw
    };
  }

  private reject(context: NormalizeContext, field: string, raw: RawReading): void {
    this.logger.warn({ siloId: context.siloId, field, raw }, 'Dropping telemetry record with missing or invalid field');
  }
}
