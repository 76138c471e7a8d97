import fs from 'fs';
import path from 'path';

import dotenv from 'dotenv';
import { z } from 'zod';

import { ConfigurationError } from './errors';
import type { SiloChannelMapping } from './ingestion/pipeline';
import type { SmtpSettings } from './notifications/channels/emailChannel';
import type { VapidSettings } from './notifications/channels/pushChannel';
import type { TwilioSettings } from './notifications/channels/smsChannel';

const nodeEnv = process.env.NODE_ENV || 'development';
const envFileName = `.env.${nodeEnv}`;
const envFilePath = path.resolve(process.cwd(), envFileName);
if (fs.existsSync(envFilePath)) {
  dotenv.config({ path: envFilePath });
} else {
  dotenv.config();
}

type Environment = 'development' | 'production';

const envSchema = z.enum(['development', 'production']).catch('development');

const normalizedEnv: Environment = envSchema.parse((process.env.NODE_ENV ?? 'development').toLowerCase());

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function parsePositiveNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

const channelMapSchema = z.record(z.union([z.string(), z.number()]).transform(value => String(value)));

function parseJsonMap(name: string, value: string | undefined): Record<string, string> {
  if (!value || value.trim().length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new ConfigurationError(`${name} must be a JSON object.`);
  }

  const result = channelMapSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`${name} must map silo names to strings or numbers.`);
  }
  return result.data;
}

export function buildSiloMappings(
  channels: Record<string, string>,
  apiKeys: Record<string, string>
): SiloChannelMapping[] {
  return Object.entries(channels).map(([siloName, channelId]) => ({
    siloName,
    channelId,
    readKey: apiKeys[siloName] ?? null
  }));
}

function smtpSettings(): SmtpSettings | null {
  const host = optional(process.env.SMTP_HOST);
  const port = parsePositiveNumber(process.env.SMTP_PORT, 0);
  const user = optional(process.env.SMTP_USER);
  const pass = optional(process.env.SMTP_PASS);
  if (!host || !port || !user || !pass) {
    return null;
  }
  return { host, port, user, pass, from: optional(process.env.SMTP_FROM) ?? user };
}

function twilioSettings(): TwilioSettings | null {
  const accountSid = optional(process.env.TWILIO_ACCOUNT_SID);
  const authToken = optional(process.env.TWILIO_AUTH_TOKEN);
  const from = optional(process.env.TWILIO_FROM);
  if (!accountSid || !authToken || !from) {
    return null;
  }
  return { accountSid, authToken, from };
}

function vapidSettings(): VapidSettings | null {
  const publicKey = optional(process.env.VAPID_PUBLIC_KEY);
  const privateKey = optional(process.env.VAPID_PRIVATE_KEY);
  if (!publicKey || !privateKey) {
    return null;
  }
  const subject =
    optional(process.env.VAPID_SUBJECT) ?? `mailto:${optional(process.env.SMTP_USER) ?? 'no-reply@example.com'}`;
  return { subject, publicKey, privateKey };
}

const allowedOriginsList = parseList(process.env.CORS_ALLOWED_ORIGINS);
const allowedOrigins = new Set(allowedOriginsList);

const defaultRateLimitMax = normalizedEnv === 'production' ? 120 : 300;

const authSecret = process.env.AUTH_SECRET || (normalizedEnv === 'production' ? undefined : 'development-secret');
if (!authSecret) {
  throw new ConfigurationError('AUTH_SECRET must be set in production environments.');
}

export interface AppConfig {
  environment: Environment;
  port: number;
  host: string;
  mongo: {
    uri: string;
    dbName: string;
  };
  ingestion: {
    pollIntervalMs: number;
    identicalReadingMinIntervalMs: number;
    luminosity: {
      darkLux: number;
      openLux: number;
    };
    mappings: SiloChannelMapping[];
    anomalyDetectorUrl: string | null;
  };
  notifications: {
    channelTimeoutMs: number;
    telegramBotToken: string | undefined;
    smtp: SmtpSettings | null;
    twilio: TwilioSettings | null;
    vapid: VapidSettings | null;
  };
  allowedOrigins: readonly string[];
  allowRequestsWithoutOrigin: boolean;
  rateLimit: {
    windowMs: number;
    max: number;
  };
  trustProxy: boolean;
  auth: {
    secret: string;
  };
}

export const appConfig: AppConfig = {
  environment: normalizedEnv,
  port: parsePositiveNumber(process.env.PORT, 3000),
  host: process.env.HOST ?? '0.0.0.0',
  mongo: {
    uri: process.env.MONGO_URI ?? 'mongodb://localhost:27017',
    dbName: process.env.DB_NAME ?? 'silosdb'
  },
  ingestion: {
    pollIntervalMs: parsePositiveNumber(process.env.POLL_INTERVAL_MINUTES, 5) * 60 * 1000,
    identicalReadingMinIntervalMs: parsePositiveNumber(process.env.IDENTICAL_READINGS_MIN_SECONDS, 18_000) * 1000,
    luminosity: {
      darkLux: parseNumber(process.env.LUMINOSITY_DARK_THRESHOLD, 10),
      openLux: parseNumber(process.env.LUMINOSITY_OPEN_THRESHOLD, 100)
    },
    mappings: buildSiloMappings(
      parseJsonMap('THINGSPEAK_CHANNELS', process.env.THINGSPEAK_CHANNELS),
      parseJsonMap('THINGSPEAK_API_KEYS', process.env.THINGSPEAK_API_KEYS)
    ),
    anomalyDetectorUrl: optional(process.env.ANOMALY_DETECTOR_URL) ?? null
  },
  notifications: {
    channelTimeoutMs: parsePositiveNumber(process.env.CHANNEL_TIMEOUT_MS, 15_000),
    telegramBotToken: optional(process.env.TELEGRAM_BOT_TOKEN),
    smtp: smtpSettings(),
    twilio: twilioSettings(),
    vapid: vapidSettings()
  },
  allowedOrigins: allowedOriginsList,
  allowRequestsWithoutOrigin: normalizedEnv !== 'production',
  rateLimit: {
    windowMs: parsePositiveNumber(process.env.RATE_LIMIT_WINDOW_MS, 60_000),
    max: parsePositiveNumber(process.env.RATE_LIMIT_MAX, defaultRateLimitMax)
  },
  trustProxy: true,
  auth: {
    secret: authSecret
  }
};

export function isAllowedOrigin(origin: string): boolean {
  return allowedOrigins.has(origin);
}
