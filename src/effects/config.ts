import 'dotenv/config';
import type {ProductionConfig} from './types';
import {DEFAULT_COMMERCE_SETTINGS} from '../pure/settings';

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const parsed = parseInt(env[key] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readFloat(env: Env, key: string, fallback: number): number {
  const parsed = parseFloat(env[key] || '');
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();
  if (!value) return fallback;
  return value === 'true' || value === '1' || value === 'yes';
}

// Load configuration from environment variables (.env is read on import)
export function loadConfigFromEnv(env: Env = process.env): ProductionConfig {
  const region = env.AWS_DEFAULT_REGION || 'us-east-1';
  const defaults = DEFAULT_COMMERCE_SETTINGS;

  return {
    database: {
      host: env.DATABASE_HOST || 'localhost',
      port: readInt(env, 'DATABASE_PORT', 5432),
      user: env.DATABASE_USER || 'appuser',
      password: env.DATABASE_PASSWORD || 'apppassword',
      database: env.DATABASE_NAME || 'coffeeshop',
      connectionTimeoutMillis: readInt(env, 'DATABASE_CONNECTION_TIMEOUT_MS', 2000),
      queryTimeoutMillis: readInt(env, 'DATABASE_QUERY_TIMEOUT_MS', 5000),
      applySchema: readFlag(env, 'DATABASE_APPLY_SCHEMA', false),
    },
    email: {
      enabled: readFlag(env, 'EMAIL_ENABLED', true),
      host: env.SMTP_HOST || 'localhost',
      port: readInt(env, 'SMTP_PORT', 1025),
      from: env.SMTP_FROM || '"Coffee Shop" <noreply@example.com>',
    },
    aws: {
      region,
      accessKeyId: env.AWS_ACCESS_KEY_ID || 'test',
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || 'test',
      monitoringEndpoint: env.AWS_ENDPOINT_MONITORING || 'http://localhost:4566',
      alertsTopicArn: env.ALERTS_TOPIC_ARN || `arn:aws:sns:${region}:000000000000:commerce-alerts`,
    },
    api: {
      port: readInt(env, 'API_PORT', 3000),
    },
    commerce: {
      ...defaults,
      maxQuantityPerAdd: readInt(env, 'CART_MAX_QUANTITY', defaults.maxQuantityPerAdd),
      pointsPerCurrencyUnit: readFloat(env, 'LOYALTY_POINTS_PER_CURRENCY_UNIT', defaults.pointsPerCurrencyUnit),
      freeShippingThreshold: readInt(env, 'FREE_SHIPPING_THRESHOLD', defaults.freeShippingThreshold),
      defaultDeliveryDistanceKm: readFloat(env, 'DEFAULT_DELIVERY_DISTANCE_KM', defaults.defaultDeliveryDistanceKm),
      basePrepMinutes: readInt(env, 'BASE_PREP_MINUTES', defaults.basePrepMinutes),
    },
  };
}
