/**
 * Configuration des variables d'environnement
 *
 * Ce fichier charge et valide les variables d'environnement nécessaires
 * au fonctionnement du backend.
 */

import { config as loadEnv } from 'dotenv';

loadEnv();

/**
 * Identifiants WhatsApp Cloud API utilisés quand la requête n'en fournit pas
 */
export interface WhatsAppConfig {
  token?: string;
  phoneNumberId?: string;
  apiBaseUrl: string;
}

export interface AppConfig {
  PORT: number;
  HOST: string;
  DATABASE_PATH: string;
  LOG_LEVEL: string;
  FEED_FETCH_TIMEOUT_MS: number;
  WEBHOOK_TIMEOUT_MS: number;
  whatsapp: WhatsAppConfig;
}

type EnvSource = Record<string, string | undefined>;

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: "${value}" is not a valid number`);
  }

  return parsed;
}

/**
 * Construit la configuration depuis un ensemble de variables
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  return {
    PORT: parsePositiveInt('PORT', env.PORT, 3001),
    HOST: env.HOST || '0.0.0.0',
    DATABASE_PATH: env.DATABASE_PATH || './data/calendar.db',
    LOG_LEVEL: env.LOG_LEVEL || 'info',
    FEED_FETCH_TIMEOUT_MS: parsePositiveInt('FEED_FETCH_TIMEOUT_MS', env.FEED_FETCH_TIMEOUT_MS, 20000),
    WEBHOOK_TIMEOUT_MS: parsePositiveInt('WEBHOOK_TIMEOUT_MS', env.WEBHOOK_TIMEOUT_MS, 20000),
    whatsapp: {
      token: env.WHATSAPP_TOKEN || undefined,
      phoneNumberId: env.WHATSAPP_PHONE_NUMBER_ID || undefined,
      apiBaseUrl: env.WHATSAPP_API_BASE_URL || 'https://graph.facebook.com/v17.0'
    }
  };
}
