/**
 * Environment variable handling
 * Credentials are never logged or exposed
 */

import { ConfigurationError } from './errors';

export interface EnvConfig {
  openaiApiKey: string | null;
  openaiModel: string;
  openaiBaseUrl: string;
  alphaVantageApiKey: string | null;
  emailRecipient: string | null;
  emailSender: string | null;
  smtpUrl: string | null;
  storageDbPath: string;
  workerCommand: string;
}

function getEnvVar(name: string): string | null {
  const value = process.env[name]?.trim();
  return value ? value : null;
}

export function loadEnvConfig(): EnvConfig {
  return {
    openaiApiKey: getEnvVar('OPENAI_API_KEY'),
    openaiModel: getEnvVar('OPENAI_MODEL') ?? 'gpt-4o',
    openaiBaseUrl: getEnvVar('OPENAI_BASE_URL') ?? 'https://api.openai.com/v1',
    alphaVantageApiKey: getEnvVar('ALPHA_VANTAGE_API_KEY'),
    emailRecipient: getEnvVar('EMAIL_RECIPIENT'),
    emailSender: getEnvVar('EMAIL_SENDER'),
    smtpUrl: getEnvVar('SMTP_URL'),
    storageDbPath: getEnvVar('STORAGE_DB_PATH') ?? 'data/pipeline-store.db',
    workerCommand: getEnvVar('WORKER_COMMAND') ?? 'npx tsx scripts/worker.ts',
  };
}

export function requireEnvValue(value: string | null, name: string): string {
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }
  return value;
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}
