import dotenv from 'dotenv';

dotenv.config();

export interface GlobalConfig {
  searchBaseUrl: string;
  perPage: number;
  requestTimeoutMs: number;
  politenessDelayMs: number;
  defaultOutputFolder: string;
  port: number;
  logLevel: string;
  logDir: string;
  logToFile: boolean;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config: GlobalConfig = {
  searchBaseUrl: process.env.SEARCH_BASE_URL || 'https://unsplash.com/napi/search/photos',
  perPage: intFromEnv('SEARCH_PER_PAGE', 20),
  requestTimeoutMs: intFromEnv('REQUEST_TIMEOUT_MS', 15000),
  politenessDelayMs: intFromEnv('POLITENESS_DELAY_MS', 500),
  defaultOutputFolder: process.env.OUTPUT_FOLDER || './downloads',
  port: intFromEnv('PORT', 3000),
  logLevel: process.env.LOG_LEVEL || 'INFO',
  logDir: process.env.LOG_DIR || './logs',
  logToFile: process.env.LOG_TO_FILE !== 'false',
};
