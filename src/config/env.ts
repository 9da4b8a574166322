import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

export const OPENAI_KEY_PREFIX = 'sk-';

export const stripQuotes = (value: string): string => value.trim().replace(/^["']+|["']+$/g, '');

export interface AppConfig {
  openai: {
    apiKey: string;
    model: string;
  };
  server: {
    port: number;
    nodeEnv: string;
    corsOrigin: string;
  };
  guide: {
    hazardRulesPath: string;
    sessionTtlMinutes: number;
    tempDir?: string;
  };
}

export const config: AppConfig = {
  openai: {
    apiKey: stripQuotes(process.env.OPENAI_API_KEY || ''),
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  },
  server: {
    port: parseInt(process.env.PORT || '5000', 10),
    nodeEnv: process.env.NODE_ENV || 'development',
    corsOrigin: process.env.CORS_ORIGIN || '*',
  },
  guide: {
    hazardRulesPath: path.resolve(
      process.cwd(),
      process.env.HAZARD_RULES_PATH || 'src/config/hazard-rules.json'
    ),
    sessionTtlMinutes: parseInt(process.env.SESSION_TTL_MINUTES || '60', 10),
    tempDir: process.env.GUIDE_TEMP_DIR || undefined,
  },
};

/**
 * Startup check for the generator credential. Throws rather than warns:
 * the service cannot do anything useful without a usable key.
 */
export function validateConfig(cfg: AppConfig = config): void {
  const { apiKey } = cfg.openai;

  if (!apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is not set. Add it to your environment or .env file.');
  }

  if (!apiKey.startsWith(OPENAI_KEY_PREFIX)) {
    throw new ConfigurationError(
      `Key format looks wrong. OpenAI keys start with '${OPENAI_KEY_PREFIX}'`
    );
  }

  if (!Number.isInteger(cfg.server.port) || cfg.server.port <= 0) {
    throw new ConfigurationError('PORT must be a positive integer');
  }

  if (!Number.isInteger(cfg.guide.sessionTtlMinutes) || cfg.guide.sessionTtlMinutes <= 0) {
    throw new ConfigurationError('SESSION_TTL_MINUTES must be a positive integer');
  }
}
