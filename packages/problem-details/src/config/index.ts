import { bool, envsafe, num, str } from 'envsafe';
import { z } from 'zod';

import { responseStatusSchema } from '../problem/fields';

export type AppConfig = {
  env: 'development' | 'test' | 'production';
  logging: {
    level: string;
  };
  formats: {
    json: boolean;
    xml: boolean;
  };
  http: {
    fallbackStatus: number;
  };
};

let cachedConfig: AppConfig | null = null;

const environmentSchema = z.enum(['development', 'test', 'production']);

const configSpec = {
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
  }),
  LOG_LEVEL: str({ default: 'info' }),
  PROBLEM_DETAILS_JSON: bool({ default: true }),
  PROBLEM_DETAILS_XML: bool({ default: false }),
  PROBLEM_DETAILS_FALLBACK_STATUS: num({ default: 500 }),
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = envsafe(configSpec, { env });

  return {
    env: environmentSchema.parse(raw.NODE_ENV),
    logging: {
      level: raw.LOG_LEVEL,
    },
    formats: {
      json: raw.PROBLEM_DETAILS_JSON,
      xml: raw.PROBLEM_DETAILS_XML,
    },
    http: {
      fallbackStatus: responseStatusSchema.parse(raw.PROBLEM_DETAILS_FALLBACK_STATUS),
    },
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }

  return cachedConfig;
}

export function resetConfigCache() {
  cachedConfig = null;
}
