import { z } from 'zod';

import { NodeEnvs } from '@src/common/constants';


/******************************************************************************
                                 Schema
******************************************************************************/

const EnvSchema = z.object({
  NODE_ENV: z.nativeEnum(NodeEnvs).default(NodeEnvs.Dev),
  PORT: z.coerce.number().int().positive().default(3000),
  APP_NAME: z.string().min(1).default('Contract Clause Extractor'),
  MONGODB_URI: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  JWT_SECRET: z.string().optional(),
  JWT_EXPIRES_IN: z.string().min(1).default('24h'),
  ALLOWED_ORIGINS: z.string().default('*'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  EXTRACT_RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(20),
});

export interface AppConfig {
  nodeEnv: NodeEnvs;
  port: number;
  appName: string;
  mongoUri: string;
  openai: {
    apiKey: string;
    model: string;
  };
  jwt: {
    secret: string;
    expiresIn: string;
  };
  allowedOrigins: string[];
  maxUploadBytes: number;
  rateLimit: {
    apiMaxRequests: number;
    extractMaxRequests: number;
  };
}


/******************************************************************************
                                Functions
******************************************************************************/

/**
 * Build the application config from an environment map. Secrets fall back to
 * placeholders only when NODE_ENV is "test".
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }
  const env = parsed.data;
  const isTest = env.NODE_ENV === NodeEnvs.Test;

  const required = (name: string, value: string | undefined, fallback: string): string => {
    if (value) return value;
    if (isTest) return fallback;
    throw new Error(`${name} is not defined in environment variables`);
  };

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    appName: env.APP_NAME,
    mongoUri: required('MONGODB_URI', env.MONGODB_URI, 'mongodb://localhost:27017/clauses-test'),
    openai: {
      apiKey: required('OPENAI_API_KEY', env.OPENAI_API_KEY, 'test-openai-key'),
      model: env.OPENAI_MODEL,
    },
    jwt: {
      secret: required('JWT_SECRET', env.JWT_SECRET, 'test-secret'),
      expiresIn: env.JWT_EXPIRES_IN,
    },
    allowedOrigins: env.ALLOWED_ORIGINS
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
    rateLimit: {
      apiMaxRequests: env.RATE_LIMIT_MAX_REQUESTS,
      extractMaxRequests: env.EXTRACT_RATE_LIMIT_MAX_REQUESTS,
    },
  };
}
