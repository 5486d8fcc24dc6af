import { z } from 'zod';

const DEV_ORIGINS = ['http://localhost:4200', 'http://localhost:8084'];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(10),
  MAX_SESSIONS: z.coerce.number().int().positive().default(100),
  SYMBOL_DIR: z.string().min(1).optional(),
  CORS_ORIGINS: z.string().optional(),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  maxUploadMb: number;
  maxSessions: number;
  /** Directory of `<codepoints>.svg` emoji artwork, checked before the built-in symbols */
  symbolDir?: string;
  /** `false` means same origin only */
  corsOrigins: string[] | false;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read service settings from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${details}`);
  }

  const parsed = result.data;
  let corsOrigins: string[] | false;
  if (parsed.CORS_ORIGINS !== undefined) {
    corsOrigins = parsed.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean);
  } else {
    // In production, use same origin
    corsOrigins = parsed.NODE_ENV === 'production' ? false : DEV_ORIGINS;
  }

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    maxUploadMb: parsed.MAX_UPLOAD_MB,
    maxSessions: parsed.MAX_SESSIONS,
    symbolDir: parsed.SYMBOL_DIR,
    corsOrigins,
  };
}
