import { z } from 'zod';

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (value: string | undefined): string[] => {
  if (!value) {
    return [];
  }

  return value
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const optionalString = z
  .string()
  .optional()
  .transform(value => value ?? '');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  APP_PORT: z.coerce.number().int().positive().optional(),
  PORT: z.coerce.number().int().positive().optional(),
  NODE_ENV: z.string().default('development'),
  FRONTEND_URL: z.string().default('http://localhost:5173'),
  CORS_ORIGINS: z.string().optional(),

  DB_URL: z.string().min(1, 'DB_URL is required'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),

  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
  JWT_EXPIRATION_SECONDS: z.coerce.number().int().positive().default(3600),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),

  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  MAIL_FROM_NAME: z.string().default('Address Book'),

  STORAGE_TYPE: z.enum(['cloudflare', 'local', 'both']).default('local'),
  CLOUDFLARE_ACCOUNT_ID: optionalString,
  CLOUDFLARE_API_TOKEN: optionalString,
  UPLOAD_DIR: z.string().default('./uploads'),
  BASE_URL: z.string().default('http://localhost:3000'),
  MAX_FILE_SIZE: z.coerce.number().int().positive().default(5 * 1024 * 1024),

  REDIS_ENABLED: booleanFlag,
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: optionalString,
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  CACHE_USER_TTL_SECONDS: z.coerce.number().int().positive().default(900),
});

export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';
export type StorageType = 'cloudflare' | 'local' | 'both';

export interface JwtConfig {
  secret: string;
  algorithm: JwtAlgorithm;
  expiresInSeconds: number;
}

export interface EmailConfig {
  host: string;
  port: number;
  user: string;
  pass: string;
  fromName: string;
}

export interface DbConfig {
  connectionString: string;
  max: number;
}

export interface RedisConfig {
  enabled: boolean;
  host: string;
  port: number;
  password: string;
  db: number;
  userTtlSeconds: number;
}

export interface StorageConfig {
  type: StorageType;
  cloudflareAccountId: string;
  cloudflareApiToken: string;
  uploadDir: string;
  baseUrl: string;
  maxFileSize: number;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  frontendUrl: string;
  corsOrigins: string[];
  bcryptRounds: number;
  jwt: JwtConfig;
  email: EmailConfig;
  db: DbConfig;
  redis: RedisConfig;
  storage: StorageConfig;
}

/**
 * Build the application configuration from environment variables.
 * Called once at process start; the result is passed to every component that needs it.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;

  return {
    port: values.APP_PORT ?? values.PORT ?? 3000,
    nodeEnv: values.NODE_ENV,
    frontendUrl: values.FRONTEND_URL,
    corsOrigins: parseCorsOrigins(values.CORS_ORIGINS),
    bcryptRounds: values.BCRYPT_ROUNDS,
    jwt: {
      secret: values.JWT_SECRET,
      algorithm: values.JWT_ALGORITHM,
      expiresInSeconds: values.JWT_EXPIRATION_SECONDS,
    },
    email: {
      host: values.SMTP_HOST,
      port: values.SMTP_PORT,
      user: values.SMTP_USER,
      pass: values.SMTP_PASS,
      fromName: values.MAIL_FROM_NAME,
    },
    db: {
      connectionString: values.DB_URL,
      max: values.DB_POOL_MAX,
    },
    redis: {
      enabled: values.REDIS_ENABLED,
      host: values.REDIS_HOST,
      port: values.REDIS_PORT,
      password: values.REDIS_PASSWORD,
      db: values.REDIS_DB,
      userTtlSeconds: values.CACHE_USER_TTL_SECONDS,
    },
    storage: {
      type: values.STORAGE_TYPE,
      cloudflareAccountId: values.CLOUDFLARE_ACCOUNT_ID,
      cloudflareApiToken: values.CLOUDFLARE_API_TOKEN,
      uploadDir: values.UPLOAD_DIR,
      baseUrl: values.BASE_URL,
      maxFileSize: values.MAX_FILE_SIZE,
    },
  };
};
