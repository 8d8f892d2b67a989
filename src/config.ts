import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(process.cwd(), './.env') });

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  FRONTEND_URL: z.string().url().default('http://localhost:3000'),
  DB_DRIVER: z.enum(['postgres', 'sqljs']).default('postgres'),
  DATABASE_URL: z.string().optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_NAME: z.string().default('payroll'),
  DB_SSL: booleanFlag,
  DB_LOGGING: booleanFlag,
  RUN_MIGRATIONS_ON_START: booleanFlag,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PAYROLL_DEDUCTION_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type AppConfig = {
  env: 'development' | 'test' | 'production';
  port: number;
  frontendUrl: string;
  database: {
    // sqljs is an in-memory store for tests and local runs without postgres
    driver: 'postgres' | 'sqljs';
    url?: string;
    host: string;
    port: number;
    username: string;
    password: string;
    name: string;
    ssl: boolean;
    logging: boolean;
  };
  runMigrationsOnStart: boolean;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  deductionRate: number;
};

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    frontendUrl: e.FRONTEND_URL,
    database: {
      driver: e.DB_DRIVER,
      url: e.DATABASE_URL || undefined,
      host: e.DB_HOST,
      port: e.DB_PORT,
      username: e.DB_USER,
      password: e.DB_PASSWORD,
      name: e.DB_NAME,
      ssl: e.DB_SSL,
      logging: e.DB_LOGGING,
    },
    runMigrationsOnStart: e.RUN_MIGRATIONS_ON_START,
    logLevel: e.LOG_LEVEL,
    deductionRate: e.PAYROLL_DEDUCTION_RATE,
  };
}

export const config = loadConfig();
