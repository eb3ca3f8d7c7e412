import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), './.env') });

export type Env = Record<string, string | undefined>;

export interface SmtpConfig {
  host?: string;
  port: number;
  user?: string;
  pass?: string;
  from?: string;
  disabled: boolean;
}

export interface DatabaseConfig {
  url?: string;
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  ssl: boolean;
  logging: boolean;
}

export interface AppConfig {
  port: number;
  frontendUrl: string;
  jwtSecret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  itemsPerPage: number;
  maxItemsPerPage: number;
  defaultEmployeePassword: string;
  bcryptRounds: number;
  admin: { email: string; password: string };
  runMigrationsOnStart: boolean;
  companyName: string;
  database: DatabaseConfig;
  smtp: SmtpConfig;
}

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function flag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: num(env.PORT, 4000),
    frontendUrl: env.FRONTEND_URL || 'http://localhost:3000',
    jwtSecret: env.JWT_SECRET ?? 'replace-with-secure-secret',
    accessTokenTtlSeconds: num(env.ACCESS_TOKEN_TTL_SECONDS, 60 * 60),
    refreshTokenTtlSeconds: num(env.REFRESH_TOKEN_TTL_SECONDS, 30 * 24 * 60 * 60),
    itemsPerPage: num(env.ITEMS_PER_PAGE, 20),
    maxItemsPerPage: num(env.MAX_ITEMS_PER_PAGE, 100),
    defaultEmployeePassword: env.DEFAULT_EMPLOYEE_PASSWORD || 'changeme',
    bcryptRounds: num(env.BCRYPT_ROUNDS, 10),
    admin: {
      email: env.ADMIN_EMAIL || 'admin@corestack.local',
      password: env.ADMIN_PASSWORD || 'admin12345',
    },
    runMigrationsOnStart: flag(env.RUN_MIGRATIONS_ON_START),
    companyName: env.COMPANY_NAME || 'CoreStack',
    database: {
      url: env.DATABASE_URL || undefined,
      host: env.DB_HOST || 'localhost',
      port: num(env.DB_PORT, 5432),
      username: env.DB_USER || 'corestack',
      password: env.DB_PASSWORD || 'corestack',
      database: env.DB_NAME || 'corestack',
      ssl: flag(env.DB_SSL),
      logging: flag(env.DB_LOGGING),
    },
    smtp: {
      host: env.SMTP_HOST || undefined,
      port: num(env.SMTP_PORT, 465),
      user: env.SMTP_USER || undefined,
      pass: env.SMTP_PASS || undefined,
      from: env.SMTP_FROM || undefined,
      disabled: flag(env.EMAIL_DISABLED),
    },
  };
}
