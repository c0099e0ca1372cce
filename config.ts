import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env.local in the working directory
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

const toNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) ? parsed : fallback;
};

export interface DatabaseConfig {
  host?: string;
  port: number;
  user?: string;
  password?: string;
  database?: string;
}

export interface AppConfig {
  port: number;
  db: DatabaseConfig;
  jwtSecret: string;
  jwtTtlSeconds: number;
  seedTeacherPassword: string;
  clientDir: string;
  corsOrigin?: string;
}

export const config: AppConfig = {
  port: toNumber(process.env.PORT, 4000),
  db: {
    host: process.env.DB_HOST,
    port: toNumber(process.env.DB_PORT, 3306),
    user: process.env.DB_USER,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_DATABASE,
  },
  jwtSecret: process.env.JWT_SECRET || 'your_default_secret',
  jwtTtlSeconds: toNumber(process.env.JWT_TTL_SECONDS, 8 * 60 * 60),
  seedTeacherPassword: process.env.SEED_TEACHER_PASSWORD || 'changeme',
  clientDir: path.resolve(process.cwd(), process.env.CLIENT_DIR || 'dist-client'),
  corsOrigin: process.env.CORS_ORIGIN || undefined,
};

if (!process.env.JWT_SECRET) {
  console.warn('JWT_SECRET is not set; falling back to the development secret.');
}
