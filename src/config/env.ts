import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export type StoreDriver = 'memory' | 'postgres';

export interface AppConfig {
  port: number;
  storeDriver: StoreDriver;
  seedFile: string;
  db: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };
}

const DEFAULT_SEED_FILE = path.join(__dirname, '..', '..', 'data', 'seed.json');

/**
 * Read configuration from environment variables. Throws on values that would
 * only fail later at runtime (bad port, unknown store driver).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const storeDriver = env.STORE_DRIVER || 'memory';
  if (storeDriver !== 'memory' && storeDriver !== 'postgres') {
    throw new Error(`STORE_DRIVER must be "memory" or "postgres", got "${storeDriver}"`);
  }

  return {
    port: parsePort('PORT', env.PORT, 8000),
    storeDriver,
    seedFile: env.SEED_FILE ? path.resolve(env.SEED_FILE) : DEFAULT_SEED_FILE,
    db: {
      host: env.DB_HOST || 'localhost',
      port: parsePort('DB_PORT', env.DB_PORT, 5432),
      user: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD || 'postgres',
      database: env.DB_NAME || 'leave_management',
    },
  };
}

function parsePort(name: string, raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`${name} must be an integer between 1 and 65535, got "${raw}"`);
  }
  return port;
}
