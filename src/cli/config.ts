import dotenv from 'dotenv';
import path from 'path';
import os from 'os';

// Load env vars from CWD .env, then the per-user config file
dotenv.config();
dotenv.config({ path: path.join(os.homedir(), '.geotask', 'config') });

function intFromEnv(name: string, fallback: number): number {
  const value = parseInt(process.env[name] || '', 10);
  return Number.isNaN(value) ? fallback : value;
}

export const config = {
  get apiUrl() {
    return process.env.GEOTASK_SERVER_URL || process.env.SERVER_URL || 'http://localhost:3000';
  },
  get retries() {
    return intFromEnv('GEOTASK_RETRIES', 3);
  },
  get retryDelay() {
    return intFromEnv('GEOTASK_RETRY_DELAY', 1000);
  },
  get debug() {
    return process.env.GEOTASK_DEBUG === 'true';
  },
};
