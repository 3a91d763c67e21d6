import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../../domain/common/Errors';
import { LogLevel } from '../../domain/common/ILogger';
import { LogFormat } from '../common/ConsoleLogger';

/**
 * SQLite connection and retry settings.
 */
export interface StorageConfig {
  databaseFile: string;
  busyTimeoutMs: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
}

/**
 * Radius limits applied to every geofence.
 */
export interface GeofenceConfig {
  minRadiusMeters: number;
  maxRadiusMeters: number;
  defaultRadiusMeters: number;
}

/**
 * Timings of the background trigger handler.
 */
export interface TriggerConfig {
  ackTimeoutMs: number;
  snoozeMinutes: number;
  alertSettleMs: number;
}

export interface SpeechConfig {
  command: string | null;
  enabledByDefault: boolean;
  pollIntervalMs: number;
  maxWaitMs: number;
}

/**
 * CORS configuration options.
 */
export interface CorsConfig {
  enabled: boolean;
  origins: string[];
}

/**
 * Logging configuration.
 */
export interface LogConfig {
  level: LogLevel;
  format: LogFormat;
}

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Server
  port: number;
  host: string;
  serverUrl: string;

  // Storage paths
  dataDir: string;
  stateDir: string;

  storage: StorageConfig;
  geofence: GeofenceConfig;
  trigger: TriggerConfig;
  speech: SpeechConfig;
  cors: CorsConfig;
  log: LogConfig;

  nodeEnv: 'development' | 'production' | 'test';
}

/**
 * Expand ~ to home directory in paths.
 */
function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const match = allowed.find(value => value === raw);
  if (match === undefined) {
    throw new ConfigError(`${name} must be one of ${allowed.map(v => `"${v}"`).join(', ')}`);
  }
  return match;
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor() {
    this.config = this.loadFromEnvironment();
    this.validate();
  }

  private loadFromEnvironment(): ConfigOptions {
    const port = intFromEnv('PORT', 3000);
    const dataDir = expandPath(process.env.DATA_DIR || '~/.geotask/data');

    return {
      port,
      host: process.env.HOST || '0.0.0.0',
      serverUrl: process.env.SERVER_URL || `http://localhost:${port}`,

      dataDir,
      stateDir: expandPath(process.env.STATE_DIR || path.join(dataDir, 'state')),

      storage: {
        databaseFile: expandPath(process.env.DATABASE_FILE || path.join(dataDir, 'geotask.db')),
        busyTimeoutMs: intFromEnv('DB_BUSY_TIMEOUT_MS', 5000),
        retry: {
          maxAttempts: intFromEnv('DB_RETRY_ATTEMPTS', 3),
          baseDelayMs: intFromEnv('DB_RETRY_BASE_DELAY_MS', 100),
          maxDelayMs: intFromEnv('DB_RETRY_MAX_DELAY_MS', 2000),
        },
      },

      geofence: {
        minRadiusMeters: intFromEnv('GEOFENCE_MIN_RADIUS', 1),
        maxRadiusMeters: intFromEnv('GEOFENCE_MAX_RADIUS', 1000),
        defaultRadiusMeters: intFromEnv('GEOFENCE_DEFAULT_RADIUS', 50),
      },

      trigger: {
        ackTimeoutMs: intFromEnv('ACK_TIMEOUT_MS', 1000),
        snoozeMinutes: intFromEnv('SNOOZE_MINUTES', 5),
        alertSettleMs: intFromEnv('ALERT_SETTLE_MS', 1500),
      },

      speech: {
        command: process.env.SPEECH_COMMAND || null,
        enabledByDefault: process.env.SPEECH_ENABLED_BY_DEFAULT !== 'false',
        pollIntervalMs: intFromEnv('SPEECH_POLL_INTERVAL_MS', 500),
        maxWaitMs: intFromEnv('SPEECH_MAX_WAIT_MS', 10000),
      },

      cors: {
        enabled: process.env.CORS_ENABLED !== 'false',
        origins: process.env.CORS_ORIGINS?.split(',').map(s => s.trim()) || ['*'],
      },

      log: {
        level: oneOf('LOG_LEVEL', ['error', 'warn', 'info', 'debug'], 'info'),
        format: oneOf('LOG_FORMAT', ['json', 'pretty'], 'pretty'),
      },

      nodeEnv: oneOf('NODE_ENV', ['development', 'production', 'test'], 'development'),
    };
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    if (this.config.port < 0 || this.config.port > 65535) {
      throw new ConfigError('PORT must be between 0 and 65535');
    }

    const { minRadiusMeters, maxRadiusMeters, defaultRadiusMeters } = this.config.geofence;
    if (minRadiusMeters <= 0 || minRadiusMeters > maxRadiusMeters) {
      throw new ConfigError('GEOFENCE_MIN_RADIUS must be positive and not above GEOFENCE_MAX_RADIUS');
    }
    if (defaultRadiusMeters < minRadiusMeters || defaultRadiusMeters > maxRadiusMeters) {
      throw new ConfigError('GEOFENCE_DEFAULT_RADIUS must lie within the radius limits');
    }

    const { retry, busyTimeoutMs } = this.config.storage;
    if (retry.maxAttempts < 1) {
      throw new ConfigError('DB_RETRY_ATTEMPTS must be at least 1');
    }
    if (retry.baseDelayMs < 0 || retry.maxDelayMs < retry.baseDelayMs) {
      throw new ConfigError('DB_RETRY_MAX_DELAY_MS must be at least DB_RETRY_BASE_DELAY_MS');
    }
    if (busyTimeoutMs < 0) {
      throw new ConfigError('DB_BUSY_TIMEOUT_MS cannot be negative');
    }

    const { ackTimeoutMs, snoozeMinutes, alertSettleMs } = this.config.trigger;
    if (ackTimeoutMs < 0 || alertSettleMs < 0) {
      throw new ConfigError('ACK_TIMEOUT_MS and ALERT_SETTLE_MS cannot be negative');
    }
    if (snoozeMinutes < 1) {
      throw new ConfigError('SNOOZE_MINUTES must be at least 1');
    }

    if (this.config.speech.pollIntervalMs <= 0 || this.config.speech.maxWaitMs < 0) {
      throw new ConfigError('SPEECH_POLL_INTERVAL_MS must be positive and SPEECH_MAX_WAIT_MS not negative');
    }
  }

  // Readonly accessors
  get port(): number { return this.config.port; }
  get host(): string { return this.config.host; }
  get serverUrl(): string { return this.config.serverUrl; }
  get dataDir(): string { return this.config.dataDir; }
  get stateDir(): string { return this.config.stateDir; }
  get storage(): StorageConfig { return this.config.storage; }
  get geofence(): GeofenceConfig { return this.config.geofence; }
  get trigger(): TriggerConfig { return this.config.trigger; }
  get speech(): SpeechConfig { return this.config.speech; }
  get cors(): CorsConfig { return this.config.cors; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): ConfigOptions['nodeEnv'] { return this.config.nodeEnv; }

  get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }

  /**
   * Create a Config instance from an object (useful for testing).
   */
  static fromObject(overrides: Partial<ConfigOptions>): Config {
    const config = new Config();
    Object.assign(config.config, overrides);
    config.validate();
    return config;
  }

  /**
   * Get configuration as plain object.
   */
  toJSON(): ConfigOptions {
    return { ...this.config };
  }

  /**
   * Get a summary string for logging.
   */
  toString(): string {
    return [
      `Config:`,
      `  port: ${this.port}`,
      `  dataDir: ${this.dataDir}`,
      `  databaseFile: ${this.storage.databaseFile}`,
      `  stateDir: ${this.stateDir}`,
      `  speech.command: ${this.speech.command ?? '(none)'}`,
      `  nodeEnv: ${this.nodeEnv}`
    ].join('\n');
  }
}
