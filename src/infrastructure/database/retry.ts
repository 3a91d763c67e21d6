import { ILogger } from '../../domain/common/ILogger';
import { StorageUnavailableError, toError } from '../../domain/common/Errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions extends RetryPolicy {
  logger?: ILogger;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_PROTOCOL']);
const TRANSIENT_MESSAGE = /database (table )?is locked|SQLITE_BUSY|SQLITE_LOCKED|SQLITE_IOERR|disk I\/O error|timed? ?out/i;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Lock contention, busy timeouts and I/O hiccups. Constraint violations and
 * corruption are structural and never count as transient.
 */
export function isTransientStorageError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ('code' in err && typeof err.code === 'string' && TRANSIENT_CODES.has(err.code)) {
    return true;
  }
  return TRANSIENT_MESSAGE.test(err.message);
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1) plus
 * up to 50% jitter, never above maxDelayMs.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  const jitter = Math.floor(random() * exponential * 0.5);
  return Math.min(policy.maxDelayMs, exponential + jitter);
}

/**
 * Run one storage operation, retrying transient failures.
 * @throws {StorageUnavailableError} once every attempt failed transiently
 */
export async function withRetry<T>(operation: string, fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransientStorageError(err)) {
        throw err;
      }
      lastError = toError(err);
      if (attempt < options.maxAttempts) {
        const delayMs = backoffDelay(attempt, options, options.random);
        options.logger?.warn(`Transient storage error during ${operation}, retrying`, {
          attempt,
          delayMs,
          error: lastError.message
        });
        await sleep(delayMs);
      }
    }
  }

  options.logger?.error(`Storage retries exhausted for ${operation}`, lastError, { attempts: options.maxAttempts });
  throw new StorageUnavailableError(operation, lastError);
}
