import { ILogger } from '../../domain/common/ILogger';
import { IDatabaseConnection } from '../database/IDatabaseConnection';
import { RetryPolicy, withRetry } from '../database/retry';

/**
 * Epoch values below this are seconds written by older builds.
 */
const SECONDS_THRESHOLD = 100_000_000_000;

export function normalizeTimestamp(value: number): number {
  return value < SECONDS_THRESHOLD ? value * 1000 : value;
}

export function placeholders(count: number): string {
  return new Array(count).fill('?').join(', ');
}

/**
 * Shared plumbing for repositories bound to one connection: every single
 * statement goes through the transient-error retry policy.
 */
export abstract class SqliteRepository {
  protected constructor(
    protected readonly db: IDatabaseConnection,
    private readonly retryPolicy: RetryPolicy,
    protected readonly logger: ILogger
  ) {}

  protected execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, fn, { ...this.retryPolicy, logger: this.logger });
  }
}
