export type SqlParam = string | number | null;

export interface RunResult {
  lastId: number;
  changes: number;
}

/**
 * One open database handle. Statements on a connection run one at a time.
 */
export interface IDatabaseConnection {
  readonly readOnly: boolean;

  run(sql: string, params?: readonly SqlParam[]): Promise<RunResult>;

  /**
   * @returns the first row, or undefined when there is none
   */
  get(sql: string, params?: readonly SqlParam[]): Promise<unknown>;

  all(sql: string, params?: readonly SqlParam[]): Promise<unknown[]>;

  exec(sql: string): Promise<void>;

  /**
   * Run `body` inside a transaction, rolling back when it rejects.
   * Nested calls join the outer transaction.
   */
  transaction<T>(body: () => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
