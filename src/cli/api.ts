import fetch, { RequestInit } from 'node-fetch';
import { z } from 'zod';
import { config } from './config';

/**
 * Non-2xx answer from the server. `data` is the parsed error body.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly data: { code?: string; message?: string; details?: unknown },
    public readonly url: string
  ) {
    super(data.message || `HTTP ${status}`);
    this.name = 'HttpError';
  }
}

const errorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  details: z.unknown().optional(),
}).passthrough();

const RETRYABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN']);

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export interface RetryConfig {
  retries: number;
  retryDelay: number;
  debug: boolean;
}

export class APIClient {
  constructor(
    private baseUrl: string = config.apiUrl,
    private retry: RetryConfig = config,
    private sleep: (ms: number) => Promise<void> = ms => new Promise(resolve => setTimeout(resolve, ms))
  ) {}

  setBaseUrl(url: string) {
    this.baseUrl = url;
  }

  private async request(endpoint: string, options: RequestInit = {}): Promise<unknown> {
    const base = this.baseUrl.replace(/\/$/, '');
    const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    const url = `${base}${path}`;

    const maxRetries = this.retry.retries;
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await fetch(url, {
          ...options,
          headers: { 'Content-Type': 'application/json' },
        });

        if (!response.ok) {
          const errorText = await response.text();
          let parsed: unknown;
          try {
            parsed = JSON.parse(errorText);
          } catch {
            parsed = { message: errorText || `HTTP ${response.status}` };
          }
          const body = errorBodySchema.safeParse(parsed);
          const error = new HttpError(response.status, body.success ? body.data : {}, url);

          // Don't retry on 4xx errors (client errors)
          if (response.status < 500) {
            throw error;
          }
          lastError = error;
          if (attempt < maxRetries) {
            await this.backoff(attempt, maxRetries);
            continue;
          }
          throw error;
        }

        const text = await response.text();
        return text ? JSON.parse(text) : {};
      } catch (error) {
        if (error instanceof HttpError) throw error;
        lastError = error;

        const code = errorCode(error);
        if (attempt < maxRetries && code !== undefined && RETRYABLE_CODES.has(code)) {
          await this.backoff(attempt, maxRetries);
          continue;
        }
        throw error;
      }
    }

    throw lastError;
  }

  private async backoff(attempt: number, maxRetries: number): Promise<void> {
    const delay = this.retry.retryDelay * Math.pow(2, attempt);
    if (this.retry.debug) {
      console.error(`Request failed (attempt ${attempt + 1}/${maxRetries + 1}). Retrying in ${delay}ms...`);
    }
    await this.sleep(delay);
  }

  async get<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return schema.parse(await this.request(endpoint));
  }

  async post<T>(endpoint: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return schema.parse(await this.request(endpoint, {
      method: 'POST',
      body: JSON.stringify(body),
    }));
  }

  async delete<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    return schema.parse(await this.request(endpoint, { method: 'DELETE' }));
  }
}

export const api = new APIClient();
