import { ZodError } from 'zod';
import { HttpError, errorCode } from '../api';

export interface CLIError {
  success: false;
  error: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

/**
 * Exit code mapping:
 *   0 = Success
 *   1 = General / validation error
 *   2 = Resource not found
 *   3 = Network / connection error
 */
export const EXIT_GENERAL = 1;
export const EXIT_NOT_FOUND = 2;
export const EXIT_NETWORK = 3;

export function createError(
  code: string,
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): CLIError {
  return {
    success: false,
    error: code,
    message,
    details,
    suggestion
  };
}

/**
 * Classify anything a command threw.
 */
export function toCliError(err: unknown): { cliError: CLIError; exitCode: number } {
  if (err instanceof HttpError) {
    switch (err.status) {
      case 404:
        return {
          cliError: createError('resource_not_found', err.message, { status: err.status, url: err.url },
            'Use list commands to see available resources'),
          exitCode: EXIT_NOT_FOUND,
        };
      case 400:
        return {
          cliError: createError('invalid_request', err.message, { status: err.status, errors: err.data.details },
            'Check command arguments and try again'),
          exitCode: EXIT_GENERAL,
        };
      case 409:
        return {
          cliError: createError('conflict', err.message, { status: err.status, details: err.data.details },
            'Check the active session with: geotask session status'),
          exitCode: EXIT_GENERAL,
        };
      case 503:
        return {
          cliError: createError('storage_unavailable', err.message, { status: err.status }, 'Try again in a moment'),
          exitCode: EXIT_GENERAL,
        };
      default:
        return {
          cliError: createError(err.status >= 500 ? 'server_error' : 'http_error', err.message, { status: err.status },
            err.status >= 500 ? 'Check server logs or try again later' : undefined),
          exitCode: EXIT_GENERAL,
        };
    }
  }

  const code = errorCode(err);
  if (code === 'ECONNREFUSED') {
    return {
      cliError: createError('connection_refused', 'Cannot connect to the geotask server', { errno: code },
        'Is the server running? Try: npm start'),
      exitCode: EXIT_NETWORK,
    };
  }
  if (code === 'ETIMEDOUT' || code === 'ENOTFOUND' || code === 'ECONNRESET' || code === 'EAI_AGAIN') {
    return {
      cliError: createError('network_error', 'Network connection failed', { errno: code },
        'Check your network connection and server URL'),
      exitCode: EXIT_NETWORK,
    };
  }

  if (err instanceof ZodError) {
    return {
      cliError: createError('unexpected_response', 'Server response did not have the expected shape', {
        issues: err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      }),
      exitCode: EXIT_GENERAL,
    };
  }

  if (err instanceof UsageError) {
    return {
      cliError: createError('invalid_arguments', err.message, undefined, 'Run the command with --help for usage'),
      exitCode: EXIT_GENERAL,
    };
  }

  const message = err instanceof Error ? err.message : String(err);
  return {
    cliError: createError('unknown_error', message || 'An unexpected error occurred'),
    exitCode: EXIT_GENERAL,
  };
}

export function handleError(err: unknown, json: boolean): never {
  const { cliError, exitCode } = toCliError(err);

  if (json) {
    console.log(JSON.stringify(cliError, null, 2));
  } else {
    console.error(`\nError: ${cliError.message}`);
    if (cliError.details) {
      console.error(`   Details: ${JSON.stringify(cliError.details, null, 2)}`);
    }
    if (cliError.suggestion) {
      console.error(`   ${cliError.suggestion}`);
    }
    console.error('');
  }

  process.exit(exitCode);
}

/**
 * Thrown by commands for bad local input, before any request is made.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
