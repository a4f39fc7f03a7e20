/**
 * Raised before any work item runs: missing credentials, worksheet or columns.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Raised by the API clients when a response carries an unexpected status.
 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly operation: string;
  readonly body: string;

  constructor(operation: string, status: number, body: unknown) {
    const text = stringifyBody(body);
    super(`${operation} failed with status ${status}${text ? `: ${text}` : ''}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.operation = operation;
    this.body = text;
  }
}

function stringifyBody(body: unknown): string {
  if (body === undefined || body === null || body === '') return '';
  if (typeof body === 'string') return body.slice(0, 500);
  try {
    return JSON.stringify(body).slice(0, 500);
  } catch {
    return String(body);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
