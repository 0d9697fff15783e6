export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export function conflict(message: string, details?: unknown): HttpError {
  return new HttpError(409, message, details);
}

/** Unknown broker or file format requested for an import. */
export class ImportFormatError extends HttpError {
  constructor(message: string, readonly supported: string[]) {
    super(400, message, { supported });
  }
}

/** An uploaded or local import file that is not readable CSV. */
export class UnreadableCsvError extends HttpError {
  constructor(cause: string) {
    super(400, `unreadable CSV: ${cause}`);
  }
}

type PgErrorLike = {
  code: string;
  detail?: string;
};

export function isPgError(error: unknown): error is PgErrorLike {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
