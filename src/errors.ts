export class HttpError extends Error {
  status: number;
  details?: unknown;
  code?: string;

  constructor(status: number, message: string, details?: unknown, code?: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.details = details;
    this.code = code;
  }
}

export function notFound(message = 'Not found'): HttpError {
  return new HttpError(404, message, undefined, 'NOT_FOUND');
}
