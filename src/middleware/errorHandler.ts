import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { QueryFailedError } from 'typeorm';
import { HttpError, notFound } from '../errors';
import { logger } from '../logger';
import { config } from '../config';

type ErrorBody = {
  error: {
    message: string;
    code?: string;
    fields?: { path: string; message: string }[];
    status?: number;
    details?: unknown;
  };
};

// body-parser and friends attach an http status to the errors they raise
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function normalize(err: unknown): HttpError {
  if (err instanceof HttpError) return err;
  if (err instanceof ZodError) {
    return new HttpError(422, 'Invalid request data', err.issues, 'INVALID_INPUT');
  }
  if (err instanceof QueryFailedError) {
    return new HttpError(500, 'Storage failure', err, 'STORAGE_FAILURE');
  }
  const status = clientStatus(err);
  if (status !== undefined && err instanceof Error) {
    return new HttpError(status, err.message);
  }
  return new HttpError(500, 'Internal Server Error', err);
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(notFound(`Route ${req.method} ${req.path} not found`));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const handled = normalize(err);
  const isProduction = config.env === 'production';

  const body: ErrorBody = { error: { message: handled.message } };
  if (handled.code) body.error.code = handled.code;

  if (err instanceof ZodError) {
    body.error.fields = err.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
  }

  if (!isProduction) {
    body.error.status = handled.status;
    const details = handled.details;
    if (details !== undefined && !(err instanceof ZodError)) {
      body.error.details = details instanceof Error ? { message: details.message, stack: details.stack } : details;
    }
  }

  if (handled.status >= 500) {
    logger.error({ err, method: req.method, path: req.originalUrl }, handled.message);
  } else {
    logger.warn({ status: handled.status, method: req.method, path: req.originalUrl }, handled.message);
  }

  res.status(handled.status).json(body);
}
