/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * The backstop at the end of the middleware chain. Controllers normally
 * answer errors themselves from a Result; what lands here is whatever was
 * thrown instead (Express 5 forwards rejected async handlers on its own):
 *
 *   - a body express.json() could not parse → 400 InvalidParameter
 *   - a path segment that is not valid percent-encoding → 400 InvalidParameter
 *   - any other Express / body-parser error carrying a 4xx `status`
 *     (413 body too large, 415 unsupported charset) → that status
 *   - an AppError                            → its kind's status
 *   - anything else (a bug)                  → 500, detail in `error`
 *
 * Express only treats a middleware as an error handler when it declares all
 * four parameters, hence the unused `_next`.
 */
import { logger } from '@core/logger';
import { AppError, InvalidParameterError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

import { sendClientError, sendFailure, sendInternalError } from '../responses';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (isBodyParseError(err)) {
    sendFailure(res, new InvalidParameterError('Request body is not valid JSON'));
    return;
  }

  if (err instanceof URIError) {
    sendFailure(res, new InvalidParameterError('Request path is not valid percent-encoding'));
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    const message = err instanceof Error ? err.message : 'Bad request';
    logger.warn({ status: clientStatus, message }, 'Request rejected');
    sendClientError(res, clientStatus, message);
    return;
  }

  if (err instanceof AppError) {
    sendFailure(res, err);
    return;
  }

  logger.error({ err }, 'Unhandled error');
  sendInternalError(res, err instanceof Error ? err.message : String(err));
}

/** body-parser tags JSON syntax errors with `type: 'entity.parse.failed'`. */
function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

/** http-errors (used by Express and body-parser) sets `status` and `statusCode`. */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status: unknown =
    'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status > 499) return null;
  return status;
}
