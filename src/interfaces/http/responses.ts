/**
 * Response Envelope
 * Layer: Interfaces (HTTP)
 *
 * Every JSON body the API sends has the same outer shape:
 *
 *   { success: true,  data, message? }
 *   { success: false, message }                                   (4xx)
 *   { success: false, message: 'Internal server error', error }   (5xx)
 *
 * STATUS_BY_KIND is the only place an error kind becomes a status code.
 * Client errors carry just the error's own message; raw database text only
 * ever reaches a client in the `error` field of a 500.
 */
import { logger } from '@core/logger';
import type { AppError, AppErrorKind } from '@shared/errors/AppError';
import type { Response } from 'express';

export interface ApiEnvelope<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
}

export const STATUS_BY_KIND = {
  InvalidParameter: 400,
  InvalidRating: 400,
  NotFound: 404,
  AmbiguousTarget: 409,
  PoolExhausted: 500,
  ConnectFailed: 500,
  ConnectionLost: 500,
  QueryError: 500,
  Internal: 500,
} as const satisfies Record<AppErrorKind, number>;

export function sendSuccess<T>(res: Response, data: T, message?: string): void {
  const body: ApiEnvelope<T> = { success: true, data };
  if (message !== undefined) body.message = message;
  res.status(200).json(body);
}

export function sendFailure(res: Response, err: AppError): void {
  const status = STATUS_BY_KIND[err.kind];

  if (status >= 500) {
    logger.error({ err, kind: err.kind }, 'Request failed');
    sendInternalError(res, err.message);
    return;
  }

  logger.warn({ kind: err.kind, status, message: err.message }, 'Request rejected');
  const body: ApiEnvelope = { success: false, message: err.message };
  res.status(status).json(body);
}

/** A 4xx raised by Express itself rather than by an AppError. */
export function sendClientError(res: Response, status: number, message: string): void {
  const body: ApiEnvelope = { success: false, message };
  res.status(status).json(body);
}

export function sendInternalError(res: Response, detail: string): void {
  const body: ApiEnvelope = { success: false, message: 'Internal server error', error: detail };
  res.status(500).json(body);
}
