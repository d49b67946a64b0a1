/**
 * Fallback for any path no router claimed. Registered after the routes and
 * before errorHandler.
 */
import type { Request, Response } from 'express';

export function notFound(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    message: `Route not found: ${req.method} ${req.originalUrl}`,
  });
}
