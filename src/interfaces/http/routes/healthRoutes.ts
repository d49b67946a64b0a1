/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /health  →  { success: true, status: 'healthy', message: 'Music API is running' }
 *
 * Liveness only: answers as long as the worker's event loop is running and
 * never touches the database, so a load balancer probe cannot take a pool
 * connection away from real traffic.
 */
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    success: true,
    status: 'healthy',
    message: 'Music API is running',
  });
});

export { router as healthRoutes };
