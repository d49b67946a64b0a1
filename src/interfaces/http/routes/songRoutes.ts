/**
 * Song Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api` in app.ts:
 *
 *   GET  /api/song/3AM?page=1&limit=10   →  controller.getSong
 *   POST /api/song/3AM/rate              →  controller.rateSong
 *   GET  /api/songs?page=2               →  controller.listSongs
 *
 * The rate body is read as JSON whatever its Content-Type; app.ts only parses
 * bodies declared as application/json.
 */
import { SongController } from '@interfaces/http/controllers/SongController';
import express, { Router } from 'express';

const router = Router();
const controller = new SongController();

router.get('/song/:title', controller.getSong);
router.post('/song/:title/rate', express.json({ type: () => true }), controller.rateSong);
router.get('/songs', controller.listSongs);

export { router as songRoutes };
