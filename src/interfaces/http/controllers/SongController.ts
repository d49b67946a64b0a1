/**
 * Song Controller — HTTP Boundary for Lookup & Rating
 * Layer: Interfaces (HTTP)
 *
 * Thin on purpose: parse the path, query and body, call SongService, turn the
 * Result into an envelope. Validation rules, pagination maths and SQL live
 * below this layer.
 *
 * SongService is resolved once, when the routes module builds the controller.
 * The handlers are arrow-function properties so `this` survives being passed
 * to the router.
 */
import type { SongService } from '@application/services/SongService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { InvalidParameterError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';

import { pageQuerySchema, parseInput, rateBodySchema } from '../middleware/validation';
import { sendFailure, sendSuccess } from '../responses';

export class SongController {
  private service: SongService;

  constructor() {
    this.service = container.resolve<SongService>(TOKENS.SongService);
  }

  getSong = async (req: Request, res: Response): Promise<void> => {
    const query = parseInput(pageQuerySchema, req.query);
    if (!query.ok) return sendFailure(res, query.error);

    const result = await this.service.getSong(
      routeParam(req, 'title'),
      query.value.page,
      query.value.limit,
    );
    if (!result.ok) return sendFailure(res, result.error);

    const lookup = result.value;
    if (lookup.match === 'exact') {
      sendSuccess(res, lookup.song);
    } else {
      sendSuccess(res, lookup.results);
    }
  };

  rateSong = async (req: Request, res: Response): Promise<void> => {
    const body = parseInput(rateBodySchema, req.body);
    if (!body.ok) return sendFailure(res, body.error);

    const result = await this.service.rateSong(routeParam(req, 'title'), body.value.rating);
    if (!result.ok) return sendFailure(res, result.error);

    const confirmation = result.value;
    sendSuccess(
      res,
      confirmation,
      `Successfully rated '${confirmation.title}' with ${confirmation.rating} stars`,
    );
  };

  listSongs = async (req: Request, res: Response): Promise<void> => {
    const query = parseInput(pageQuerySchema, req.query);
    if (!query.ok) return sendFailure(res, query.error);

    const result = await this.service.listSongs(query.value.page, query.value.limit);
    if (!result.ok) return sendFailure(res, result.error);

    sendSuccess(res, result.value);
  };
}

/** Express has already percent-decoded the segment. */
function routeParam(req: Request, name: string): string {
  const raw: unknown = req.params[name];
  if (typeof raw !== 'string') {
    throw new InvalidParameterError(`Missing route parameter: ${name}`);
  }
  return raw;
}
