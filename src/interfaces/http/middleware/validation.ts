/**
 * Request Input Parsing
 * Layer: Interfaces (HTTP)
 *
 * Controllers run query strings and bodies through a Zod schema before
 * calling a service. Failures come back as an InvalidParameterError value
 * (never thrown), so the controller handles them on the same path as every
 * other error:
 *
 *   const query = parseInput(pageQuerySchema, req.query);
 *   if (!query.ok) return sendFailure(res, query.error);
 *
 * Range rules (page ≥ 1, rating 0–5) belong to SongService; the schemas here
 * only get values into the right type.
 */
import { InvalidParameterError } from '@shared/errors/AppError';
import { fail, ok, type Result } from '@shared/result';
import { z } from 'zod/v4';

export function parseInput<T extends z.ZodType>(
  schema: T,
  input: unknown,
): Result<z.output<T>, InvalidParameterError> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message).join('; ');
    return fail(new InvalidParameterError(messages));
  }

  return ok(result.data);
}

/** ?page & ?limit; "abc" fails here, "0" or "2.5" reach the service and fail there. */
export const pageQuerySchema = z.object({
  page: z.coerce.number({ error: 'Page must be a positive integer' }).optional(),
  limit: z.coerce.number({ error: 'Limit must be a positive integer' }).optional(),
});

/** An empty body and `{}` both count as no body at all. */
export const rateBodySchema = z.preprocess(
  (body) => (isEmptyObject(body) ? undefined : body),
  z.object(
    {
      rating: z.number({
        error: (issue) =>
          issue.input === undefined
            ? 'Rating is required'
            : 'Rating must be a number between 0 and 5',
      }),
    },
    { error: 'Request body is required' },
  ),
);

function isEmptyObject(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 0
  );
}
