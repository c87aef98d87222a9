/**
 * Request Body Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validateBody(schema)` returns a middleware that parses req.body with a Zod
 * schema before the controller runs:
 *
 *   router.post('/query', validateBody(askBodySchema), controller.ask);
 *
 * On success req.body is replaced with the parsed value (trimmed strings,
 * defaults applied). On failure a ValidationError (400) carries every issue
 * message joined with "; ", and the controller is never reached.
 */
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod';

import { ValidationError } from '@shared/errors/AppError';

export function validateBody<T extends z.ZodType>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});

    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message).join('; ');
      throw new ValidationError(messages);
    }

    req.body = result.data;
    next();
  };
}
