/**
 * Request body validation with Zod. On failure responds 400 with the first issue.
 * The parsed body is left in `res.locals.validatedBody`.
 */

import type { Request, Response, NextFunction } from 'express';
import type { ZodSchema } from 'zod';

export function validateBody<T>(schema: ZodSchema<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (result.success) {
      res.locals.validatedBody = result.data;
      next();
      return;
    }
    const first = result.error.issues[0];
    const message = first ? `${first.path.join('.')}: ${first.message}` : 'Invalid request body';
    res.status(400).json({ error: message });
  };
}
