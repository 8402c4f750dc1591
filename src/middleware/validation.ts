import type { Request, Response } from 'express';
import type { z } from 'zod';

/**
 * Validate query parameters against a Zod schema.
 * Sends 400 with flattened errors and returns null if validation fails.
 */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.output<S> | null {
  const result = schema.safeParse(req.query);
  if (!result.success) {
    res.status(400).json({
      error: 'Invalid query parameters',
      details: result.error.flatten(),
    });
    return null;
  }
  return result.data;
}

/**
 * Validate route parameters against a Zod schema.
 * Sends 400 with flattened errors and returns null if validation fails.
 */
export function parseParams<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.output<S> | null {
  const result = schema.safeParse(req.params);
  if (!result.success) {
    res.status(400).json({
      error: 'Invalid route parameters',
      details: result.error.flatten(),
    });
    return null;
  }
  return result.data;
}
