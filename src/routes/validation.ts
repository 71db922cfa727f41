import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { InvalidRequestError } from '../errors';

export const phoneNumberSchema = z
  .string()
  .trim()
  .refine((value) => value.replace(/\D/g, '').length >= 7, 'phoneNumber must contain at least 7 digits');

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new InvalidRequestError(
      'request body failed validation',
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return parsed.data;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler.
export function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}
