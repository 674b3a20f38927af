/**
 * `validate(schema)` parses `req.body` with a zod schema and replaces it with
 * the parsed output, so controllers read transformed values (a DateInterval,
 * not two strings). Express 5 exposes `req.query` as a getter; only the body
 * is replaced.
 *
 * Issues are joined as `path: message` into one ValidationError (400).
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

function formatIssues(issues: z.ZodError['issues']): string {
  return issues
    .map((issue) => {
      const field = issue.path.map(String).join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export function validate<T extends z.ZodType>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) throw new ValidationError(formatIssues(result.error.issues));

    req.body = result.data;
    next();
  };
}
