import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AnyZodObject, ZodError } from 'zod';
import { createErrorResponse } from '../utils/response-factory';
import { ErrorCode } from '../types/error.types';
import { asyncHandler } from '../utils/async-handler';

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Flatten zod issues. Request schemas nest fields under body/params/query,
 * which is left out of the reported field name.
 */
export const toFieldErrors = (error: ZodError): FieldError[] =>
  error.errors.map((issue) => ({
    field: issue.path.slice(1).join('.') || issue.path.join('.'),
    message: issue.message,
  }));

/**
 * 400 body naming the first failing field, with every failure under details.errors
 */
export const validationFailure = (error: ZodError) => {
  const errors = toFieldErrors(error);
  const first = errors[0];
  const message = first ? (first.field ? `${first.field}: ${first.message}` : first.message) : 'Validation failed';

  return createErrorResponse(ErrorCode.VALIDATION_ERROR, message, { errors });
};

/**
 * Validates body, params and query against a zod schema. The parsed body
 * (trimmed, defaults applied, unknown keys dropped) replaces req.body.
 *
 * ```typescript
 * router.post('/', validate(createOrderSchema), orderController.createOrder);
 * ```
 */
export const validate = (schema: AnyZodObject): RequestHandler =>
  asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const result = await schema.safeParseAsync({
      body: req.body,
      params: req.params,
      query: req.query,
    });

    if (!result.success) {
      res.status(400).json(validationFailure(result.error));
      return;
    }

    if (result.data['body'] !== undefined) {
      req.body = result.data['body'];
    }
    next();
  });
