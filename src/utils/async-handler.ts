import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forwards a rejected handler promise to the error middleware; Express 4
 * leaves async rejections unhandled otherwise.
 *
 * ```typescript
 * getOrder = asyncHandler(async (req, res) => {
 *   res.json(await this.orderService.getOrderById(toInt(req.params['id'], 0)));
 * });
 * ```
 */
export const asyncHandler =
  (handler: AsyncRequestHandler): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };
