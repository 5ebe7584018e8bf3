import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '../services/auth.service';
import { UserRole } from '../types/user.types';
import { ErrorCode } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';
import { bearerToken } from '../utils/session-token';
import { asyncHandler } from '../utils/async-handler';

/**
 * Resolve `Authorization: Bearer <token>` to a user, or answer 401
 */
export const authenticate = (authService: AuthService): RequestHandler =>
  asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req.headers.authorization);
    const user = token ? await authService.authenticate(token) : null;

    if (!token || !user) {
      res
        .status(401)
        .json(createErrorResponse(ErrorCode.UNAUTHORIZED, 'Authentication is required.'));
      return;
    }

    req.user = user;
    req.sessionToken = token;
    next();
  });

/**
 * Allow only the listed roles; must run after authenticate
 */
export const requireRole = (...roles: UserRole[]): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.user) {
      res
        .status(401)
        .json(createErrorResponse(ErrorCode.UNAUTHORIZED, 'Authentication is required.'));
      return;
    }

    if (!roles.includes(req.user.role)) {
      res
        .status(403)
        .json(
          createErrorResponse(ErrorCode.FORBIDDEN, 'You do not have permission to perform this action.', {
            requiredRoles: roles,
          })
        );
      return;
    }

    next();
  };
};
