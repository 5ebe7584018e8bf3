import { Request, Response } from 'express';
import { AuthService } from '../services/auth.service';
import { UserService } from '../services/user.service';
import { RegisterBody } from '../validators/user.validator';
import { ErrorCode } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { toText } from '../utils/request';

/**
 * Auth Controller
 */
export class AuthController {
  constructor(
    private authService: AuthService,
    private userService: UserService
  ) {}

  /**
   * POST /api/auth/register
   */
  register = asyncHandler(async (req: Request, res: Response) => {
    const body: RegisterBody = req.body;

    const user = await this.userService.createUser(body);

    res.location(`/api/users/${user.id}`).status(201).json(user);
  });

  /**
   * POST /api/auth/login
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const email = toText(req.body.email).trim();
    const password = toText(req.body.password);

    if (!email || !password.trim()) {
      res
        .status(400)
        .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Email and password are required.'));
      return;
    }

    const result = await this.authService.login(email, password);

    if (!result) {
      res
        .status(401)
        .json(createErrorResponse(ErrorCode.UNAUTHORIZED, 'Invalid email or password.'));
      return;
    }

    res.status(200).json(result);
  });

  /**
   * POST /api/auth/logout
   */
  logout = asyncHandler(async (req: Request, res: Response) => {
    if (req.sessionToken) {
      await this.authService.logout(req.sessionToken);
    }

    res.status(204).send();
  });
}
