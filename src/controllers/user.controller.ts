import { Request, Response } from 'express';
import { UserService } from '../services/user.service';
import { UpdateUserBody } from '../validators/user.validator';
import { ErrorCode } from '../types/error.types';
import { notFoundResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { toInt } from '../utils/request';

/**
 * User Controller
 *
 * Account administration; registration lives in the auth controller
 */
export class UserController {
  constructor(private userService: UserService) {}

  getUsers = asyncHandler(async (_req: Request, res: Response) => {
    res.status(200).json(await this.userService.getAllUsers());
  });

  getUser = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);

    const user = await this.userService.getUserById(id);

    if (!user) {
      res.status(404).json(notFoundResponse(ErrorCode.USER_NOT_FOUND, 'User', id));
      return;
    }

    res.status(200).json(user);
  });

  updateUser = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);
    const body: UpdateUserBody = req.body;

    const user = await this.userService.updateUser(id, body);

    if (!user) {
      res.status(404).json(notFoundResponse(ErrorCode.USER_NOT_FOUND, 'User', id));
      return;
    }

    res.status(200).json(user);
  });

  deleteUser = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);

    if (!(await this.userService.deleteUser(id))) {
      res.status(404).json(notFoundResponse(ErrorCode.USER_NOT_FOUND, 'User', id));
      return;
    }

    res.status(204).send();
  });
}
