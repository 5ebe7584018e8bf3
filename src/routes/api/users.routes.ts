import { Router, RequestHandler } from 'express';
import { UserController } from '../../controllers/user.controller';
import { validate } from '../../middleware/validation.middleware';
import { requireRole } from '../../middleware/auth.middleware';
import { UserRole } from '../../types/user.types';
import { getUserSchema, updateUserSchema } from '../../validators/user.validator';

/**
 * User administration routes (Admin only)
 */
export function createUserRoutes(userController: UserController, authenticate: RequestHandler): Router {
  const router = Router();

  router.use(authenticate, requireRole(UserRole.ADMIN));

  /**
   * @swagger
   * /api/users:
   *   get:
   *     summary: List users (Admin)
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: All users
   */
  router.get('/', userController.getUsers);

  /**
   * @swagger
   * /api/users/{id}:
   *   get:
   *     summary: Get user by ID (Admin)
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: User retrieved successfully
   *       404:
   *         description: User not found
   */
  router.get('/:id', validate(getUserSchema), userController.getUser);

  /**
   * @swagger
   * /api/users/{id}:
   *   put:
   *     summary: Partially update a user (Admin)
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: User updated
   *       400:
   *         description: Email already taken
   *       404:
   *         description: User not found
   */
  router.put('/:id', validate(updateUserSchema), userController.updateUser);

  /**
   * @swagger
   * /api/users/{id}:
   *   delete:
   *     summary: Delete a user (Admin)
   *     tags: [Users]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       204:
   *         description: User deleted
   *       404:
   *         description: User not found
   */
  router.delete('/:id', validate(getUserSchema), userController.deleteUser);

  return router;
}
