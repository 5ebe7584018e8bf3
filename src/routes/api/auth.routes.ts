import { Router, RequestHandler } from 'express';
import { AuthController } from '../../controllers/auth.controller';
import { validate } from '../../middleware/validation.middleware';
import { loginSchema, registerSchema } from '../../validators/user.validator';

/**
 * Auth routes
 */
export function createAuthRoutes(authController: AuthController, authenticate: RequestHandler): Router {
  const router = Router();

  /**
   * @swagger
   * /api/auth/register:
   *   post:
   *     summary: Register a new user
   *     tags: [Auth]
   *     responses:
   *       201:
   *         description: User created
   *       400:
   *         description: Invalid body or email already taken
   */
  router.post('/register', validate(registerSchema), authController.register);

  /**
   * @swagger
   * /api/auth/login:
   *   post:
   *     summary: Exchange email and password for a bearer token
   *     tags: [Auth]
   *     responses:
   *       200:
   *         description: Token, lifetime in seconds and the user
   *       400:
   *         description: Email or password missing
   *       401:
   *         description: Invalid email or password
   */
  router.post('/login', validate(loginSchema), authController.login);

  /**
   * @swagger
   * /api/auth/logout:
   *   post:
   *     summary: Revoke the presented bearer token
   *     tags: [Auth]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       204:
   *         description: Session revoked
   */
  router.post('/logout', authenticate, authController.logout);

  return router;
}
