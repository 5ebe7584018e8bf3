import { Router } from 'express';
import { Services } from '../services';
import { authenticate } from '../middleware/auth.middleware';
import { CategoryController } from '../controllers/category.controller';
import { ProductController } from '../controllers/product.controller';
import { OrderController } from '../controllers/order.controller';
import { UserController } from '../controllers/user.controller';
import { AuthController } from '../controllers/auth.controller';
import { createCategoryRoutes } from './api/categories.routes';
import { createProductRoutes } from './api/products.routes';
import { createOrderRoutes } from './api/orders.routes';
import { createUserRoutes } from './api/users.routes';
import { createAuthRoutes } from './api/auth.routes';
import { HealthCheckResponse } from '../types/api.types';

/**
 * API Routes Aggregator
 */
export function createRoutes(services: Services): Router {
  const router = Router();
  const requireSession = authenticate(services.authService);

  router.use('/api/categories', createCategoryRoutes(new CategoryController(services.categoryService)));
  router.use(
    '/api/products',
    createProductRoutes(new ProductController(services.productService), requireSession)
  );
  router.use('/api/orders', createOrderRoutes(new OrderController(services.orderService)));
  router.use('/api/users', createUserRoutes(new UserController(services.userService), requireSession));
  router.use(
    '/api/auth',
    createAuthRoutes(new AuthController(services.authService, services.userService), requireSession)
  );

  // Health check endpoint
  router.get('/health', (_req, res) => {
    const body: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
    res.status(200).json(body);
  });

  // API version info
  router.get('/api', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Store API',
    });
  });

  return router;
}
