import { Router } from 'express';
import { CategoryController } from '../../controllers/category.controller';
import { validate } from '../../middleware/validation.middleware';
import {
  createCategorySchema,
  getCategorySchema,
  updateCategorySchema,
} from '../../validators/category.validator';

/**
 * Category routes
 */
export function createCategoryRoutes(categoryController: CategoryController): Router {
  const router = Router();

  /**
   * @swagger
   * /api/categories:
   *   get:
   *     summary: List categories with their product counts
   *     tags: [Categories]
   *     responses:
   *       200:
   *         description: All categories
   */
  router.get('/', categoryController.getCategories);

  /**
   * @swagger
   * /api/categories/{id}:
   *   get:
   *     summary: Get category by ID
   *     tags: [Categories]
   *     responses:
   *       200:
   *         description: Category retrieved successfully
   *       404:
   *         description: Category not found
   */
  router.get('/:id', validate(getCategorySchema), categoryController.getCategory);

  /**
   * @swagger
   * /api/categories:
   *   post:
   *     summary: Create a category
   *     tags: [Categories]
   *     responses:
   *       201:
   *         description: Category created
   */
  router.post('/', validate(createCategorySchema), categoryController.createCategory);

  /**
   * @swagger
   * /api/categories/{id}:
   *   put:
   *     summary: Partially update a category
   *     tags: [Categories]
   *     responses:
   *       200:
   *         description: Category updated
   *       404:
   *         description: Category not found
   */
  router.put('/:id', validate(updateCategorySchema), categoryController.updateCategory);

  /**
   * @swagger
   * /api/categories/{id}:
   *   delete:
   *     summary: Delete a category without products
   *     tags: [Categories]
   *     responses:
   *       204:
   *         description: Category deleted
   *       404:
   *         description: Category not found
   *       409:
   *         description: Category still has products
   */
  router.delete('/:id', validate(getCategorySchema), categoryController.deleteCategory);

  return router;
}
