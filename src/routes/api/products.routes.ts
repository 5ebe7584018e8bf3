import { Router, RequestHandler } from 'express';
import { ProductController } from '../../controllers/product.controller';
import { validate } from '../../middleware/validation.middleware';
import { requireRole } from '../../middleware/auth.middleware';
import { UserRole } from '../../types/user.types';
import {
  createProductSchema,
  getProductSchema,
  listProductsPageSchema,
  productsByCategorySchema,
  searchProductsSchema,
  updateProductSchema,
} from '../../validators/product.validator';

/**
 * Product routes
 *
 * Reads are public. Writes need a bearer session: Manager or Admin to
 * create/update, Admin to delete.
 */
export function createProductRoutes(
  productController: ProductController,
  authenticate: RequestHandler
): Router {
  const router = Router();

  /**
   * @swagger
   * /api/products:
   *   get:
   *     summary: List all products
   *     tags: [Products]
   *     responses:
   *       200:
   *         description: All products
   */
  router.get('/', productController.getProducts);

  /**
   * @swagger
   * /api/products/paged:
   *   get:
   *     summary: List products one page at a time
   *     tags: [Products]
   *     parameters:
   *       - in: query
   *         name: pageNumber
   *         schema:
   *           type: integer
   *           minimum: 1
   *       - in: query
   *         name: pageSize
   *         schema:
   *           type: integer
   *           minimum: 1
   *           maximum: 100
   *     responses:
   *       200:
   *         description: Page of products with totalCount and totalPages
   */
  router.get('/paged', validate(listProductsPageSchema), productController.getProductsPage);

  /**
   * @swagger
   * /api/products/search:
   *   get:
   *     summary: Case-insensitive name search
   *     tags: [Products]
   *     parameters:
   *       - in: query
   *         name: name
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Matching products; a blank term matches nothing
   */
  router.get('/search', validate(searchProductsSchema), productController.searchProducts);

  /**
   * @swagger
   * /api/products/search/paged:
   *   get:
   *     summary: Paged name search
   *     tags: [Products]
   *     responses:
   *       200:
   *         description: Page of matching products
   */
  router.get('/search/paged', validate(searchProductsSchema), productController.searchProductsPage);

  /**
   * @swagger
   * /api/products/category/{categoryId}:
   *   get:
   *     summary: List the products of one category
   *     tags: [Products]
   *     responses:
   *       200:
   *         description: Products in the category
   */
  router.get(
    '/category/:categoryId',
    validate(productsByCategorySchema),
    productController.getProductsByCategory
  );

  /**
   * @swagger
   * /api/products/{id}:
   *   get:
   *     summary: Get product by ID
   *     tags: [Products]
   *     responses:
   *       200:
   *         description: Product retrieved successfully
   *       404:
   *         description: Product not found
   */
  router.get('/:id', validate(getProductSchema), productController.getProduct);

  /**
   * @swagger
   * /api/products:
   *   post:
   *     summary: Create a product (Manager, Admin)
   *     tags: [Products]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       201:
   *         description: Product created
   *       400:
   *         description: Invalid body or unknown category
   */
  router.post(
    '/',
    authenticate,
    requireRole(UserRole.MANAGER, UserRole.ADMIN),
    validate(createProductSchema),
    productController.createProduct
  );

  /**
   * @swagger
   * /api/products/{id}:
   *   put:
   *     summary: Partially update a product (Manager, Admin)
   *     tags: [Products]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       200:
   *         description: Product updated
   *       404:
   *         description: Product not found
   */
  router.put(
    '/:id',
    authenticate,
    requireRole(UserRole.MANAGER, UserRole.ADMIN),
    validate(updateProductSchema),
    productController.updateProduct
  );

  /**
   * @swagger
   * /api/products/{id}:
   *   delete:
   *     summary: Delete a product (Admin)
   *     tags: [Products]
   *     security:
   *       - bearerAuth: []
   *     responses:
   *       204:
   *         description: Product deleted
   *       404:
   *         description: Product not found
   *       409:
   *         description: Product is referenced by orders
   */
  router.delete(
    '/:id',
    authenticate,
    requireRole(UserRole.ADMIN),
    validate(getProductSchema),
    productController.deleteProduct
  );

  return router;
}
