import { Router } from 'express';
import { OrderController } from '../../controllers/order.controller';
import { validate } from '../../middleware/validation.middleware';
import {
  createOrderSchema,
  getOrderSchema,
  ordersByUserSchema,
  updateOrderSchema,
} from '../../validators/order.validator';

/**
 * Order routes
 */
export function createOrderRoutes(orderController: OrderController): Router {
  const router = Router();

  /**
   * @swagger
   * /api/orders:
   *   get:
   *     summary: List all orders
   *     tags: [Orders]
   *     responses:
   *       200:
   *         description: Orders with buyer and product names
   */
  router.get('/', orderController.getOrders);

  /**
   * @swagger
   * /api/orders/user/{userId}:
   *   get:
   *     summary: List the orders of one user
   *     tags: [Orders]
   *     parameters:
   *       - in: path
   *         name: userId
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Orders of the user (possibly empty)
   */
  router.get('/user/:userId', validate(ordersByUserSchema), orderController.getOrdersByUser);

  /**
   * @swagger
   * /api/orders/{id}:
   *   get:
   *     summary: Get order by ID
   *     tags: [Orders]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Order retrieved successfully
   *       404:
   *         description: Order not found
   */
  router.get('/:id', validate(getOrderSchema), orderController.getOrder);

  /**
   * @swagger
   * /api/orders:
   *   post:
   *     summary: Create an order and decrement stock atomically
   *     tags: [Orders]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [userId, shippingAddress, orderItems]
   *             properties:
   *               userId:
   *                 type: integer
   *               shippingAddress:
   *                 type: string
   *               orderItems:
   *                 type: array
   *                 minItems: 1
   *                 items:
   *                   type: object
   *                   properties:
   *                     productId:
   *                       type: integer
   *                     quantity:
   *                       type: integer
   *                       minimum: 1
   *     responses:
   *       201:
   *         description: Order created; Location points at the new order
   *       400:
   *         description: Unknown user or product, or insufficient stock
   */
  router.post('/', validate(createOrderSchema), orderController.createOrder);

  /**
   * @swagger
   * /api/orders/{id}:
   *   put:
   *     summary: Update shipping address and/or status
   *     tags: [Orders]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               shippingAddress:
   *                 type: string
   *               status:
   *                 type: string
   *                 enum: [Pending, Processing, Shipped, Delivered, Cancelled]
   *     responses:
   *       200:
   *         description: Order updated
   *       400:
   *         description: Invalid status
   *       404:
   *         description: Order not found
   */
  router.put('/:id', validate(updateOrderSchema), orderController.updateOrder);

  /**
   * @swagger
   * /api/orders/{id}:
   *   delete:
   *     summary: Delete an order and its items
   *     tags: [Orders]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       204:
   *         description: Order deleted
   *       404:
   *         description: Order not found
   */
  router.delete('/:id', validate(getOrderSchema), orderController.deleteOrder);

  return router;
}
