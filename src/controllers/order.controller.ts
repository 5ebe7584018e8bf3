import { Request, Response } from 'express';
import { OrderService } from '../services/order.service';
import { CreateOrderBody, UpdateOrderBody } from '../validators/order.validator';
import { ErrorCode } from '../types/error.types';
import { notFoundResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { toInt } from '../utils/request';

/**
 * Order Controller
 *
 * HTTP request handlers for order endpoints
 */
export class OrderController {
  constructor(private orderService: OrderService) {}

  /**
   * GET /api/orders
   */
  getOrders = asyncHandler(async (_req: Request, res: Response) => {
    const orders = await this.orderService.getAllOrders();

    res.status(200).json(orders);
  });

  /**
   * GET /api/orders/:id
   */
  getOrder = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);

    const order = await this.orderService.getOrderById(id);

    if (!order) {
      res.status(404).json(notFoundResponse(ErrorCode.ORDER_NOT_FOUND, 'Order', id));
      return;
    }

    res.status(200).json(order);
  });

  /**
   * GET /api/orders/user/:userId
   */
  getOrdersByUser = asyncHandler(async (req: Request, res: Response) => {
    const userId = toInt(req.params['userId'], 0);

    const orders = await this.orderService.getOrdersByUserId(userId);

    res.status(200).json(orders);
  });

  /**
   * POST /api/orders
   * Create an order and reserve its stock
   */
  createOrder = asyncHandler(async (req: Request, res: Response) => {
    const body: CreateOrderBody = req.body;

    const order = await this.orderService.createOrder({
      userId: body.userId,
      shippingAddress: body.shippingAddress,
      items: body.orderItems,
    });

    res.location(`/api/orders/${order.id}`).status(201).json(order);
  });

  /**
   * PUT /api/orders/:id
   * Change shipping address and/or status
   */
  updateOrder = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);
    const body: UpdateOrderBody = req.body;

    const order = await this.orderService.updateOrder(id, body);

    if (!order) {
      res.status(404).json(notFoundResponse(ErrorCode.ORDER_NOT_FOUND, 'Order', id));
      return;
    }

    res.status(200).json(order);
  });

  /**
   * DELETE /api/orders/:id
   */
  deleteOrder = asyncHandler(async (req: Request, res: Response) => {
    const id = toInt(req.params['id'], 0);

    const deleted = await this.orderService.deleteOrder(id);

    if (!deleted) {
      res.status(404).json(notFoundResponse(ErrorCode.ORDER_NOT_FOUND, 'Order', id));
      return;
    }

    res.status(204).send();
  });
}
