import { OrderRepository } from '../repositories/order.repository';
import { ProductRepository } from '../repositories/product.repository';
import { UserRepository } from '../repositories/user.repository';
import {
  CreateOrderInput,
  CreateOrderOutcome,
  OrderDetails,
  OrderLineDraft,
  OrderPatch,
} from '../types/order.types';
import { AppError, ErrorCode, validationError } from '../types/error.types';
import { planOrderUpdate } from '../utils/order-status';
import { multiplyMoney, sumMoney } from '../utils/money';
import { componentLogger } from '../config/logger';

const logger = componentLogger('orders');

/**
 * Order Service
 *
 * Business logic for the order workflow. Stock is decremented only inside the
 * repository's atomic create call, so a rejected order never leaves partial
 * stock changes behind and concurrent orders cannot oversell.
 */
export class OrderService {
  constructor(
    private orderRepo: OrderRepository,
    private userRepo: UserRepository,
    private productRepo: ProductRepository
  ) {}

  async getAllOrders(): Promise<OrderDetails[]> {
    return this.orderRepo.findAll();
  }

  async getOrderById(id: number): Promise<OrderDetails | null> {
    logger.debug('Getting order', { id });
    return this.orderRepo.findById(id);
  }

  async getOrdersByUserId(userId: number): Promise<OrderDetails[]> {
    logger.debug('Getting orders for user', { userId });
    return this.orderRepo.findByUserId(userId);
  }

  /**
   * Create an order
   *
   * 1. Reject unknown users
   * 2. Price every line in caller order against the product as it is now,
   *    rejecting unknown products and quantities above the stock still
   *    available (earlier lines for the same product count against it)
   * 3. Decrement stock and insert the order in one atomic call
   * 4. Re-read the order through the read-side join
   *
   * Step 2 gives early, descriptive errors; step 3 is authoritative. If another
   * order consumed the stock in between, the atomic call is rejected as a
   * whole and reported as insufficient stock.
   */
  async createOrder(input: CreateOrderInput): Promise<OrderDetails> {
    logger.info('Creating order', { userId: input.userId, lines: input.items.length });

    if (!(await this.userRepo.exists(input.userId))) {
      throw this.userMissing(input.userId);
    }

    if (input.items.length === 0) {
      throw validationError(ErrorCode.VALIDATION_ERROR, 'Order must contain at least one item');
    }

    const lines: OrderLineDraft[] = [];
    const requested = new Map<number, number>();

    for (const item of input.items) {
      const product = await this.productRepo.findById(item.productId);
      if (!product) {
        throw this.productMissing(item.productId);
      }

      const alreadyRequested = requested.get(product.id) ?? 0;
      const available = product.stock - alreadyRequested;
      if (item.quantity > available) {
        throw this.insufficientStock(product.id, product.name, available, item.quantity);
      }

      requested.set(product.id, alreadyRequested + item.quantity);
      lines.push({
        productId: product.id,
        quantity: item.quantity,
        unitPrice: product.price,
        subtotal: multiplyMoney(product.price, item.quantity),
      });
    }

    const totalAmount = sumMoney(lines.map((line) => line.subtotal));

    const outcome = await this.orderRepo.createAtomic({
      userId: input.userId,
      shippingAddress: input.shippingAddress,
      totalAmount,
      items: lines,
    });

    if (outcome.status !== 'created') {
      throw await this.rejection(outcome, lines);
    }

    logger.info('Order created successfully', {
      orderId: outcome.orderId,
      userId: input.userId,
      totalAmount,
    });

    const order = await this.orderRepo.findById(outcome.orderId);
    if (!order) {
      throw new AppError(ErrorCode.INTERNAL_ERROR, 'Order created but not found', 500, {
        orderId: outcome.orderId,
      });
    }

    return order;
  }

  /**
   * Update shipping address and/or status. Returns null when the order does
   * not exist; an unknown status is rejected before anything is written.
   */
  async updateOrder(id: number, patch: OrderPatch): Promise<OrderDetails | null> {
    logger.info('Updating order', { id, status: patch.status });

    const existing = await this.orderRepo.findById(id);
    if (!existing) return null;

    const changes = planOrderUpdate(existing, patch, new Date());

    const updated = await this.orderRepo.update(id, changes);

    if (updated && updated.status !== existing.status) {
      logger.info('Order status changed', { id, from: existing.status, to: updated.status });
    }

    return updated;
  }

  /**
   * Hard delete; items cascade and stock is not restored
   */
  async deleteOrder(id: number): Promise<boolean> {
    const deleted = await this.orderRepo.delete(id);
    if (deleted) logger.info('Order deleted', { id });
    return deleted;
  }

  private async rejection(
    outcome: Exclude<CreateOrderOutcome, { status: 'created' }>,
    lines: OrderLineDraft[]
  ): Promise<AppError> {
    logger.debug('Atomic order creation rejected', { ...outcome });

    switch (outcome.status) {
      case 'user_not_found':
        return this.userMissing(outcome.userId);
      case 'product_not_found':
        return this.productMissing(outcome.productId);
      case 'insufficient_stock': {
        // Stock moved since the lines were priced: report what is left now
        const product = await this.productRepo.findById(outcome.productId);
        if (!product) return this.productMissing(outcome.productId);
        const requested = lines
          .filter((line) => line.productId === outcome.productId)
          .reduce((sum, line) => sum + line.quantity, 0);
        return this.insufficientStock(product.id, product.name, product.stock, requested);
      }
    }
  }

  private userMissing(userId: number): AppError {
    return validationError(ErrorCode.INVALID_REFERENCE, `User with ID ${userId} does not exist.`, {
      userId,
    });
  }

  private productMissing(productId: number): AppError {
    return validationError(
      ErrorCode.INVALID_REFERENCE,
      `Product with ID ${productId} does not exist.`,
      { productId }
    );
  }

  private insufficientStock(
    productId: number,
    productName: string,
    available: number,
    requested: number
  ): AppError {
    return validationError(
      ErrorCode.INSUFFICIENT_STOCK,
      `Insufficient stock for product ${productName}. Available: ${available}`,
      { productId, available, requested }
    );
  }
}
