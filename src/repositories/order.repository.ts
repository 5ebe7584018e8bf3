import { SupabaseClient } from '@supabase/supabase-js';
import {
  CreateOrderOutcome,
  CreateOrderParams,
  OrderChanges,
  OrderDetails,
  OrderItemDetails,
  OrderItemRow,
  OrderRow,
} from '../types/order.types';
import { databaseError, NO_ROWS, PostgrestErrorLike } from './supabase-errors';
import { parseOrderStatus } from '../utils/order-status';
import { parseMoney } from '../utils/money';
import { logger } from '../config/logger';

export interface OrderRepository {
  findAll(): Promise<OrderDetails[]>;
  findById(id: number): Promise<OrderDetails | null>;
  findByUserId(userId: number): Promise<OrderDetails[]>;
  createAtomic(params: CreateOrderParams): Promise<CreateOrderOutcome>;
  update(id: number, changes: OrderChanges): Promise<OrderDetails | null>;
  delete(id: number): Promise<boolean>;
}

// Read-side join: buyer name and current product names
const ORDER_DETAILS_SELECT = `
  id, user_id, total_amount, status, shipping_address, order_date, shipped_date, delivered_date,
  users ( first_name, last_name ),
  order_items ( id, product_id, quantity, unit_price, subtotal, products ( name ) )
`;

// SQLSTATEs raised by create_order_atomic, DETAIL carries the offending id
const USER_NOT_FOUND = 'ST001';
const PRODUCT_NOT_FOUND = 'ST002';
const INSUFFICIENT_STOCK = 'ST003';

/**
 * Order Repository
 *
 * Handles all database operations for orders and order_items tables
 */
export class SupabaseOrderRepository implements OrderRepository {
  constructor(private client: SupabaseClient) {}

  async findAll(): Promise<OrderDetails[]> {
    const { data, error } = await this.client
      .from('orders')
      .select(ORDER_DETAILS_SELECT)
      .order('id')
      .order('id', { referencedTable: 'order_items' })
      .returns<OrderRow[]>();

    if (error) throw databaseError('list orders', error);

    return (data ?? []).map((row) => this.mapToOrder(row));
  }

  async findById(id: number): Promise<OrderDetails | null> {
    const { data, error } = await this.client
      .from('orders')
      .select(ORDER_DETAILS_SELECT)
      .eq('id', id)
      .order('id', { referencedTable: 'order_items' })
      .returns<OrderRow[]>()
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw databaseError('find order', error, { id });
    }

    return data ? this.mapToOrder(data) : null;
  }

  async findByUserId(userId: number): Promise<OrderDetails[]> {
    const { data, error } = await this.client
      .from('orders')
      .select(ORDER_DETAILS_SELECT)
      .eq('user_id', userId)
      .order('id')
      .order('id', { referencedTable: 'order_items' })
      .returns<OrderRow[]>();

    if (error) throw databaseError('list orders by user', error, { userId });

    return (data ?? []).map((row) => this.mapToOrder(row));
  }

  /**
   * Create an order and decrement stock in one transaction
   *
   * Uses the create_order_atomic PostgreSQL function which, for every line:
   * 1. Runs UPDATE products SET stock = stock - qty WHERE id = ? AND stock >= qty
   * 2. Raises when no row was updated (product gone or stock too low)
   * and then inserts the order and its items.
   *
   * A raise aborts the function's transaction, so a failed call leaves every
   * product's stock untouched. The row locks taken by the UPDATE serialize
   * concurrent orders for the same product.
   */
  async createAtomic(params: CreateOrderParams): Promise<CreateOrderOutcome> {
    logger.debug('Creating order atomically', {
      userId: params.userId,
      lines: params.items.length,
      totalAmount: params.totalAmount,
    });

    const { data: orderId, error } = await this.client.rpc('create_order_atomic', {
      p_user_id: params.userId,
      p_shipping_address: params.shippingAddress,
      p_total_amount: params.totalAmount,
      p_items: params.items.map((item) => ({
        product_id: item.productId,
        quantity: item.quantity,
        unit_price: item.unitPrice,
        subtotal: item.subtotal,
      })),
    });

    if (error) {
      const outcome = this.toRejectedOutcome(error);
      if (outcome) return outcome;
      throw databaseError('create order', error, { userId: params.userId });
    }

    if (typeof orderId !== 'number') {
      throw new Error('create_order_atomic returned no order id');
    }

    return { status: 'created', orderId };
  }

  /**
   * Apply an order update through the update_order function. Absent fields
   * keep their stored value and a date already stamped is never replaced,
   * so overlapping updates cannot undo each other.
   */
  async update(id: number, changes: OrderChanges): Promise<OrderDetails | null> {
    const { data: found, error } = await this.client.rpc('update_order', {
      p_order_id: id,
      p_shipping_address: changes.shippingAddress ?? null,
      p_status: changes.status ?? null,
      p_shipped_date: changes.shippedDate?.toISOString() ?? null,
      p_delivered_date: changes.deliveredDate?.toISOString() ?? null,
    });

    if (error) throw databaseError('update order', error, { id });
    if (found !== true) return null;

    return this.findById(id);
  }

  /**
   * Delete an order; order_items go with it through ON DELETE CASCADE
   */
  async delete(id: number): Promise<boolean> {
    const { data, error } = await this.client.from('orders').delete().eq('id', id).select('id');

    if (error) throw databaseError('delete order', error, { id });

    return (data ?? []).length > 0;
  }

  private toRejectedOutcome(error: PostgrestErrorLike): CreateOrderOutcome | null {
    const id = Number(error.details);

    switch (error.code) {
      case USER_NOT_FOUND:
        return { status: 'user_not_found', userId: id };
      case PRODUCT_NOT_FOUND:
        return { status: 'product_not_found', productId: id };
      case INSUFFICIENT_STOCK:
        return { status: 'insufficient_stock', productId: id };
      default:
        return null;
    }
  }

  /**
   * Map joined rows to the flat read model
   */
  private mapToOrder(row: OrderRow): OrderDetails {
    const status = parseOrderStatus(row.status);
    if (!status) {
      throw new Error(`Order ${row.id} has unknown status ${row.status}`);
    }

    return {
      id: row.id,
      userId: row.user_id,
      userName: row.users ? `${row.users.first_name} ${row.users.last_name}` : '',
      totalAmount: parseMoney(row.total_amount),
      status,
      shippingAddress: row.shipping_address,
      orderDate: new Date(row.order_date),
      ...(row.shipped_date ? { shippedDate: new Date(row.shipped_date) } : {}),
      ...(row.delivered_date ? { deliveredDate: new Date(row.delivered_date) } : {}),
      orderItems: (row.order_items ?? []).map((item) => this.mapToOrderItem(item)),
    };
  }

  private mapToOrderItem(row: OrderItemRow): OrderItemDetails {
    return {
      id: row.id,
      productId: row.product_id,
      productName: row.products?.name ?? '',
      quantity: row.quantity,
      unitPrice: parseMoney(row.unit_price),
      subtotal: parseMoney(row.subtotal),
    };
  }
}
