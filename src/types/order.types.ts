/**
 * Order domain types
 */

export enum OrderStatus {
  PENDING = 'Pending',
  PROCESSING = 'Processing',
  SHIPPED = 'Shipped',
  DELIVERED = 'Delivered',
  CANCELLED = 'Cancelled',
}

export const ORDER_STATUSES: readonly OrderStatus[] = Object.values(OrderStatus);

export interface OrderItemDetails {
  id: number;
  productId: number;
  productName: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

/**
 * Flat read model returned by every order read: buyer and product names come
 * from read-side joins, not from the stored order.
 */
export interface OrderDetails {
  id: number;
  userId: number;
  userName: string;
  totalAmount: number;
  status: OrderStatus;
  shippingAddress: string;
  orderDate: Date;
  shippedDate?: Date;
  deliveredDate?: Date;
  orderItems: OrderItemDetails[];
}

// Database row types (snake_case from PostgreSQL) with embedded relations
export interface OrderItemRow {
  id: number;
  product_id: number;
  quantity: number;
  unit_price: number | string;
  subtotal: number | string;
  products?: { name: string } | null;
}

export interface OrderRow {
  id: number;
  user_id: number;
  total_amount: number | string;
  status: string;
  shipping_address: string;
  order_date: string;
  shipped_date: string | null;
  delivered_date: string | null;
  users?: { first_name: string; last_name: string } | null;
  order_items?: OrderItemRow[] | null;
}

export interface OrderLineInput {
  productId: number;
  quantity: number;
}

export interface CreateOrderInput {
  userId: number;
  shippingAddress: string;
  items: OrderLineInput[];
}

// Line snapshot priced at order time
export interface OrderLineDraft {
  productId: number;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

// Parameters of the atomic create call
export interface CreateOrderParams {
  userId: number;
  shippingAddress: string;
  totalAmount: number;
  items: OrderLineDraft[];
}

/**
 * Result of the atomic create call. Any outcome other than `created` means
 * nothing was written.
 */
export type CreateOrderOutcome =
  | { status: 'created'; orderId: number }
  | { status: 'user_not_found'; userId: number }
  | { status: 'product_not_found'; productId: number }
  | { status: 'insufficient_stock'; productId: number };

export interface OrderPatch {
  shippingAddress?: string | null;
  status?: string | null;
}

/**
 * Fields written by an order update; absent ones keep their stored value.
 * The dates are only written while the stored column is still empty.
 */
export interface OrderChanges {
  shippingAddress?: string;
  status?: OrderStatus;
  shippedDate?: Date;
  deliveredDate?: Date;
}
