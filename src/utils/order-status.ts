import {
  OrderChanges,
  OrderDetails,
  OrderPatch,
  OrderStatus,
  ORDER_STATUSES,
} from '../types/order.types';
import { AppError, ErrorCode, validationError } from '../types/error.types';

/**
 * Order status policy
 *
 * The status set is closed. Transitions are deliberately unrestricted
 * (Delivered -> Pending is accepted); tighten isTransitionAllowed to change that.
 */

export function parseOrderStatus(value: string): OrderStatus | null {
  return ORDER_STATUSES.find((status) => status === value) ?? null;
}

export function isTransitionAllowed(_from: OrderStatus, _to: OrderStatus): boolean {
  return true;
}

/**
 * Work out the fields an order update writes.
 *
 * Throws a validation error for an unknown status. Entering Shipped or
 * Delivered asks for the matching date unless the order already has one;
 * the repository still keeps a date written in the meantime.
 */
export function planOrderUpdate(order: OrderDetails, patch: OrderPatch, now: Date): OrderChanges {
  const changes: OrderChanges = {};

  if (patch.shippingAddress !== undefined && patch.shippingAddress !== null) {
    changes.shippingAddress = patch.shippingAddress;
  }

  if (patch.status === undefined || patch.status === null) {
    return changes;
  }

  const next = parseOrderStatus(patch.status);
  if (!next) {
    throw validationError(
      ErrorCode.INVALID_STATUS,
      `Invalid status. Valid values are: ${ORDER_STATUSES.join(', ')}`,
      { allowed: [...ORDER_STATUSES], received: patch.status }
    );
  }

  if (!isTransitionAllowed(order.status, next)) {
    throw new AppError(
      ErrorCode.INVALID_STATUS_TRANSITION,
      `Cannot move order from ${order.status} to ${next}`,
      409,
      { currentStatus: order.status, requestedStatus: next }
    );
  }

  changes.status = next;

  if (next === OrderStatus.SHIPPED && !order.shippedDate) {
    changes.shippedDate = now;
  }

  if (next === OrderStatus.DELIVERED && !order.deliveredDate) {
    changes.deliveredDate = now;
  }

  return changes;
}
