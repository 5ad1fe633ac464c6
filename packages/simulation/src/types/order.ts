/**
 * Order Requests
 * ==============
 * Immutable order values produced by a strategy. Size is signed:
 * positive buys, negative sells, zero is a legal no-op.
 */

import { z } from 'zod';
import { ValidationError } from '@barreplay/utils';

export const MarketOrderSchema = z.object({
  type: z.literal('market'),
  size: z.number().finite(),
});

export const LimitOrderSchema = z.object({
  type: z.literal('limit'),
  size: z.number().finite(),
  price: z.number().finite(),
  postOnly: z.boolean(),
});

export const OrderRequestSchema = z.discriminatedUnion('type', [
  MarketOrderSchema,
  LimitOrderSchema,
]);

export type MarketOrder = Readonly<z.infer<typeof MarketOrderSchema>>;
export type LimitOrder = Readonly<z.infer<typeof LimitOrderSchema>>;
export type OrderRequest = MarketOrder | LimitOrder;

function invalidOrder(error: z.ZodError, input: unknown): ValidationError {
  const issues = error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join(', ');
  return new ValidationError(`Invalid order: ${issues}`, { order: input });
}

export function marketOrder(size: number): MarketOrder {
  const input = { type: 'market', size };
  const result = MarketOrderSchema.safeParse(input);
  if (!result.success) {
    throw invalidOrder(result.error, input);
  }
  return Object.freeze(result.data);
}

export function limitOrder(size: number, price: number, postOnly: boolean = false): LimitOrder {
  const input = { type: 'limit', size, price, postOnly };
  const result = LimitOrderSchema.safeParse(input);
  if (!result.success) {
    throw invalidOrder(result.error, input);
  }
  return Object.freeze(result.data);
}

export function isBuy(order: OrderRequest): boolean {
  return order.size > 0;
}

export function isSell(order: OrderRequest): boolean {
  return order.size < 0;
}

/**
 * Guard shared by every scaled copy
 */
export function assertScaleFactor(factor: number): void {
  if (!Number.isFinite(factor)) {
    throw new ValidationError(`Cannot scale by non-finite number: ${factor}`, { factor });
  }
  if (factor < 0) {
    throw new ValidationError(`Cannot multiply by negative number: ${factor}`, { factor });
  }
}

/**
 * Scaled copy of an order; only the size changes
 */
export function scaleOrder<T extends OrderRequest>(order: T, factor: number): T {
  assertScaleFactor(factor);
  return { ...order, size: order.size * factor };
}
