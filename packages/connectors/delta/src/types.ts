// Delta-specific request and response shapes

import { z } from 'zod';
import type { OrderType, TimeInForce } from '@fillmirror/core';

export const ORDERS_PATH = '/v2/orders';

export interface DeltaOrderRequest {
  side: 'buy' | 'sell';
  order_type: OrderType;
  time_in_force: TimeInForce;
  size: number;
  reduce_only: false;
  client_order_id: string;
  product_id?: number;
  limit_price?: string;
}

/** Reason the venue gives when an IOC order found no depth to fill against. */
export const INSUFFICIENT_DEPTH_REASON = 'order_size_not_available_in_orderbook';

// Only the fields the fallback check reads; everything else passes through untouched
export const orderResponseSchema = z
  .object({
    result: z
      .object({
        state: z.string().optional(),
        cancellation_reason: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type DeltaOrderResponse = z.infer<typeof orderResponseSchema>;
