// --- Socket frames: bot -> exchange ---

export type AuthFrame = {
  type: 'auth';
  payload: {
    'api-key': string;
    signature: string;
    timestamp: string;
  };
};

export type PrivateChannel = 'orders' | 'positions' | 'user_trades' | 'usertrades';

export type SubscribeFrame = {
  type: 'subscribe';
  payload: {
    channels: Array<{ name: PrivateChannel; symbols: string[] }>;
  };
};

export type EnableHeartbeatFrame = {
  type: 'enable_heartbeat';
};

export type OutboundFrame = AuthFrame | SubscribeFrame | EnableHeartbeatFrame;

// --- Socket frames: exchange -> bot ---

/**
 * Any inbound JSON object. Only `type` is relied on for routing; the rest is
 * read through tolerant extraction and never trusted to have a shape.
 */
export type InboundFrame = {
  type?: string;
  [key: string]: unknown;
};

export const AUTH_SUCCESS_MESSAGE = 'Authenticated';

export const TRADE_FILL_CHANNELS: readonly string[] = ['user_trades', 'usertrades'];
export const ORDER_CHANNELS: readonly string[] = ['orders'];

// --- Normalized account events ---

export type Side = 'buy' | 'sell' | 'unknown';
export type OrderSide = Exclude<Side, 'unknown'>;

interface AccountEventBase {
  symbol?: string;
  productId?: number;
  side: Side;
  /** Decimal string as received; advisory only. */
  price?: string;
  fillId?: string;
  /** client_order_id / client_id / text, whichever came first */
  tag?: string;
  text?: string;
}

export interface TradeFillEvent extends AccountEventBase {
  kind: 'trade_fill';
  tradeId?: string;
  /** Fill size in contracts; undefined when missing or not an integer. */
  quantity?: number;
}

export interface OrderUpdateEvent extends AccountEventBase {
  kind: 'order_update';
  orderId?: string;
  /** Cumulative filled size reported for the order. */
  cumulativeFilled?: number;
  /** closed, or nothing left unfilled */
  terminal: boolean;
}

export type AccountEvent = TradeFillEvent | OrderUpdateEvent;

// --- Execution ---

export interface TopUpJob {
  auditId: string;
  symbol?: string;
  productId?: number;
  side: Side;
  size: number;
  priceHint?: string;
}

export interface SubmitResult {
  status: number;
  body: unknown;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
