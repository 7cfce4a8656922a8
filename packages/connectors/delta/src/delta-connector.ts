import { randomUUID } from 'node:crypto';
import {
  createLogger,
  isSuccessStatus,
  nullJournal,
  type AuthFrame,
  type DecisionJournal,
  type ExchangeConfig,
  type ExecutableJob,
  type HttpConfig,
  type OrderConfig,
  type OrderSide,
  type OrderSubmitter,
  type OrderType,
  type SubmitResult,
} from '@fillmirror/core';
import { DeltaApi } from './delta-api.js';
import { buildWsAuthFrame, unixTimestamp } from './delta-auth.js';
import {
  INSUFFICIENT_DEPTH_REASON,
  ORDERS_PATH,
  orderResponseSchema,
  type DeltaOrderRequest,
} from './types.js';

const logger = createLogger('DeltaConnector');

export interface OrderTransport {
  post(path: string, body: object): Promise<SubmitResult>;
}

export interface DeltaConnectorConfig {
  exchange: ExchangeConfig;
  orders: OrderConfig;
  http: HttpConfig;
  selfTagPrefix: string;
  journal?: DecisionJournal;
  /** Signed transport; a DeltaApi built from `exchange` and `http` when absent */
  api?: OrderTransport;
  newClientSuffix?: () => string;
}

/**
 * Tag every order we place so its fills are recognised as our own.
 */
export function buildClientOrderId(prefix: string, suffix: string = randomUUID().replace(/-/g, '').slice(0, 10)): string {
  return `${prefix}${suffix}`;
}

/** Eight decimals, trailing zeros and a bare trailing dot removed. */
export function formatPrice(price: number): string {
  return price.toFixed(8).replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Shift a reference price by the slippage allowance: up for buys, down for
 * sells. Undefined when there is no usable reference price.
 */
export function adjustLimitPrice(side: OrderSide, basePrice: string | undefined, slippageBps: number): string | undefined {
  if (basePrice === undefined || basePrice.trim() === '') {
    return undefined;
  }
  let price = Number(basePrice);
  if (!Number.isFinite(price)) {
    return undefined;
  }

  const slip = slippageBps / 10_000;
  if (slip > 0) {
    price = side === 'buy' ? price * (1 + slip) : price * (1 - slip);
  }
  return formatPrice(price);
}

export class DeltaConnector implements OrderSubmitter {
  public readonly venue = 'delta';
  private readonly config: DeltaConnectorConfig;
  private readonly api: OrderTransport;
  private readonly journal: DecisionJournal;
  private readonly newClientSuffix: (() => string) | undefined;

  constructor(config: DeltaConnectorConfig) {
    this.config = config;
    this.journal = config.journal ?? nullJournal;
    this.newClientSuffix = config.newClientSuffix;
    this.api =
      config.api ??
      new DeltaApi({
        apiBase: config.exchange.apiBase,
        apiKey: config.exchange.apiKey,
        apiSecret: config.exchange.apiSecret,
        userAgent: config.exchange.userAgent,
        http: config.http,
        journal: this.journal,
      });
  }

  /** Fresh socket login frame; called once per connection attempt. */
  authFrame(nowMs: number = Date.now()): AuthFrame {
    const { apiKey, apiSecret } = this.config.exchange;
    return buildWsAuthFrame({ apiKey, apiSecret }, unixTimestamp(nowMs));
  }

  async submitTopUp(job: ExecutableJob): Promise<SubmitResult> {
    const { orders } = this.config;

    if (job.size <= 0) {
      return { status: 200, body: { skipped: 'non_positive_size' } };
    }

    if (orders.dryRun) {
      this.journal.action('dry_run_order', {
        symbol: job.symbol,
        product_id: job.productId,
        side: job.side,
        size: job.size,
        price: job.priceHint,
      });
      logger.info(
        { symbol: job.symbol ?? job.productId, side: job.side, size: job.size, orderType: orders.orderType, price: job.priceHint },
        'DRY_RUN top-up',
      );
      return { status: 200, body: { dry_run: true } };
    }

    let limitPrice: string | undefined;
    if (orders.orderType === 'limit_order') {
      limitPrice = adjustLimitPrice(job.side, job.priceHint, orders.limitSlippageBps);
      if (limitPrice === undefined) {
        this.journal.skip('missing_limit_price', { symbol: job.symbol, side: job.side, size: job.size });
        logger.warn({ auditId: job.auditId, symbol: job.symbol }, 'No price to build a limit order from');
        return { status: 400, body: { error: 'missing_limit_price' } };
      }
    }

    const order = this.buildOrder(job, orders.orderType, limitPrice);
    const result = await this.place(job, order);

    if (!this.shouldFallBackToMarket(order, result)) {
      return result;
    }

    this.journal.action('limit_ioc_cancel_fallback', {
      symbol: job.symbol,
      side: job.side,
      size: job.size,
      limit_price: order.limit_price,
    });
    logger.warn({ auditId: job.auditId, limitPrice: order.limit_price }, 'IOC limit found no depth, resubmitting as market');
    return this.place(job, this.buildOrder(job, 'market_order'));
  }

  buildOrder(job: ExecutableJob, orderType: OrderType, limitPrice?: string): DeltaOrderRequest {
    const order: DeltaOrderRequest = {
      side: job.side,
      order_type: orderType,
      time_in_force: this.config.orders.timeInForce,
      size: job.size,
      reduce_only: false,
      client_order_id: buildClientOrderId(this.config.selfTagPrefix, this.newClientSuffix?.()),
    };
    if (job.productId !== undefined) {
      order.product_id = job.productId;
    }
    if (limitPrice !== undefined) {
      order.limit_price = limitPrice;
    }
    return order;
  }

  private async place(job: ExecutableJob, order: DeltaOrderRequest): Promise<SubmitResult> {
    const result = await this.api.post(ORDERS_PATH, order);
    this.journal.action('order_submit', { status: result.status, resp: result.body, req: order });

    if (isSuccessStatus(result.status)) {
      logger.info(
        { auditId: job.auditId, side: order.side, size: order.size, market: job.symbol ?? job.productId, orderType: order.order_type, limitPrice: order.limit_price },
        'Placed top-up',
      );
    } else {
      logger.error({ auditId: job.auditId, status: result.status, body: result.body }, 'Order error');
    }
    return result;
  }

  private shouldFallBackToMarket(order: DeltaOrderRequest, result: SubmitResult): boolean {
    const { orders } = this.config;
    if (
      result.status !== 200 ||
      order.order_type !== 'limit_order' ||
      orders.timeInForce !== 'ioc' ||
      !orders.limitIocFallbackMarket ||
      orders.dryRun
    ) {
      return false;
    }

    const parsed = orderResponseSchema.safeParse(result.body);
    if (!parsed.success || !parsed.data.result) {
      return false;
    }
    const { state, cancellation_reason } = parsed.data.result;
    return state === 'cancelled' && cancellation_reason === INSUFFICIENT_DEPTH_REASON;
  }
}
