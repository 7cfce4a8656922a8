// ============================================================
// EventRouter: parses inbound socket frames, classifies them and
// hands account events to the decision engine. Nothing thrown
// below this point escapes to the socket handler.
// ============================================================

import { z } from 'zod';
import {
  AUTH_SUCCESS_MESSAGE,
  ORDER_CHANNELS,
  TRADE_FILL_CHANNELS,
  type AccountEvent,
  type InboundFrame,
  type OrderUpdateEvent,
  type TradeFillEvent,
} from '../../shared/protocol.js';
import { createLogger, errorMessage } from '../../shared/logger.js';
import { extractPayloadEvents, toOrderUpdateEvent, toTradeFillEvent } from './event-extract.js';

const logger = createLogger('EventRouter');

const frameSchema = z.object({ type: z.string().optional() }).passthrough();

export type FrameClass =
  | { kind: 'auth_success'; frame: InboundFrame }
  | { kind: 'heartbeat' }
  | { kind: 'trade_fills'; events: TradeFillEvent[] }
  | { kind: 'order_updates'; events: OrderUpdateEvent[] }
  | { kind: 'other'; type?: string };

export interface AccountEventSink {
  process(event: AccountEvent): unknown;
}

/** Parse a text frame into a JSON object, or null when it is not one. */
export function parseFrame(text: string): InboundFrame | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    logger.warn({ error: errorMessage(err), frame: text.slice(0, 200) }, 'Dropping unparseable frame');
    return null;
  }

  const parsed = frameSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ frame: text.slice(0, 200) }, 'Dropping frame that is not a typed JSON object');
    return null;
  }
  return parsed.data;
}

export function classifyFrame(frame: InboundFrame): FrameClass {
  const type = frame.type;

  if (type === 'success' && frame.message === AUTH_SUCCESS_MESSAGE) {
    return { kind: 'auth_success', frame };
  }
  if (type === 'heartbeat') {
    return { kind: 'heartbeat' };
  }
  if (type !== undefined && TRADE_FILL_CHANNELS.includes(type)) {
    const events = extractPayloadEvents(frame, ['payload', 'data', 'trades', 'usertrades']).map(toTradeFillEvent);
    return { kind: 'trade_fills', events };
  }
  if (type !== undefined && ORDER_CHANNELS.includes(type)) {
    const events = extractPayloadEvents(frame, ['payload', 'data', 'orders']).map(toOrderUpdateEvent);
    return { kind: 'order_updates', events };
  }
  // positions and everything else are observed only, never replicated
  return { kind: 'other', type };
}

export class EventRouter {
  constructor(private readonly sink: AccountEventSink) {}

  /**
   * Route one raw frame. Returns its classification so the connection can
   * react to control frames, or null when the frame was dropped.
   */
  route(text: string): FrameClass | null {
    const frame = parseFrame(text);
    if (!frame) {
      return null;
    }

    const classified = classifyFrame(frame);
    switch (classified.kind) {
      case 'trade_fills':
      case 'order_updates':
        for (const event of classified.events) {
          this.dispatch(event);
        }
        break;
      case 'other':
        logger.debug({ type: classified.type, frame }, 'Observed frame');
        break;
      default:
        break;
    }
    return classified;
  }

  private dispatch(event: AccountEvent): void {
    try {
      this.sink.process(event);
    } catch (err) {
      logger.error({ error: errorMessage(err), event }, 'Account event processing failed');
    }
  }
}
