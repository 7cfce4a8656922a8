// ============================================================
// ConnectionManager: owns the private socket session.
//   DISCONNECTED -> CONNECTING -> AUTHENTICATING -> ACTIVE -> CLOSING
// and back to DISCONNECTED, reconnecting until stop() is called.
// ============================================================

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import type { ConnectionConfig } from '../../shared/config.js';
import type { DecisionJournal } from '../../shared/journal.js';
import { createLogger, errorMessage, sanitizeUrl } from '../../shared/logger.js';
import type { AuthFrame, OutboundFrame, PrivateChannel } from '../../shared/protocol.js';
import type { FrameClass } from '../replication/event-router.js';
import { nextBackoff, withJitter } from './backoff.js';

const logger = createLogger('ConnectionManager');

export type ConnectionState = 'DISCONNECTED' | 'CONNECTING' | 'AUTHENTICATING' | 'ACTIVE' | 'CLOSING';

/** How long stop() waits for the server's close frame before terminating. */
export const CLOSE_GRACE_MS = 1_000;

export const PRIVATE_CHANNELS: readonly PrivateChannel[] = ['orders', 'positions', 'user_trades'];

export interface FrameRouter {
  route(text: string): FrameClass | null;
}

export interface ConnectionManagerOptions {
  url: string;
  /** Skip certificate validation. Never on unless configured. */
  insecure?: boolean;
  connection: ConnectionConfig;
  authFrame: () => AuthFrame;
  router: FrameRouter;
  journal: DecisionJournal;
  channels?: readonly PrivateChannel[];
  enableHeartbeat?: boolean;
  /** Monotonic clock in ms */
  now?: () => number;
  random?: () => number;
}

export interface ConnectionManagerEvents {
  authenticated: () => void;
  disconnected: (info: { code: number; reason: string; hadHealth: boolean }) => void;
  reconnect_scheduled: (info: { delayMs: number; backoffMs: number; hadHealth: boolean }) => void;
  stopped: () => void;
}

export declare interface ConnectionManager {
  on<U extends keyof ConnectionManagerEvents>(event: U, listener: ConnectionManagerEvents[U]): this;
  once<U extends keyof ConnectionManagerEvents>(event: U, listener: ConnectionManagerEvents[U]): this;
  emit<U extends keyof ConnectionManagerEvents>(
    event: U,
    ...args: Parameters<ConnectionManagerEvents[U]>
  ): boolean;
}

function rawToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

export class ConnectionManager extends EventEmitter {
  private readonly options: ConnectionManagerOptions;
  private readonly config: ConnectionConfig;
  private readonly now: () => number;
  private readonly random: () => number;

  private ws: WebSocket | null = null;
  private _state: ConnectionState = 'DISCONNECTED';
  private backoffMs: number;
  private sessionStartedAt = 0;
  private _lastHealthAt = Number.NEGATIVE_INFINITY;
  private stopRequested = false;
  private started = false;

  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private pongTimer: NodeJS.Timeout | null = null;
  private closeTimer: NodeJS.Timeout | null = null;
  private resolveStopped: (() => void) | null = null;

  constructor(options: ConnectionManagerOptions) {
    super();
    this.options = options;
    this.config = options.connection;
    this.now = options.now ?? (() => performance.now());
    this.random = options.random ?? Math.random;
    this.backoffMs = this.config.backoffBaseMs;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get lastHealthAt(): number {
    return this._lastHealthAt;
  }

  /** Backoff the next unhealthy disconnect will double from. */
  get currentBackoffMs(): number {
    return this.backoffMs;
  }

  get isStopped(): boolean {
    return this.stopRequested;
  }

  /**
   * Connect and keep reconnecting. Resolves once stop() has been called and
   * the last session is closed.
   */
  start(): Promise<void> {
    if (this.started) {
      return Promise.reject(new Error('ConnectionManager already started'));
    }
    this.started = true;

    const stopped = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });

    if (this.stopRequested) {
      this.finish();
    } else {
      this.connect();
    }
    return stopped;
  }

  /**
   * Stop permanently: cancel any pending reconnect and close the live
   * socket. Idempotent.
   */
  stop(): void {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    logger.info({ state: this._state }, 'Stopping connection');
    this.clearReconnectTimer();

    if (this.ws) {
      this._state = 'CLOSING';
      this.stopPing();
      const ws = this.ws;
      ws.close();
      if (this.ws === ws) {
        this.closeTimer = setTimeout(() => {
          this.closeTimer = null;
          logger.warn({ graceMs: CLOSE_GRACE_MS }, 'No close frame from server, terminating socket');
          ws.terminate();
        }, CLOSE_GRACE_MS);
      }
      return;
    }
    this.finish();
  }

  private connect(): void {
    this._state = 'CONNECTING';
    this.sessionStartedAt = this.now();
    logger.info({ url: sanitizeUrl(this.options.url) }, 'Connecting to private socket');

    let ws: WebSocket;
    try {
      ws = new WebSocket(this.options.url, {
        rejectUnauthorized: !this.options.insecure,
        handshakeTimeout: this.config.pingIntervalMs,
      });
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Socket could not be created');
      this.handleClose(1006, errorMessage(err));
      return;
    }
    this.ws = ws;

    ws.on('open', () => this.handleOpen());
    ws.on('message', (data: WebSocket.RawData) => this.handleMessage(data));
    ws.on('pong', () => this.clearPongTimer());
    ws.on('error', (err: Error) => {
      logger.error({ error: err.message }, 'Socket error');
    });
    ws.on('close', (code: number, reason: Buffer) => {
      this.handleClose(code, reason.toString());
    });
  }

  private handleOpen(): void {
    if (this.stopRequested) {
      this.ws?.close();
      return;
    }
    logger.info('Socket opened; authenticating');
    this._state = 'AUTHENTICATING';

    const frame = this.options.authFrame();
    this.options.journal.action('auth_send', { timestamp: frame.payload.timestamp });
    this.send(frame);
    this.startPing();
  }

  private handleMessage(data: WebSocket.RawData): void {
    if (this.stopRequested) {
      return;
    }
    const classified = this.options.router.route(rawToText(data));
    if (!classified) {
      return;
    }

    switch (classified.kind) {
      case 'auth_success':
        this.markHealthy();
        this.onAuthenticated();
        break;
      case 'heartbeat':
        this.markHealthy();
        break;
      default:
        if (this._state === 'ACTIVE') {
          this.markHealthy();
        }
    }
  }

  private onAuthenticated(): void {
    const channels = this.options.channels ?? PRIVATE_CHANNELS;
    for (const name of channels) {
      const symbols = ['all'];
      this.options.journal.action('subscribe', { channel: name, symbols });
      this.send({ type: 'subscribe', payload: { channels: [{ name, symbols }] } });
    }
    if (this.options.enableHeartbeat ?? true) {
      this.send({ type: 'enable_heartbeat' });
    }

    this._state = 'ACTIVE';
    logger.info({ channels }, 'Authenticated and subscribed');
    this.emit('authenticated');
  }

  private markHealthy(): void {
    this._lastHealthAt = this.now();
  }

  private send(frame: OutboundFrame): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      logger.warn({ frameType: frame.type }, 'Cannot send frame: socket not open');
      return;
    }
    this.ws.send(JSON.stringify(frame));
  }

  private handleClose(code: number, reason: string): void {
    this.stopPing();
    if (this.closeTimer) {
      clearTimeout(this.closeTimer);
      this.closeTimer = null;
    }
    if (this.ws) {
      this.ws.removeAllListeners();
      this.ws = null;
    }
    this._state = 'DISCONNECTED';

    const hadHealth = this._lastHealthAt >= this.sessionStartedAt;
    logger.info({ code, reason, hadHealth }, 'Socket closed');
    this.emit('disconnected', { code, reason, hadHealth });

    if (this.stopRequested) {
      this.finish();
      return;
    }
    this.scheduleReconnect(hadHealth);
  }

  private scheduleReconnect(hadHealth: boolean): void {
    this.clearReconnectTimer();

    const { backoffBaseMs, backoffMaxMs, backoffJitter } = this.config;
    this.backoffMs = nextBackoff(this.backoffMs, hadHealth, backoffBaseMs, backoffMaxMs);
    const delayMs = withJitter(this.backoffMs, backoffJitter, this.random);

    this.options.journal.action('reconnect_wait', {
      seconds: Math.round(delayMs) / 1000,
      had_health: hadHealth,
    });
    logger.info({ delayMs: Math.round(delayMs), hadHealth }, 'Scheduling reconnection');
    this.emit('reconnect_scheduled', { delayMs, backoffMs: this.backoffMs, hadHealth });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.stopRequested) {
        this.connect();
      }
    }, delayMs);
  }

  private finish(): void {
    this._state = 'DISCONNECTED';
    const resolve = this.resolveStopped;
    this.resolveStopped = null;
    if (resolve) {
      logger.info('Connection stopped');
      this.emit('stopped');
      resolve();
    }
  }

  private startPing(): void {
    this.stopPing();
    this.pingTimer = setInterval(() => {
      if (!this.ws || this.ws.readyState !== WebSocket.OPEN || this.pongTimer) {
        return;
      }
      this.ws.ping();
      this.pongTimer = setTimeout(() => {
        this.pongTimer = null;
        logger.warn({ timeoutMs: this.config.pingTimeoutMs }, 'Pong not received, terminating socket');
        this.ws?.terminate();
      }, this.config.pingTimeoutMs);
    }, this.config.pingIntervalMs);
  }

  private clearPongTimer(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    this.clearPongTimer();
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
