import { createHmac } from 'node:crypto';
import type { AuthFrame } from '@fillmirror/core';

/** Path signed for the private socket login. */
export const WS_AUTH_PATH = '/live';

/**
 * Sign a message using HMAC-SHA256, hex digest
 */
export function signRequest(secret: string, message: string): string {
  return createHmac('sha256', secret).update(message).digest('hex');
}

/**
 * Unix seconds as a string, the form the venue expects in `timestamp`
 */
export function unixTimestamp(nowMs: number = Date.now()): string {
  return Math.floor(nowMs / 1000).toString();
}

export interface Credentials {
  apiKey: string;
  apiSecret: string;
}

/**
 * Build signed headers for a REST request. The signature covers
 * method + timestamp + path + body.
 */
export function buildAuthHeaders(
  credentials: Credentials,
  method: string,
  path: string,
  body: string,
  userAgent: string,
  timestamp: string = unixTimestamp(),
): Record<string, string> {
  const signature = signRequest(credentials.apiSecret, method + timestamp + path + body);
  return {
    'api-key': credentials.apiKey,
    timestamp,
    signature,
    'User-Agent': userAgent,
    'Content-Type': 'application/json',
  };
}

/**
 * Build the socket login frame: the signature covers "GET" + timestamp + "/live".
 */
export function buildWsAuthFrame(credentials: Credentials, timestamp: string = unixTimestamp()): AuthFrame {
  return {
    type: 'auth',
    payload: {
      'api-key': credentials.apiKey,
      signature: signRequest(credentials.apiSecret, 'GET' + timestamp + WS_AUTH_PATH),
      timestamp,
    },
  };
}
