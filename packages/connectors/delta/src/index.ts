export { DeltaConnector, adjustLimitPrice, buildClientOrderId, formatPrice } from './delta-connector.js';
export type { DeltaConnectorConfig, OrderTransport } from './delta-connector.js';
export { DeltaApi, retryDelayMs, isRetryableStatus } from './delta-api.js';
export type { DeltaApiConfig } from './delta-api.js';
export { signRequest, unixTimestamp, buildAuthHeaders, buildWsAuthFrame, WS_AUTH_PATH } from './delta-auth.js';
export type { Credentials } from './delta-auth.js';
export * from './types.js';
