export { AwdPayClient, pickReference, type AwdPayClientOptions } from './client.js';
export { AwdPayApiError, AwdPayTokenError, isAwdPayError, type AwdPayError, type AwdPayFailureKind } from './errors.js';
export { TokenCache, type FetchedToken, type TokenCacheOptions } from './token-cache.js';
export type * from './types.js';
