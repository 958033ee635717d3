export { WallexClient, BASE_URL, API_KEY_HEADER } from './http/wallexClient.js';
export type { ClientOptions, HttpMethod, ApiVersion, Transport } from './http/wallexClient.js';
export {
    WallexError,
    TransportError,
    ConfigurationError,
    ApiError,
    normalizeErrorResponse,
    renderValue
} from './http/errors.js';
export type { NormalizedError, ErrorFields, TransportStage } from './http/errors.js';
export { loadConfig } from './config/index.js';
export type { ClientConfig } from './config/index.js';
export { toUrlParams } from './lib/urlParams.js';
export * from './types/wallexBase.js';
export * from './types/wallexMarkets.js';
export * from './types/wallexAccount.js';
