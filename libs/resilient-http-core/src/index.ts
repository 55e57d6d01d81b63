export * from './types';
export {
  HttpClient,
  HttpError,
  TimeoutError,
  ResponseParseError,
  decodeText,
  encodeQuery,
  getHeader,
  parseRetryAfter,
  statusToCategory,
} from './HttpClient';
export { ConsoleLogger, noopLogger } from './logger';
export { createAuthInterceptor, createDelayInterceptor, createUserAgentInterceptor } from './interceptors';
export type { AuthInterceptorOptions } from './interceptors';
export * from './transport/fetchTransport';
