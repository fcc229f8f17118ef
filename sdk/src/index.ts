export { GroundworkClient } from './client.js';
export { GroundworkHttpClient, type HttpRequestOptions } from './http.js';
export {
  GroundworkError,
  GroundworkAuthError,
  GroundworkConflictError,
  GroundworkNotFoundError,
  GroundworkRateLimitError,
  GroundworkServerError,
  GroundworkUpstreamError,
  GroundworkValidationError,
  createGroundworkError,
  errorFromEnvelope,
  type GroundworkErrorContext,
  type RateLimitInfo,
} from './errors.js';
export type * from './types.js';
