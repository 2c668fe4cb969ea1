export { ResendError, type ResendErrorParams, type RequestContext } from './error.js';
export {
  ConfigurationError,
  ValidationError,
  UnprocessableEntityError,
  AuthenticationError,
  PermissionError,
  NotFoundError,
  ConflictError,
  RateLimitError,
  ServerError,
  NetworkError,
  TimeoutError,
  UnexpectedResponseError,
  ExhaustedRetriesError,
  CancelledError,
  VerificationError,
  WebhookProcessingError,
  type TransientProviderError,
  type VerificationFailureReason,
} from './categories.js';
