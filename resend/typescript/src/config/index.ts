export {
  validateConfig,
  createConfigFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_BATCH_CONCURRENCY,
  MAX_BATCH_CONCURRENCY,
  DEFAULT_WEBHOOK_TOLERANCE,
  DEFAULT_REPLAY_RETENTION,
  MIN_REPLAY_RETENTION,
  DEFAULT_USER_AGENT,
  type ResendConfig,
  type NormalizedResendConfig,
  type MalformedPayloadPolicy,
} from './config.js';
