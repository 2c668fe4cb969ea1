export {
  createClient,
  createClientFromEnv,
  ResendClientImpl,
  type ResendClient,
} from './client.js';
