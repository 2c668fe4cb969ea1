/**
 * Authentication manager for the emails API
 */
import type { NormalizedResendConfig } from '../config/config.js';

/**
 * Interface for auth header management
 */
export interface AuthManager {
  /**
   * Gets the authentication headers for API requests
   */
  getHeaders(): Record<string, string>;

  /**
   * Gets the API key (redacted for logging)
   */
  getRedactedApiKey(): string;
}

interface AuthConfig {
  apiKey: string;
  userAgent: string;
  customHeaders?: Record<string, string>;
}

/**
 * Bearer token authentication manager
 */
export class BearerAuthManager implements AuthManager {
  private readonly apiKey: string;
  private readonly baseHeaders: Record<string, string>;

  constructor(config: AuthConfig) {
    this.apiKey = config.apiKey;
    this.baseHeaders = {
      Authorization: `Bearer ${config.apiKey}`,
      'Content-Type': 'application/json',
      'User-Agent': config.userAgent,
      ...config.customHeaders,
    };
  }

  getHeaders(): Record<string, string> {
    return { ...this.baseHeaders };
  }

  getRedactedApiKey(): string {
    if (this.apiKey.length <= 10) {
      return '***REDACTED***';
    }
    const prefix = this.apiKey.substring(0, 3);
    const suffix = this.apiKey.substring(this.apiKey.length - 4);
    return `${prefix}...${suffix}`;
  }
}

/**
 * Creates an auth manager from normalized config
 */
export function createAuthManager(config: NormalizedResendConfig): AuthManager {
  return new BearerAuthManager({
    apiKey: config.apiKey,
    userAgent: config.userAgent,
    customHeaders: config.headers,
  });
}
