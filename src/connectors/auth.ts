import { ConfigurationError } from '../utils/errors';

export interface Authenticator {
  getAuthHeaders(): Record<string, string>;
}

/**
 * Static bearer token. Token acquisition and refresh belong to the host.
 */
export class BearerAuthenticator implements Authenticator {
  constructor(private readonly token: string) {
    if (token.trim().length === 0) {
      throw new ConfigurationError('api_token is required', ['api_token']);
    }
  }

  getAuthHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.token}` };
  }
}
