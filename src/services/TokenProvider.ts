import { AuthMethod, Credential, TokenResponse } from '../types/index.js';
import { describeError } from '../types/errors.js';
import { isRecord, readBoolean, readNumber, readString } from '../utils/json.js';

export interface TokenProvider {
  getToken(): Promise<TokenResponse>;
}

function readAuthMethod(value: string | undefined): AuthMethod {
  if (value === 'subscription_key' || value === 'token') {
    return value;
  }
  return 'none';
}

/**
 * Parse the body of GET /live/token
 */
export function parseTokenResponse(body: unknown): TokenResponse {
  if (!isRecord(body)) {
    return { success: false, authMethod: 'none', error: 'Token response is not an object' };
  }

  const success = readBoolean(body, 'success') === true;
  const expiresAt = readNumber(body, 'expires_at');
  return {
    success,
    token: readString(body, 'token'),
    key: readString(body, 'key'),
    region: readString(body, 'region'),
    expiry: expiresAt !== undefined ? expiresAt * 1000 : undefined,
    authMethod: readAuthMethod(readString(body, 'auth_method')),
    mockMode: readBoolean(body, 'mock_mode'),
    error: readString(body, 'error')
  };
}

export function toCredential(response: TokenResponse): Credential {
  return {
    authMethod: response.authMethod,
    secret: response.authMethod === 'subscription_key' ? response.key : response.token,
    region: response.region,
    expiry: response.expiry
  };
}

export function isExpired(credential: Credential, now: number, marginMs = 30000): boolean {
  return credential.expiry !== undefined && credential.expiry - marginMs <= now;
}

/**
 * Fetches short-lived recognition credentials from the backend
 */
export class HttpTokenProvider implements TokenProvider {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number = 10000
  ) {}

  async getToken(): Promise<TokenResponse> {
    try {
      const response = await fetch(`${this.baseUrl}/live/token`, {
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      const body: unknown = await response.json();
      if (!response.ok) {
        const parsed = parseTokenResponse(body);
        return { ...parsed, success: false, error: parsed.error ?? `Token request failed with ${response.status}` };
      }
      return parseTokenResponse(body);
    } catch (error) {
      console.error('Failed to get recognition token:', describeError(error));
      return { success: false, authMethod: 'none', error: describeError(error) };
    }
  }
}
