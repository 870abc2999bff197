import axios, { AxiosInstance, isAxiosError } from 'axios';
import { AuthenticationError, UpstreamError, ValidationError, errorMessage } from '../utils/errors.js';

export interface SignInResult {
  idToken: string;
  refreshToken: string;
  email: string;
  localId: string;
  expiresIn: number;
}

export interface IdentityProvider {
  signIn(email: string, password: string): Promise<SignInResult>;
  sendPasswordReset(email: string): Promise<void>;
  /** Email address behind an ID token, or null when the token is not valid. */
  lookupEmail(idToken: string): Promise<string | null>;
}

interface SignInResponse {
  idToken: string;
  refreshToken: string;
  email: string;
  localId: string;
  expiresIn: string;
}

interface LookupResponse {
  users?: Array<{ email?: string; disabled?: boolean }>;
}

const CREDENTIAL_ERRORS = new Set([
  'EMAIL_NOT_FOUND',
  'INVALID_PASSWORD',
  'INVALID_LOGIN_CREDENTIALS',
  'INVALID_EMAIL',
  'USER_DISABLED',
]);

/**
 * Identity Toolkit error code from a failed request, e.g. `EMAIL_NOT_FOUND`.
 * The API sometimes appends a description after a colon.
 */
function identityErrorCode(error: unknown): string | null {
  if (!isAxiosError(error)) {
    return null;
  }
  const data: unknown = error.response?.data;
  if (typeof data !== 'object' || data === null || !('error' in data)) {
    return null;
  }
  const body = data.error;
  if (typeof body !== 'object' || body === null || !('message' in body) || typeof body.message !== 'string') {
    return null;
  }
  return body.message.split(':')[0].trim();
}

/**
 * Firebase Authentication through the Identity Toolkit REST API.
 */
export class FirebaseIdentityClient implements IdentityProvider {
  private readonly http: AxiosInstance;

  constructor(webApiKey: string, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: 'https://identitytoolkit.googleapis.com/v1',
        timeout: 10000,
        params: { key: webApiKey },
        headers: { 'Content-Type': 'application/json' },
      });
  }

  async signIn(email: string, password: string): Promise<SignInResult> {
    try {
      const { data } = await this.http.post<SignInResponse>('/accounts:signInWithPassword', {
        email,
        password,
        returnSecureToken: true,
      });
      return {
        idToken: data.idToken,
        refreshToken: data.refreshToken,
        email: data.email,
        localId: data.localId,
        expiresIn: parseInt(data.expiresIn, 10),
      };
    } catch (error) {
      const code = identityErrorCode(error);
      if (code && CREDENTIAL_ERRORS.has(code)) {
        throw new AuthenticationError('Invalid email or password');
      }
      throw new UpstreamError('firebase_auth', `Sign-in failed: ${code ?? errorMessage(error)}`);
    }
  }

  async sendPasswordReset(email: string): Promise<void> {
    try {
      await this.http.post('/accounts:sendOobCode', { requestType: 'PASSWORD_RESET', email });
    } catch (error) {
      const code = identityErrorCode(error);
      if (code === 'EMAIL_NOT_FOUND' || code === 'INVALID_EMAIL') {
        throw new ValidationError('No account exists for this email address');
      }
      throw new UpstreamError('firebase_auth', `Password reset failed: ${code ?? errorMessage(error)}`);
    }
  }

  async lookupEmail(idToken: string): Promise<string | null> {
    try {
      const { data } = await this.http.post<LookupResponse>('/accounts:lookup', { idToken });
      const user = data.users?.[0];
      if (!user || user.disabled || !user.email) {
        return null;
      }
      return user.email;
    } catch (error) {
      if (identityErrorCode(error)) {
        return null;
      }
      throw new UpstreamError('firebase_auth', `Token lookup failed: ${errorMessage(error)}`);
    }
  }
}
