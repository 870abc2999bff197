import { createHash } from 'node:crypto';
import type { IdentityProvider } from '../clients/identity-client.js';
import type { EngineerRepository } from '../repositories/engineer-repository.js';
import type { Engineer } from '../types/index.js';
import { AuthenticationError, ForbiddenError, ValidationError } from '../utils/errors.js';
import type { ISessionStore } from './session-store.js';

export interface SignInResponse {
  idToken: string;
  refreshToken: string;
  expiresIn: number;
  engineer: Engineer;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function requireEmail(email: string): string {
  const normalised = email.trim().toLowerCase();
  if (!EMAIL_PATTERN.test(normalised)) {
    throw new ValidationError('A valid email address is required');
  }
  return normalised;
}

/**
 * Sign-in for engineers and ID-token resolution for the API. Resolved tokens
 * are cached in the session store under a hash of the token.
 */
export class AuthService {
  constructor(
    private readonly identity: IdentityProvider,
    private readonly engineers: EngineerRepository,
    private readonly store: ISessionStore,
    private readonly tokenCacheTtlSeconds = 300
  ) {}

  async signIn(email: string, password: string): Promise<SignInResponse> {
    const address = requireEmail(email);
    if (!password) {
      throw new ValidationError('Password is required');
    }

    const result = await this.identity.signIn(address, password);
    const engineer = await this.engineers.findByEmail(result.email || address);
    if (!engineer) {
      throw new ForbiddenError('No engineer profile is registered for this account');
    }

    await this.store.setTokenOwner(tokenKey(result.idToken), engineer.engineerId, this.tokenCacheTtlSeconds);
    return {
      idToken: result.idToken,
      refreshToken: result.refreshToken,
      expiresIn: result.expiresIn,
      engineer,
    };
  }

  async sendPasswordReset(email: string): Promise<void> {
    await this.identity.sendPasswordReset(requireEmail(email));
  }

  async authenticate(idToken: string): Promise<Engineer> {
    const key = tokenKey(idToken);

    const cachedOwner = await this.store.getTokenOwner(key);
    if (cachedOwner) {
      const engineer = await this.engineers.findById(cachedOwner);
      if (engineer) {
        return engineer;
      }
    }

    const email = await this.identity.lookupEmail(idToken);
    if (!email) {
      throw new AuthenticationError('Invalid or expired token');
    }
    const engineer = await this.engineers.findByEmail(email);
    if (!engineer) {
      throw new ForbiddenError('No engineer profile is registered for this account');
    }

    await this.store.setTokenOwner(key, engineer.engineerId, this.tokenCacheTtlSeconds);
    return engineer;
  }
}

export function tokenKey(idToken: string): string {
  return createHash('sha256').update(idToken).digest('hex');
}
