import { expect } from 'chai';
import { FirebaseIdentityClient, type IdentityProvider, type SignInResult } from '../clients/identity-client.js';
import { AuthService, tokenKey } from '../services/auth-service.js';
import { InMemorySessionStore } from '../services/session-store.js';
import { AuthenticationError, ForbiddenError, UpstreamError, ValidationError } from '../utils/errors.js';
import { FakeClock, InMemoryEngineerRepository, makeEngineer, rejectionOf } from './fakes.js';
import { stubHttp } from './http-stub.js';

class FakeIdentity implements IdentityProvider {
  lookups = 0;
  resets: string[] = [];

  constructor(private readonly emailsByToken: Record<string, string>) {}

  async signIn(email: string): Promise<SignInResult> {
    return { idToken: 'token-1', refreshToken: 'refresh-1', email, localId: 'uid-1', expiresIn: 3600 };
  }

  async sendPasswordReset(email: string): Promise<void> {
    this.resets.push(email);
  }

  async lookupEmail(idToken: string): Promise<string | null> {
    this.lookups++;
    return this.emailsByToken[idToken] ?? null;
  }
}

function setup(emailsByToken: Record<string, string> = { 'token-1': 'asha@example.com' }) {
  const identity = new FakeIdentity(emailsByToken);
  const store = new InMemorySessionStore(new FakeClock());
  const auth = new AuthService(identity, new InMemoryEngineerRepository([makeEngineer()]), store);
  return { identity, store, auth };
}

describe('AuthService', () => {
  it('signs in a registered engineer and caches the token owner', async () => {
    const { auth, store } = setup();

    const session = await auth.signIn(' Asha@Example.com ', 'test-password');

    expect(session.idToken).to.equal('token-1');
    expect(session.engineer.engineerId).to.equal('eng-1');
    expect(await store.getTokenOwner(tokenKey('token-1'))).to.equal('eng-1');
  });

  it('validates the email and password before calling the provider', async () => {
    const { auth } = setup();
    expect(await rejectionOf(auth.signIn('not-an-email', 'test-password'))).to.be.instanceOf(ValidationError);
    expect(await rejectionOf(auth.signIn('asha@example.com', ''))).to.be.instanceOf(ValidationError);
  });

  it('refuses accounts without an engineer profile', async () => {
    const { auth } = setup();
    const error = await rejectionOf(auth.signIn('someone@example.com', 'test-password'));
    expect(error).to.be.instanceOf(ForbiddenError);
  });

  it('resolves tokens once and then serves them from the cache', async () => {
    const { auth, identity } = setup();

    expect((await auth.authenticate('token-1')).engineerId).to.equal('eng-1');
    expect((await auth.authenticate('token-1')).engineerId).to.equal('eng-1');
    expect(identity.lookups).to.equal(1);
  });

  it('rejects unknown tokens', async () => {
    const { auth } = setup();
    expect(await rejectionOf(auth.authenticate('bogus'))).to.be.instanceOf(AuthenticationError);
  });

  it('sends password resets to the normalised address', async () => {
    const { auth, identity } = setup();
    await auth.sendPasswordReset('Asha@Example.com');
    expect(identity.resets).to.deep.equal(['asha@example.com']);
  });

  it('hashes tokens for the cache key', () => {
    expect(tokenKey('abc')).to.equal('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('FirebaseIdentityClient', () => {
  const identityError = (message: string) => ({ status: 400, data: { error: { code: 400, message } } });

  it('exchanges credentials for tokens', async () => {
    const { http, calls } = stubHttp(() => ({
      data: { idToken: 'id-1', refreshToken: 'refresh-1', email: 'asha@example.com', localId: 'uid-1', expiresIn: '3600' },
    }));
    const client = new FirebaseIdentityClient('test-web-key', http);

    expect(await client.signIn('asha@example.com', 'test-password')).to.deep.equal({
      idToken: 'id-1',
      refreshToken: 'refresh-1',
      email: 'asha@example.com',
      localId: 'uid-1',
      expiresIn: 3600,
    });
    expect(calls[0]).to.include({ method: 'POST', url: '/accounts:signInWithPassword' });
    expect(calls[0]?.data).to.deep.equal({ email: 'asha@example.com', password: 'test-password', returnSecureToken: true });
  });

  it('maps credential errors to authentication failures', async () => {
    const { http } = stubHttp(() => identityError('INVALID_LOGIN_CREDENTIALS'));
    const client = new FirebaseIdentityClient('test-web-key', http);

    const error = await rejectionOf(client.signIn('asha@example.com', 'wrong'));

    expect(error).to.be.instanceOf(AuthenticationError);
    expect(error).to.have.property('message', 'Invalid email or password');
  });

  it('treats other failures as upstream errors', async () => {
    const { http } = stubHttp(() => identityError('TOO_MANY_ATTEMPTS_TRY_LATER : Access disabled'));
    const client = new FirebaseIdentityClient('test-web-key', http);

    const error = await rejectionOf(client.signIn('asha@example.com', 'test-password'));

    expect(error).to.be.instanceOf(UpstreamError);
    expect(error).to.have.property('message', 'Sign-in failed: TOO_MANY_ATTEMPTS_TRY_LATER');
  });

  it('reports unknown addresses on password reset', async () => {
    const { http } = stubHttp(() => identityError('EMAIL_NOT_FOUND'));
    const client = new FirebaseIdentityClient('test-web-key', http);

    expect(await rejectionOf(client.sendPasswordReset('nobody@example.com'))).to.be.instanceOf(ValidationError);
  });

  it('returns null for invalid or disabled tokens', async () => {
    const replies = [
      identityError('INVALID_ID_TOKEN'),
      { data: { users: [{ email: 'asha@example.com', disabled: true }] } },
      { data: { users: [{ email: 'asha@example.com' }] } },
    ];
    const { http } = stubHttp(() => replies.shift() ?? { status: 500, data: {} });
    const client = new FirebaseIdentityClient('test-web-key', http);

    expect(await client.lookupEmail('expired')).to.equal(null);
    expect(await client.lookupEmail('disabled')).to.equal(null);
    expect(await client.lookupEmail('valid')).to.equal('asha@example.com');
  });
});
