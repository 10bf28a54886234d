import { createHash } from 'crypto';
import { describe, it, expect, vi } from 'vitest';
import { AuthCodeAuthClient } from '../../auth-clients/auth-code-auth-client.js';
import type { OidcAuthCodeConfig } from '../../schemas.js';
import { LoginError } from '../../errors/index.js';
import {
  AUTH_SERVER,
  DISCOVERY_DOCUMENT,
  TOKEN_ENDPOINT,
  calledForm,
  createPresenter,
  freePort,
  jsonResponse,
  routedFetch,
  unsignedJwt,
} from '../helpers/test-utils.js';

vi.mock('@credgate/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@credgate/core')>();
  return { ...actual, logEvent: vi.fn() };
});

function config(overrides: Partial<OidcAuthCodeConfig> = {}): OidcAuthCodeConfig {
  return {
    client_type: 'oidc-auth-code',
    auth_server: AUTH_SERVER,
    client_id: 'test-client',
    redirect_uri: 'http://localhost:8080/callback',
    scopes: ['openid'],
    ...overrides,
  };
}

function challengeFor(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

describe('AuthCodeAuthClient', () => {
  it('should exchange a pasted code with PKCE', async () => {
    const fetchMock = routedFetch({
      [TOKEN_ENDPOINT]: () => jsonResponse({ access_token: 'test-access', expires_in: 3600 }),
    });
    const presenter = createPresenter();
    const client = new AuthCodeAuthClient(config(), { fetch: fetchMock, presenter });

    const credential = await client.login({ allowTtyPrompt: true });

    expect(credential.accessToken()).toBe('test-access');
    const [shownUrl] = presenter.promptForAuthorizationCode.mock.calls[0] ?? [];
    const authorizationUrl = new URL(shownUrl ?? '');
    expect(`${authorizationUrl.origin}${authorizationUrl.pathname}`).toBe(
      DISCOVERY_DOCUMENT.authorization_endpoint,
    );
    expect(authorizationUrl.searchParams.get('scope')).toBe('openid');
    expect(authorizationUrl.searchParams.get('nonce')).toBeTruthy();

    const form = calledForm(fetchMock, 1);
    expect(form.get('grant_type')).toBe('authorization_code');
    expect(form.get('code')).toBe('test-code');
    expect(form.get('redirect_uri')).toBe('http://localhost:8080/callback');
    expect(authorizationUrl.searchParams.get('code_challenge')).toBe(
      challengeFor(form.get('code_verifier') ?? ''),
    );
  });

  it('should receive the code on the loopback listener when a browser is allowed', async () => {
    const port = await freePort();
    const redirectUri = `http://127.0.0.1:${port}/callback`;
    const fetchMock = routedFetch({
      [TOKEN_ENDPOINT]: () => jsonResponse({ access_token: 'test-access' }),
    });
    const browserAnswers: number[] = [];
    const openBrowser = async (url: string): Promise<void> => {
      const authorizationUrl = new URL(url);
      const callback = new URL(authorizationUrl.searchParams.get('redirect_uri') ?? '');
      callback.searchParams.set('code', 'loopback-code');
      callback.searchParams.set('state', authorizationUrl.searchParams.get('state') ?? '');
      const response = await fetch(callback);
      browserAnswers.push(response.status);
      await response.text();
    };
    const client = new AuthCodeAuthClient(config({ redirect_uri: redirectUri }), {
      fetch: fetchMock,
      openBrowser,
    });

    const credential = await client.login({ allowOpenBrowser: true, timeoutSeconds: 5 });

    expect(credential.accessToken()).toBe('test-access');
    expect(browserAnswers).toEqual([200]);
    expect(calledForm(fetchMock, 1).get('code')).toBe('loopback-code');
  });

  it('should show the URL when the browser cannot be opened', async () => {
    const port = await freePort();
    const presenter = createPresenter();
    const client = new AuthCodeAuthClient(
      config({ redirect_uri: `http://127.0.0.1:${port}/callback` }),
      {
        fetch: routedFetch({}),
        presenter,
        openBrowser: async () => {
          throw new Error('no display');
        },
      },
    );

    await expect(client.login({ allowOpenBrowser: true, timeoutSeconds: 0.2 })).rejects.toThrow(
      new LoginError('Authorization code login timed out after 0.2 seconds'),
    );
    expect(presenter.showAuthorizationUrl).toHaveBeenCalledTimes(1);
  });

  it('should reject an ID token whose nonce differs from the request', async () => {
    const fetchMock = routedFetch({
      [TOKEN_ENDPOINT]: () =>
        jsonResponse({ access_token: 'test-access', id_token: unsignedJwt({ nonce: 'forged' }) }),
    });
    const client = new AuthCodeAuthClient(config(), {
      fetch: fetchMock,
      presenter: createPresenter(),
    });

    await expect(client.login({ allowTtyPrompt: true })).rejects.toThrow(
      new LoginError('ID token nonce does not match the authorization request'),
    );
  });

  it('should need a browser or a prompt', async () => {
    const client = new AuthCodeAuthClient(config(), { fetch: routedFetch({}) });

    await expect(client.login()).rejects.toThrow(LoginError.noInteraction('Authorization code'));
  });
});
