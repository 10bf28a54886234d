import { describe, it, expect, vi } from 'vitest';
import {
  AuthCodeAuthClient,
  ClientCredentialsAuthClient,
  ClientValidatorAuthClient,
  DeviceCodeAuthClient,
  LegacyApiKeyAuthClient,
  NoOpAuthClient,
  ResourceOwnerAuthClient,
  StaticApiKeyAuthClient,
  createAuthClient,
  isDeviceLoginable,
  isLoginable,
  isRefreshable,
} from '../../auth-clients/index.js';
import { parseAuthClientConfig } from '../../config/index.js';
import { AUTH_SERVER } from '../helpers/test-utils.js';

vi.mock('@credgate/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@credgate/core')>();
  return { ...actual, logEvent: vi.fn() };
});

const oidc = { auth_server: AUTH_SERVER, client_id: 'test-client' };
const authCode = { ...oidc, redirect_uri: 'http://localhost:8765/callback' };
const secret = { client_secret: 'test-secret' };
const pubkey = { client_privkey: 'test-private-key' };

describe('createAuthClient', () => {
  it.each([
    [{ client_type: 'oidc-auth-code', ...authCode }, AuthCodeAuthClient],
    [{ client_type: 'oidc-auth-code-secret', ...authCode, ...secret }, AuthCodeAuthClient],
    [{ client_type: 'oidc-auth-code-pubkey', ...authCode, ...pubkey }, AuthCodeAuthClient],
    [{ client_type: 'oidc-device-code', ...oidc }, DeviceCodeAuthClient],
    [{ client_type: 'oidc-device-code-secret', ...oidc, ...secret }, DeviceCodeAuthClient],
    [{ client_type: 'oidc-device-code-pubkey', ...oidc, ...pubkey }, DeviceCodeAuthClient],
    [
      { client_type: 'oidc-client-credentials-secret', ...oidc, ...secret },
      ClientCredentialsAuthClient,
    ],
    [
      { client_type: 'oidc-client-credentials-pubkey', ...oidc, ...pubkey },
      ClientCredentialsAuthClient,
    ],
    [{ client_type: 'oidc-resource-owner', ...oidc }, ResourceOwnerAuthClient],
    [{ client_type: 'oidc-resource-owner-secret', ...oidc, ...secret }, ResourceOwnerAuthClient],
    [{ client_type: 'oidc-resource-owner-pubkey', ...oidc, ...pubkey }, ResourceOwnerAuthClient],
    [{ client_type: 'oidc-client-validator', ...oidc }, ClientValidatorAuthClient],
    [
      { client_type: 'planet-legacy', legacy_auth_endpoint: 'https://api.example.com/login' },
      LegacyApiKeyAuthClient,
    ],
    [{ client_type: 'static-api-key', api_key: 'test-key' }, StaticApiKeyAuthClient],
    [{ client_type: 'none' }, NoOpAuthClient],
  ])('should build the right client for %o', (input, expected) => {
    const client = createAuthClient(parseAuthClientConfig(input));

    expect(client).toBeInstanceOf(expected);
    expect(client.clientType).toBe(input.client_type);
  });
});

describe('auth client capability guards', () => {
  it('should recognise what each client can do', () => {
    const deviceClient = createAuthClient(
      parseAuthClientConfig({ client_type: 'oidc-device-code', ...oidc }),
    );
    const validator = createAuthClient(
      parseAuthClientConfig({ client_type: 'oidc-client-validator', ...oidc }),
    );
    const staticKey = createAuthClient(
      parseAuthClientConfig({ client_type: 'static-api-key', api_key: 'test-key' }),
    );

    expect([isLoginable(deviceClient), isRefreshable(deviceClient), isDeviceLoginable(deviceClient)])
      .toEqual([true, true, true]);
    expect([isLoginable(validator), isRefreshable(validator), isDeviceLoginable(validator)])
      .toEqual([false, false, false]);
    expect([isLoginable(staticKey), isRefreshable(staticKey), isDeviceLoginable(staticKey)])
      .toEqual([true, false, false]);
  });
});
