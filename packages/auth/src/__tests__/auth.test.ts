import { promises as fs } from 'fs';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Auth } from '../auth.js';
import { ClientCredentialsAuthClient } from '../auth-clients/index.js';
import { AuthClientConfigError } from '../errors/index.js';
import {
  AUTH_SERVER,
  DISCOVERY_DOCUMENT,
  TOKEN_ENDPOINT,
  createTempDir,
  jsonResponse,
  nowSeconds,
  removeTempDir,
  requestedUrls,
  routedFetch,
  unsignedJwt,
} from './helpers/test-utils.js';

vi.mock('@credgate/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@credgate/core')>();
  return { ...actual, logEvent: vi.fn() };
});

const CLIENT_CREDENTIALS_CONFIG = {
  client_type: 'oidc-client-credentials-secret',
  auth_server: AUTH_SERVER,
  client_id: 'test-client',
  client_secret: 'test-secret',
};

describe('Auth', () => {
  let dir: string;
  let tokenFile: string;

  beforeEach(async () => {
    dir = await createTempDir();
    tokenFile = join(dir, 'token.json');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('login', () => {
    it('should save the credential and authenticate requests with it', async () => {
      const accessToken = unsignedJwt({ iat: nowSeconds(), exp: nowSeconds() + 3600 });
      const fetchMock = routedFetch({
        [TOKEN_ENDPOINT]: () => jsonResponse({ access_token: accessToken, expires_in: 3600 }),
      });
      const auth = Auth.initializeFromConfigDict(CLIENT_CREDENTIALS_CONFIG, {
        tokenFile,
        deps: { fetch: fetchMock },
      });

      const credential = await auth.login();
      const headers = await auth.requestAuthenticator().getHeaders();

      expect(auth.authClient()).toBeInstanceOf(ClientCredentialsAuthClient);
      expect(auth.tokenFilePath()).toBe(tokenFile);
      expect(credential.path()).toBe(tokenFile);
      const saved: unknown = JSON.parse(await fs.readFile(tokenFile, 'utf8'));
      expect(saved).toMatchObject({ access_token: accessToken, expires_in: 3600 });
      expect(headers.Authorization).toBe(`Bearer ${accessToken}`);
      expect(requestedUrls(fetchMock)).toEqual([
        `${AUTH_SERVER}/.well-known/openid-configuration`,
        TOKEN_ENDPOINT,
      ]);
    });

    it('should reject login for a client type that cannot log in', async () => {
      const auth = Auth.initializeFromConfigDict({
        client_type: 'oidc-client-validator',
        auth_server: AUTH_SERVER,
        client_id: 'test-client',
      });

      await expect(auth.login()).rejects.toThrow(
        "Operation 'login' is not supported by client type 'oidc-client-validator'",
      );
    });
  });

  describe('device login', () => {
    const deviceResponse = {
      device_code: 'test-device-code',
      user_code: 'WDJB-MJHT',
      verification_uri: 'https://login.example.com/activate',
      expires_in: 600,
      interval: 5,
    };

    it('should initiate and complete in separate calls', async () => {
      const accessToken = unsignedJwt({ iat: nowSeconds(), exp: nowSeconds() + 3600 });
      const fetchMock = routedFetch({
        [DISCOVERY_DOCUMENT.device_authorization_endpoint]: () => jsonResponse(deviceResponse),
        [TOKEN_ENDPOINT]: () =>
          jsonResponse({ access_token: accessToken, refresh_token: 'test-refresh' }),
      });
      const auth = Auth.initializeFromConfigDict(
        { client_type: 'oidc-device-code', auth_server: AUTH_SERVER, client_id: 'test-client' },
        { tokenFile, deps: { fetch: fetchMock } },
      );

      const initiation = await auth.deviceLoginInitiate();
      const credential = await auth.deviceLoginComplete(initiation);

      expect(initiation.user_code).toBe('WDJB-MJHT');
      expect(credential.refreshToken()).toBe('test-refresh');
      const saved: unknown = JSON.parse(await fs.readFile(tokenFile, 'utf8'));
      expect(saved).toMatchObject({ access_token: accessToken, refresh_token: 'test-refresh' });
    });

    it('should reject device login for other client types', async () => {
      const auth = Auth.initializeFromConfigDict(CLIENT_CREDENTIALS_CONFIG);

      await expect(auth.deviceLoginInitiate()).rejects.toBeInstanceOf(AuthClientConfigError);
    });
  });

  describe('initializeFromConfigFile', () => {
    it('should read the configuration and resolve placeholders', async () => {
      const configFile = join(dir, 'client.json');
      await fs.writeFile(
        configFile,
        JSON.stringify({ client_type: 'static-api-key', api_key: '${TEST_API_KEY}' }),
      );

      const auth = await Auth.initializeFromConfigFile(configFile, {
        env: { TEST_API_KEY: 'test-key' },
      });

      expect(auth.authClient().config()).toEqual({
        client_type: 'static-api-key',
        api_key: 'test-key',
        bearer_token_prefix: 'Bearer',
      });
      expect((await auth.requestAuthenticator().getHeaders()).Authorization).toBe(
        'Bearer test-key',
      );
    });

    it('should raise a config error for a missing file', async () => {
      await expect(
        Auth.initializeFromConfigFile(join(dir, 'missing.json')),
      ).rejects.toBeInstanceOf(AuthClientConfigError);
    });
  });
});
