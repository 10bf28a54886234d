import { promises as fs } from 'fs';
import { join } from 'path';
import { describe, it, expect, vi } from 'vitest';
import {
  loadAuthClientConfigFile,
  parseAuthClientConfig,
} from '../../config/index.js';
import { AuthClientConfigError } from '../../errors/index.js';
import { AUTH_SERVER, createTempDir, removeTempDir } from '../helpers/test-utils.js';

vi.mock('@credgate/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@credgate/core')>();
  return { ...actual, logEvent: vi.fn() };
});

describe('parseAuthClientConfig', () => {
  it('should normalize scope and audience spellings', () => {
    const config = parseAuthClientConfig({
      client_type: 'oidc-client-credentials-secret',
      auth_server: AUTH_SERVER,
      client_id: 'test-client',
      client_secret: 'test-secret',
      scope: 'read  write',
      audience: 'https://api.example.com',
    });
    expect(config).toMatchObject({
      client_type: 'oidc-client-credentials-secret',
      scopes: ['read', 'write'],
      audiences: ['https://api.example.com'],
      client_auth_method: 'client_secret_basic',
    });
  });

  it('should prefer scopes over scope', () => {
    const config = parseAuthClientConfig({
      client_type: 'oidc-device-code',
      auth_server: AUTH_SERVER,
      client_id: 'test-client',
      scopes: ['openid'],
      scope: 'ignored',
    });
    expect(config).toMatchObject({ scopes: ['openid'] });
  });

  it('should treat null values as absent', () => {
    const config = parseAuthClientConfig({
      client_type: 'oidc-device-code',
      auth_server: AUTH_SERVER,
      client_id: 'test-client',
      issuer: null,
    });
    expect(config).not.toHaveProperty('issuer');
  });

  it('should reject more than one audience', () => {
    expect(() =>
      parseAuthClientConfig({
        client_type: 'oidc-device-code',
        auth_server: AUTH_SERVER,
        client_id: 'test-client',
        audiences: ['a', 'b'],
      }),
    ).toThrow('Invalid auth client configuration: audiences: audiences may only hold one value');
  });

  it('should require a private key for pubkey clients', () => {
    expect(() =>
      parseAuthClientConfig({
        client_type: 'oidc-client-credentials-pubkey',
        auth_server: AUTH_SERVER,
        client_id: 'test-client',
      }),
    ).toThrow(
      'Invalid auth client configuration: client_privkey: client_privkey or client_privkey_file must be configured',
    );
  });

  it('should reject an unknown client type', () => {
    expect(() => parseAuthClientConfig({ client_type: 'bogus' })).toThrow(
      AuthClientConfigError,
    );
  });

  it('should default the static key prefix', () => {
    expect(
      parseAuthClientConfig({ client_type: 'static-api-key', api_key: 'test-key' }),
    ).toEqual({ client_type: 'static-api-key', api_key: 'test-key', bearer_token_prefix: 'Bearer' });
  });

  it('should resolve environment placeholders', () => {
    const config = parseAuthClientConfig(
      {
        client_type: 'oidc-client-credentials-secret',
        auth_server: '${AUTH_HOST}/oauth2/${REALM:default}',
        client_id: 'test-client',
        client_secret: '${CLIENT_SECRET}',
      },
      { env: { AUTH_HOST: 'https://login.example.com', CLIENT_SECRET: 'test-secret' } },
    );
    expect(config).toMatchObject({
      auth_server: 'https://login.example.com/oauth2/default',
      client_secret: 'test-secret',
    });
  });

  it('should name a missing variable', () => {
    expect(() =>
      parseAuthClientConfig(
        { client_type: 'static-api-key', api_key: '${MISSING_KEY}' },
        { env: {} },
      ),
    ).toThrow(
      "Auth client configuration: Required environment variable 'MISSING_KEY' is not defined",
    );
  });

  it('should leave placeholders when resolution is off', () => {
    const config = parseAuthClientConfig(
      { client_type: 'static-api-key', api_key: '${KEY}' },
      { resolveEnv: false },
    );
    expect(config).toMatchObject({ api_key: '${KEY}' });
  });
});

describe('loadAuthClientConfigFile', () => {
  it('should read and validate a file', async () => {
    const dir = await createTempDir();
    try {
      const filePath = join(dir, 'client.json');
      await fs.writeFile(filePath, JSON.stringify({ client_type: 'none' }));
      await expect(loadAuthClientConfigFile(filePath)).resolves.toEqual({
        client_type: 'none',
      });
    } finally {
      await removeTempDir(dir);
    }
  });

  it('should wrap read failures', async () => {
    await expect(
      loadAuthClientConfigFile('/nonexistent/credgate/client.json'),
    ).rejects.toThrow(
      'Failed to read auth client configuration /nonexistent/credgate/client.json',
    );
  });
});
