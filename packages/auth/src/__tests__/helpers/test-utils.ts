import { promises as fs } from 'fs';
import { createServer } from 'net';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  exportJWK,
  generateKeyPair,
  SignJWT,
  UnsecuredJWT,
  type JWTPayload,
  type KeyLike,
} from 'jose';
import { vi } from 'vitest';
import type { Jwk } from '../../api-clients/types.js';
import type {
  DeviceCodePrompt,
  LoginPresenter,
} from '../../auth-clients/login-presenter.js';

export const AUTH_SERVER = 'https://login.example.com/oauth2/default';
export const TOKEN_ENDPOINT = `${AUTH_SERVER}/v1/token`;
export const JWKS_ENDPOINT = `${AUTH_SERVER}/v1/keys`;

/**
 * A JSON response as an auth server would send it.
 */
export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function textResponse(
  body: string,
  status = 200,
  contentType = 'text/plain',
): Response {
  return new Response(body, { status, headers: { 'Content-Type': contentType } });
}

/**
 * A decodable JWT with no signature, for code that only inspects claims.
 */
export function unsignedJwt(claims: JWTPayload): string {
  return new UnsecuredJWT(claims).encode();
}

export interface TestSigningKey {
  kid: string;
  privateKey: KeyLike;
  jwk: Jwk;
}

export async function createSigningKey(kid: string): Promise<TestSigningKey> {
  const { privateKey, publicKey } = await generateKeyPair('RS256');
  const exported = await exportJWK(publicKey);
  const jwk: Jwk = { ...exported, kty: exported.kty ?? 'RSA', kid, alg: 'RS256', use: 'sig' };
  return { kid, privateKey, jwk };
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export async function signToken(
  key: TestSigningKey,
  claims: JWTPayload,
): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: 'RS256', kid: key.kid })
    .sign(key.privateKey);
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), 'credgate-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * The URL of the `index`th call to a fetch mock.
 */
export function calledUrl(
  fetchMock: { mock: { calls: unknown[][] } },
  index: number,
): string {
  const input = fetchMock.mock.calls[index]?.[0];
  return String(input);
}

/**
 * The request init of the `index`th call to a fetch mock.
 */
export function calledInit(
  fetchMock: { mock: { calls: unknown[][] } },
  index: number,
): RequestInit {
  const init = fetchMock.mock.calls[index]?.[1];
  if (typeof init !== 'object' || init === null) {
    throw new Error(`fetch call ${index} had no init`);
  }
  return init;
}

/**
 * The form body of the `index`th call to a fetch mock.
 */
export function calledForm(
  fetchMock: { mock: { calls: unknown[][] } },
  index: number,
): URLSearchParams {
  const body = calledInit(fetchMock, index).body;
  return new URLSearchParams(typeof body === 'string' ? body : '');
}

export function calledHeaders(
  fetchMock: { mock: { calls: unknown[][] } },
  index: number,
): Record<string, string> {
  const headers = calledInit(fetchMock, index).headers;
  return Object.fromEntries(new Headers(headers).entries());
}

export const DISCOVERY_DOCUMENT = {
  issuer: AUTH_SERVER,
  authorization_endpoint: `${AUTH_SERVER}/v1/authorize`,
  token_endpoint: TOKEN_ENDPOINT,
  device_authorization_endpoint: `${AUTH_SERVER}/v1/device/authorize`,
  introspection_endpoint: `${AUTH_SERVER}/v1/introspect`,
  revocation_endpoint: `${AUTH_SERVER}/v1/revoke`,
  userinfo_endpoint: `${AUTH_SERVER}/v1/userinfo`,
  jwks_uri: JWKS_ENDPOINT,
  scopes_supported: ['openid', 'profile', 'offline_access'],
};

export type RouteHandler = (init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * A fetch stand-in that answers by URL origin and path. The discovery
 * document is served unless a route replaces it.
 */
export function routedFetch(routes: Record<string, RouteHandler>) {
  const table: Record<string, RouteHandler> = {
    [`${AUTH_SERVER}/.well-known/openid-configuration`]: () => jsonResponse(DISCOVERY_DOCUMENT),
    ...routes,
  };
  return vi.fn<typeof fetch>(async (input, init) => {
    const url = new URL(String(input));
    const handler = table[`${url.origin}${url.pathname}`];
    if (!handler) {
      return new Response('Not Found', { status: 404 });
    }
    return handler(init);
  });
}

/**
 * URLs of every request a fetch mock received, in order.
 */
export function requestedUrls(fetchMock: { mock: { calls: unknown[][] } }): string[] {
  return fetchMock.mock.calls.map((call) => {
    const url = new URL(String(call[0]));
    return `${url.origin}${url.pathname}`;
  });
}

export function createPresenter() {
  return {
    showAuthorizationUrl: vi.fn(async (_url: string): Promise<void> => undefined),
    showDeviceCode: vi.fn(async (_prompt: DeviceCodePrompt): Promise<void> => undefined),
    promptForAuthorizationCode: vi.fn(async (_url: string): Promise<string> => 'test-code'),
    promptForUsername: vi.fn(async (): Promise<string> => 'user@example.com'),
    promptForPassword: vi.fn(async (): Promise<string> => 'test-password'),
  } satisfies LoginPresenter;
}

/**
 * A loopback port that was free a moment ago.
 */
export async function freePort(): Promise<number> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;
  await new Promise<void>((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve())),
  );
  return port;
}
