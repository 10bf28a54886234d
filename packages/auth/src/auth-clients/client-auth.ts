/**
 * Client authentication for token, introspection and revocation requests.
 */
import { promises as fs } from 'fs';
import { createPrivateKey, type KeyObject } from 'crypto';
import { SignJWT } from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { AuthClientConfigError, toError } from '../errors/index.js';
import type { ClientAuthEnricher } from '../api-clients/types.js';
import type { ClientPubkeyFields, ClientSecretFields, OidcClientConfig } from '../schemas.js';

export const CLIENT_ASSERTION_TYPE =
  'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

/** Lifetime of a signed client assertion, in seconds. */
export const CLIENT_ASSERTION_LIFETIME_SECONDS = 300;

/**
 * Public clients identify themselves with `client_id` only.
 */
export function noClientAuth(clientId: string): ClientAuthEnricher {
  return async (payload) => ({
    payload: { ...payload, client_id: clientId },
    headers: {},
  });
}

/**
 * Shared-secret client authentication (RFC 6749 section 2.3.1), in the
 * `Authorization: Basic` header or as `client_secret` in the form.
 */
export function clientSecretAuth(fields: ClientSecretFields): ClientAuthEnricher {
  if (fields.client_auth_method === 'client_secret_post') {
    return async (payload) => ({
      payload: {
        ...payload,
        client_id: fields.client_id,
        client_secret: fields.client_secret,
      },
      headers: {},
    });
  }

  const basic = Buffer.from(
    `${encodeURIComponent(fields.client_id)}:${encodeURIComponent(fields.client_secret)}`,
  ).toString('base64');
  return async (payload) => ({
    payload: { ...payload, client_id: fields.client_id },
    headers: { Authorization: `Basic ${basic}` },
  });
}

/**
 * Private-key JWT client authentication (RFC 7523 section 2.2).
 *
 * Each request gets a fresh assertion with `iss` and `sub` set to the
 * client id, `aud` set to the endpoint, and a random `jti`. The key is read
 * once, on first use.
 */
export function privateKeyJwtAuth(fields: ClientPubkeyFields): ClientAuthEnricher {
  let keyPromise: Promise<KeyObject> | undefined;

  const loadKey = async (): Promise<KeyObject> => {
    let pem = fields.client_privkey;
    if (!pem && fields.client_privkey_file) {
      try {
        pem = await fs.readFile(fields.client_privkey_file, 'utf-8');
      } catch (error) {
        throw new AuthClientConfigError(
          `Client private key file could not be read: ${toError(error).message}`,
          toError(error),
        );
      }
    }
    if (!pem) {
      throw AuthClientConfigError.missingField(
        'client_privkey or client_privkey_file',
        'Private key client authentication',
      );
    }
    try {
      return createPrivateKey({
        key: pem,
        format: 'pem',
        passphrase: fields.client_privkey_password,
      });
    } catch (error) {
      throw new AuthClientConfigError(
        `Client private key could not be loaded: ${toError(error).message}`,
        toError(error),
      );
    }
  };

  return async (payload, audience) => {
    keyPromise ??= loadKey();
    let key: KeyObject;
    try {
      key = await keyPromise;
    } catch (error) {
      keyPromise = undefined;
      throw error;
    }

    const now = Math.floor(Date.now() / 1000);
    const assertion = await new SignJWT({})
      .setProtectedHeader({ alg: fields.client_assertion_alg, typ: 'JWT' })
      .setIssuer(fields.client_id)
      .setSubject(fields.client_id)
      .setAudience(audience)
      .setJti(uuidv4())
      .setIssuedAt(now)
      .setExpirationTime(now + CLIENT_ASSERTION_LIFETIME_SECONDS)
      .sign(key);

    return {
      payload: {
        ...payload,
        client_id: fields.client_id,
        client_assertion_type: CLIENT_ASSERTION_TYPE,
        client_assertion: assertion,
      },
      headers: {},
    };
  };
}

/**
 * Picks the enricher matching the client type's authentication fields.
 */
export function clientAuthEnricherFor(config: OidcClientConfig): ClientAuthEnricher {
  if ('client_secret' in config) {
    return clientSecretAuth(config);
  }
  if ('client_assertion_alg' in config) {
    return privateKeyJwtAuth(config);
  }
  return noClientAuth(config.client_id);
}
