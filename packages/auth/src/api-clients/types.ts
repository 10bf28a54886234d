/**
 * Wire shapes of OIDC endpoint responses.
 *
 * Schemas pass unknown members through so that provider-specific fields
 * survive into persisted credentials.
 *
 * @public
 */

import { z } from 'zod';

/**
 * Successful token endpoint response (RFC 6749 section 5.1).
 */
export const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().nonnegative().optional(),
    refresh_token: z.string().optional(),
    id_token: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/**
 * OpenID Provider Metadata (OpenID Connect Discovery 1.0 section 3).
 */
export const DiscoveryDocumentSchema = z
  .object({
    issuer: z.string().min(1),
    authorization_endpoint: z.string().optional(),
    token_endpoint: z.string().optional(),
    device_authorization_endpoint: z.string().optional(),
    introspection_endpoint: z.string().optional(),
    revocation_endpoint: z.string().optional(),
    userinfo_endpoint: z.string().optional(),
    jwks_uri: z.string().optional(),
    scopes_supported: z.array(z.string()).optional(),
  })
  .passthrough();

export type DiscoveryDocument = z.infer<typeof DiscoveryDocumentSchema>;

/**
 * Device authorization response (RFC 8628 section 3.2).
 */
export const DeviceAuthorizationResponseSchema = z
  .object({
    device_code: z.string().min(1),
    user_code: z.string().min(1),
    verification_uri: z.string().min(1),
    verification_uri_complete: z.string().optional(),
    expires_in: z.number().positive(),
    interval: z.number().positive().optional(),
  })
  .passthrough();

export type DeviceAuthorizationResponse = z.infer<
  typeof DeviceAuthorizationResponseSchema
>;

/**
 * Token introspection response (RFC 7662 section 2.2).
 */
export const IntrospectionResponseSchema = z
  .object({
    active: z.boolean(),
  })
  .passthrough();

export type IntrospectionResponse = z.infer<typeof IntrospectionResponseSchema>;

export const JwkSchema = z
  .object({
    kty: z.string().min(1),
    kid: z.string().optional(),
    alg: z.string().optional(),
    use: z.string().optional(),
  })
  .passthrough();

export type Jwk = z.infer<typeof JwkSchema>;

export const JwksSchema = z
  .object({
    keys: z.array(JwkSchema),
  })
  .passthrough();

export const UserinfoResponseSchema = z
  .object({
    sub: z.string().min(1),
  })
  .passthrough();

export type UserinfoResponse = z.infer<typeof UserinfoResponseSchema>;

/**
 * Form fields of a request to an auth server endpoint. Array values are
 * sent as repeated parameters; undefined values are omitted.
 */
export type FormPayload = Record<string, string | string[] | undefined>;

/**
 * Extra parameters forwarded to the auth server verbatim
 * (`organization`, `project_id`, provider-specific hints).
 */
export type ExtraParams = Record<string, string>;

/**
 * A request payload after client authentication was applied.
 */
export interface EnrichedRequest {
  payload: FormPayload;
  headers: Record<string, string>;
}

/**
 * Applies client authentication to a request bound for `audience` (the
 * endpoint URI). Implementations either add fields to the payload or
 * return headers.
 */
export type ClientAuthEnricher = (
  payload: FormPayload,
  audience: string,
) => Promise<EnrichedRequest>;
