/**
 * Auth client configuration schemas with field normalization.
 *
 * Every supported client type is one member of a discriminated union keyed
 * by `client_type`. Input is normalized before validation:
 * - `scope` (space-separated string) → `scopes` (array)
 * - `audience` (string) → `audiences` (single-element array)
 *
 * @example
 * ```typescript
 * import { AuthClientConfigSchema } from './schemas.js';
 *
 * const config = AuthClientConfigSchema.parse({
 *   client_type: 'oidc-client-credentials-secret',
 *   auth_server: 'https://login.example.com/oauth2/default',
 *   client_id: 'my-client',
 *   client_secret: 'test-secret',
 *   scope: 'read write', // normalized to ['read', 'write']
 * });
 * ```
 *
 * @public
 */

import { z } from 'zod';

const endpoint = z.string().url();

const OidcBaseShape = {
  auth_server: z.string().min(1, 'auth_server must be configured'),
  client_id: z.string().min(1, 'client_id must be configured'),
  issuer: z.string().min(1).optional(),
  scopes: z.array(z.string().min(1)).optional(),
  audiences: z
    .array(z.string().min(1))
    .length(1, 'audiences may only hold one value')
    .optional(),
  organization: z.string().optional(),
  project_id: z.string().optional(),
  authorization_endpoint: endpoint.optional(),
  device_authorization_endpoint: endpoint.optional(),
  introspection_endpoint: endpoint.optional(),
  jwks_endpoint: endpoint.optional(),
  revocation_endpoint: endpoint.optional(),
  userinfo_endpoint: endpoint.optional(),
  token_endpoint: endpoint.optional(),
};

const ClientSecretShape = {
  client_secret: z.string().min(1, 'client_secret must be configured'),
  client_auth_method: z
    .enum(['client_secret_basic', 'client_secret_post'])
    .default('client_secret_basic'),
};

const ClientPubkeyShape = {
  client_privkey: z.string().min(1).optional(),
  client_privkey_file: z.string().min(1).optional(),
  client_privkey_password: z.string().optional(),
  client_assertion_alg: z
    .enum(['RS256', 'RS384', 'RS512', 'PS256', 'ES256', 'ES384'])
    .default('RS256'),
};

const AuthCodeShape = {
  redirect_uri: z.string().url(),
  local_redirect_uri: z.string().url().optional(),
  authorization_callback_acknowledgement: z.string().optional(),
  authorization_callback_acknowledgement_file: z.string().optional(),
};

const ResourceOwnerShape = {
  username: z.string().optional(),
  password: z.string().optional(),
};

export const OidcAuthCodeConfigSchema = z.object({
  client_type: z.literal('oidc-auth-code'),
  ...OidcBaseShape,
  ...AuthCodeShape,
});

export const OidcAuthCodeSecretConfigSchema = z.object({
  client_type: z.literal('oidc-auth-code-secret'),
  ...OidcBaseShape,
  ...AuthCodeShape,
  ...ClientSecretShape,
});

export const OidcAuthCodePubkeyConfigSchema = z.object({
  client_type: z.literal('oidc-auth-code-pubkey'),
  ...OidcBaseShape,
  ...AuthCodeShape,
  ...ClientPubkeyShape,
});

export const OidcClientCredentialsSecretConfigSchema = z.object({
  client_type: z.literal('oidc-client-credentials-secret'),
  ...OidcBaseShape,
  ...ClientSecretShape,
});

export const OidcClientCredentialsPubkeyConfigSchema = z.object({
  client_type: z.literal('oidc-client-credentials-pubkey'),
  ...OidcBaseShape,
  ...ClientPubkeyShape,
});

export const OidcDeviceCodeConfigSchema = z.object({
  client_type: z.literal('oidc-device-code'),
  ...OidcBaseShape,
});

export const OidcDeviceCodeSecretConfigSchema = z.object({
  client_type: z.literal('oidc-device-code-secret'),
  ...OidcBaseShape,
  ...ClientSecretShape,
});

export const OidcDeviceCodePubkeyConfigSchema = z.object({
  client_type: z.literal('oidc-device-code-pubkey'),
  ...OidcBaseShape,
  ...ClientPubkeyShape,
});

export const OidcResourceOwnerConfigSchema = z.object({
  client_type: z.literal('oidc-resource-owner'),
  ...OidcBaseShape,
  ...ResourceOwnerShape,
});

export const OidcResourceOwnerSecretConfigSchema = z.object({
  client_type: z.literal('oidc-resource-owner-secret'),
  ...OidcBaseShape,
  ...ResourceOwnerShape,
  ...ClientSecretShape,
});

export const OidcResourceOwnerPubkeyConfigSchema = z.object({
  client_type: z.literal('oidc-resource-owner-pubkey'),
  ...OidcBaseShape,
  ...ResourceOwnerShape,
  ...ClientPubkeyShape,
});

export const OidcClientValidatorConfigSchema = z.object({
  client_type: z.literal('oidc-client-validator'),
  ...OidcBaseShape,
});

export const PlanetLegacyConfigSchema = z.object({
  client_type: z.literal('planet-legacy'),
  legacy_auth_endpoint: z.string().url(),
  api_key: z.string().optional(),
});

export const StaticApiKeyConfigSchema = z.object({
  client_type: z.literal('static-api-key'),
  api_key: z.string().min(1, 'api_key must be configured'),
  bearer_token_prefix: z.string().default('Bearer'),
});

export const NoneConfigSchema = z.object({
  client_type: z.literal('none'),
});

const AuthClientConfigUnionSchema = z
  .discriminatedUnion('client_type', [
    OidcAuthCodeConfigSchema,
    OidcAuthCodeSecretConfigSchema,
    OidcAuthCodePubkeyConfigSchema,
    OidcClientCredentialsSecretConfigSchema,
    OidcClientCredentialsPubkeyConfigSchema,
    OidcDeviceCodeConfigSchema,
    OidcDeviceCodeSecretConfigSchema,
    OidcDeviceCodePubkeyConfigSchema,
    OidcResourceOwnerConfigSchema,
    OidcResourceOwnerSecretConfigSchema,
    OidcResourceOwnerPubkeyConfigSchema,
    OidcClientValidatorConfigSchema,
    PlanetLegacyConfigSchema,
    StaticApiKeyConfigSchema,
    NoneConfigSchema,
  ])
  .superRefine((config, ctx) => {
    if (
      'client_assertion_alg' in config &&
      !config.client_privkey &&
      !config.client_privkey_file
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['client_privkey'],
        message: 'client_privkey or client_privkey_file must be configured',
      });
    }
  });

/**
 * Normalizes alternate spellings before the union is validated.
 * @internal
 */
function normalizeConfigInput(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return input;
  }

  const result: Record<string, unknown> = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== null),
  );

  if (result.scopes === undefined && typeof result.scope === 'string') {
    result.scopes = result.scope.split(' ').filter((s) => s.length > 0);
  }
  delete result.scope;

  if (result.audiences === undefined && typeof result.audience === 'string') {
    result.audiences = [result.audience];
  }
  delete result.audience;

  return result;
}

/**
 * Zod schema for every supported auth client configuration.
 *
 * Null-valued keys are dropped before validation, so that files written
 * with explicit nulls parse the same as files that omit those keys.
 *
 * @public
 */
export const AuthClientConfigSchema = z.preprocess(
  normalizeConfigInput,
  AuthClientConfigUnionSchema,
);

export type AuthClientConfig = z.infer<typeof AuthClientConfigUnionSchema>;
export type AuthClientConfigInput = z.input<typeof AuthClientConfigUnionSchema>;
export type ClientType = AuthClientConfig['client_type'];

export type OidcAuthCodeConfig = z.infer<typeof OidcAuthCodeConfigSchema>;
export type OidcAuthCodeSecretConfig = z.infer<
  typeof OidcAuthCodeSecretConfigSchema
>;
export type OidcAuthCodePubkeyConfig = z.infer<
  typeof OidcAuthCodePubkeyConfigSchema
>;
export type OidcClientCredentialsSecretConfig = z.infer<
  typeof OidcClientCredentialsSecretConfigSchema
>;
export type OidcClientCredentialsPubkeyConfig = z.infer<
  typeof OidcClientCredentialsPubkeyConfigSchema
>;
export type OidcDeviceCodeConfig = z.infer<typeof OidcDeviceCodeConfigSchema>;
export type OidcDeviceCodeSecretConfig = z.infer<
  typeof OidcDeviceCodeSecretConfigSchema
>;
export type OidcDeviceCodePubkeyConfig = z.infer<
  typeof OidcDeviceCodePubkeyConfigSchema
>;
export type OidcResourceOwnerConfig = z.infer<
  typeof OidcResourceOwnerConfigSchema
>;
export type OidcResourceOwnerSecretConfig = z.infer<
  typeof OidcResourceOwnerSecretConfigSchema
>;
export type OidcResourceOwnerPubkeyConfig = z.infer<
  typeof OidcResourceOwnerPubkeyConfigSchema
>;
export type OidcClientValidatorConfig = z.infer<
  typeof OidcClientValidatorConfigSchema
>;
export type PlanetLegacyConfig = z.infer<typeof PlanetLegacyConfigSchema>;
export type StaticApiKeyConfig = z.infer<typeof StaticApiKeyConfigSchema>;
export type NoneConfig = z.infer<typeof NoneConfigSchema>;

/**
 * Fields shared by every OIDC client type.
 * @public
 */
export type OidcClientConfig = Extract<
  AuthClientConfig,
  { auth_server: string }
>;
export type AuthCodeClientConfig = Extract<
  AuthClientConfig,
  { redirect_uri: string }
>;
export type DeviceCodeClientConfig =
  | OidcDeviceCodeConfig
  | OidcDeviceCodeSecretConfig
  | OidcDeviceCodePubkeyConfig;
export type ClientCredentialsClientConfig =
  | OidcClientCredentialsSecretConfig
  | OidcClientCredentialsPubkeyConfig;
export type ResourceOwnerClientConfig =
  | OidcResourceOwnerConfig
  | OidcResourceOwnerSecretConfig
  | OidcResourceOwnerPubkeyConfig;
export type ClientSecretFields = {
  client_id: string;
  client_secret: string;
  client_auth_method: 'client_secret_basic' | 'client_secret_post';
};
export type ClientPubkeyFields = {
  client_id: string;
  client_privkey?: string;
  client_privkey_file?: string;
  client_privkey_password?: string;
  client_assertion_alg: OidcAuthCodePubkeyConfig['client_assertion_alg'];
};
