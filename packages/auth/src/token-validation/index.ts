export {
  TokenValidator,
  DEFAULT_ALLOWED_ALGORITHMS,
  type JwksKeySource,
  type TokenClaims,
  type TokenValidatorOptions,
  type ValidateTokenParams,
} from './token-validator.js';
export {
  inspectUnverifiedClaims,
  computeRefreshAt,
  type UnverifiedClaims,
} from './jwt-inspection.js';
export {
  OidcMultiIssuerValidator,
  type IssuerTrustEntry,
  type MultiIssuerValidationResult,
} from './multi-issuer-validator.js';
