/**
 * Source of the headers that authenticate an outgoing API request.
 * Request authenticators implement it; HTTP clients only need this seam.
 * @public
 */
export interface IAuthProvider {
  /** Headers to merge into the request, refreshing the credential first when due. */
  getHeaders(): Promise<Record<string, string>>;

  /** Whether a token is currently held. */
  isValid(): Promise<boolean>;
}
