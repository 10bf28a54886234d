import { FileBackedJsonObject } from '../persistence/file-backed-json-object.js';

/**
 * Base type for persisted authentication material.
 *
 * Any JSON object, including `{}`, is a valid credential at this level.
 * The optional `_iat` and `_exp` fields (epoch seconds) record when the
 * credential was issued and when it stops being usable.
 * @public
 */
export class Credential extends FileBackedJsonObject {
  public issuedTime(): number | undefined {
    return this.getNumber('_iat');
  }

  public expiryTime(): number | undefined {
    return this.getNumber('_exp');
  }

  /**
   * A credential without a recorded expiry never reports as expired.
   * @param nowSeconds - Reference time in epoch seconds
   */
  public isExpired(nowSeconds: number = Math.floor(Date.now() / 1000)): boolean {
    const exp = this.expiryTime();
    return exp !== undefined && nowSeconds >= exp;
  }
}
