import { promises as fs } from 'fs';
import { err, ok, type Result } from '@credgate/core';
import { DataIntegrityError } from '../errors/index.js';
import { toError } from '../errors/authentication-error.js';
import {
  isJsonObject,
  readJsonFile,
  writeJsonFile,
  type JsonObject,
} from './json-file.js';

/**
 * A JSON object held in memory and optionally backed by a file.
 *
 * `null` data means "constructed but never set": it supports deferred
 * loading. Once data has been set, by {@link setData} or by loading, it can
 * only be replaced with data that passes {@link checkData}. An empty object
 * is valid at this level; subclasses tighten the contract.
 *
 * Without a path the object behaves as a validating in-memory holder:
 * {@link save} and {@link load} succeed without touching the disk.
 *
 * @example
 * ```typescript
 * const cred = new OidcCredential(null, '/home/me/.config/app/token.json');
 * await cred.lazyLoad();
 * cred.accessToken();
 * ```
 * @public
 */
export class FileBackedJsonObject {
  protected _data: JsonObject | null;
  private _filePath?: string;
  private loadTime = 0;

  /**
   * Leaf-class validation is not applied to constructor data; call
   * {@link check} when that matters.
   */
  public constructor(data: JsonObject | null = null, filePath?: string) {
    this._filePath = filePath || undefined;
    this._data = data ? { ...data } : data;
    if (data) {
      this.loadTime = Date.now();
    }
  }

  public path(): string | undefined {
    return this._filePath;
  }

  public setPath(filePath: string | undefined): void {
    this._filePath = filePath || undefined;
  }

  /**
   * Current in-memory data. Never touches the disk.
   */
  public data(): JsonObject | null {
    return this._data;
  }

  /**
   * Replaces the in-memory data. Invalid data is rejected and the current
   * data is left as it was.
   * @throws {DataIntegrityError} When the data fails {@link checkData}
   */
  public setData(data: JsonObject | null): void {
    this.checkData(data);
    this._data = data ? { ...data } : {};
    this.loadTime = Date.now();
  }

  /**
   * Merges a sparse update over the current data, then applies
   * {@link setData} to the result.
   */
  public updateData(sparseUpdate: JsonObject): void {
    const merged = this._data ? { ...this._data, ...sparseUpdate } : sparseUpdate;
    this.setData(merged);
  }

  /**
   * Validates candidate data. Subclasses add their own rules and must call
   * the base implementation.
   * @throws {DataIntegrityError} When the data is not acceptable
   */
  public checkData(data: JsonObject | null): void {
    if (data === null) {
      throw new DataIntegrityError(
        `null is not valid data for ${this.constructor.name}`,
        { filePath: this._filePath },
      );
    }
  }

  /**
   * Runs {@link checkData} against the current in-memory state without
   * loading first.
   */
  public check(): void {
    try {
      this.checkData(this._data);
    } catch (error) {
      if (error instanceof DataIntegrityError && !error.filePath && this._filePath) {
        throw new DataIntegrityError(error.message, {
          filePath: this._filePath,
          cause: error,
        });
      }
      throw error;
    }
  }

  public isLoaded(): boolean {
    return this._data !== null && Object.keys(this._data).length > 0;
  }

  /**
   * Validates and writes the data. Without a path this only validates.
   */
  public async save(): Promise<void> {
    this.checkData(this._data);
    if (!this._filePath || !this._data) {
      return;
    }

    await writeJsonFile(this._filePath, this._data);
    this.loadTime = Date.now();
  }

  /**
   * Reads the backing file. Without a path this is a no-op.
   *
   * Unreadable or invalid file content raises and the in-memory data stays
   * unchanged.
   * @throws {DataIntegrityError} When the file is missing, unparsable or fails {@link checkData}
   */
  public async load(): Promise<void> {
    const filePath = this._filePath;
    if (!filePath) {
      return;
    }

    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error) {
      throw new DataIntegrityError(
        `Failed to read ${this.constructor.name} data: ${toError(error).message}`,
        { filePath, cause: toError(error) },
      );
    }

    if (!isJsonObject(raw)) {
      throw new DataIntegrityError(
        `${this.constructor.name} data must be a JSON object`,
        { filePath },
      );
    }

    this.checkData(raw);
    this._data = raw;
    this.loadTime = Date.now();
  }

  /**
   * Loads the file when present.
   *
   * A missing file is an expected outcome and yields `ok(false)`; invalid
   * content yields the error instead of throwing it.
   */
  public async tryLoad(): Promise<Result<boolean, DataIntegrityError>> {
    const filePath = this._filePath;
    if (!filePath) {
      return ok(false);
    }
    try {
      await fs.access(filePath);
    } catch {
      return ok(false);
    }
    try {
      await this.load();
      return ok(true);
    } catch (error) {
      if (error instanceof DataIntegrityError) {
        return err(error);
      }
      throw error;
    }
  }

  /**
   * Loads only when no data has been set yet.
   */
  public async lazyLoad(): Promise<void> {
    if (!this.isLoaded()) {
      await this.load();
    }
  }

  /**
   * Loads when nothing is in memory, or when the backing file changed since
   * the data was last loaded, set or saved.
   */
  public async lazyReload(): Promise<void> {
    if (!this.isLoaded()) {
      await this.load();
      return;
    }
    if (!this._filePath) {
      return;
    }

    let modifiedAt: number;
    try {
      modifiedAt = (await fs.stat(this._filePath)).mtimeMs;
    } catch (error) {
      throw new DataIntegrityError(
        `Failed to stat ${this.constructor.name} data: ${toError(error).message}`,
        { filePath: this._filePath, cause: toError(error) },
      );
    }
    if (modifiedAt > this.loadTime) {
      await this.load();
    }
  }

  /**
   * Lazily loads, then returns one field.
   */
  public async lazyGet(field: string): Promise<unknown> {
    await this.lazyLoad();
    return this._data?.[field];
  }

  /**
   * Reads a string field from the in-memory data.
   * @internal
   */
  protected getString(field: string): string | undefined {
    const value = this._data?.[field];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }

  /**
   * Reads a numeric field from the in-memory data.
   * @internal
   */
  protected getNumber(field: string): number | undefined {
    const value = this._data?.[field];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
  }
}
