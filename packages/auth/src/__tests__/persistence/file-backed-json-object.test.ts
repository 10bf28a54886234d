import { promises as fs } from 'fs';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FileBackedJsonObject } from '../../persistence/file-backed-json-object.js';
import { DataIntegrityError } from '../../errors/index.js';
import { createTempDir, removeTempDir } from '../helpers/test-utils.js';

vi.mock('@credgate/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@credgate/core')>();
  return { ...actual, logEvent: vi.fn() };
});

describe('FileBackedJsonObject', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('setData', () => {
    it('should reject null data and keep the current data', () => {
      const holder = new FileBackedJsonObject({ a: 1 });
      expect(() => holder.setData(null)).toThrow(DataIntegrityError);
      expect(holder.data()).toEqual({ a: 1 });
    });

    it('should accept an empty object', () => {
      const holder = new FileBackedJsonObject();
      holder.setData({});
      expect(holder.data()).toEqual({});
      expect(holder.isLoaded()).toBe(false);
    });

    it('should merge sparse updates', () => {
      const holder = new FileBackedJsonObject({ a: 1, b: 2 });
      holder.updateData({ b: 3, c: 4 });
      expect(holder.data()).toEqual({ a: 1, b: 3, c: 4 });
    });
  });

  describe('save', () => {
    it('should write sorted keys without nulls, readable only by the owner', async () => {
      const filePath = join(dir, 'nested', 'object.json');
      const holder = new FileBackedJsonObject({ zeta: 1, alpha: 'x', gone: null }, filePath);

      await holder.save();

      const text = await fs.readFile(filePath, 'utf8');
      expect(text).toBe('{\n  "alpha": "x",\n  "zeta": 1\n}');
      const stat = await fs.stat(filePath);
      expect(stat.mode & 0o777).toBe(0o600);
    });

    it('should only validate when there is no path', async () => {
      const holder = new FileBackedJsonObject({ a: 1 });
      await expect(holder.save()).resolves.toBeUndefined();
    });

    it('should round trip through load', async () => {
      const filePath = join(dir, 'object.json');
      await new FileBackedJsonObject({ b: [1, 2], a: { y: true, x: 'z' } }, filePath).save();

      const loaded = new FileBackedJsonObject(null, filePath);
      await loaded.load();

      expect(loaded.data()).toEqual({ a: { x: 'z', y: true }, b: [1, 2] });
    });
  });

  describe('load', () => {
    it('should keep the in-memory data when the file is not valid JSON', async () => {
      const filePath = join(dir, 'broken.json');
      await fs.writeFile(filePath, '{ not json');
      const holder = new FileBackedJsonObject({ kept: true }, filePath);

      await expect(holder.load()).rejects.toBeInstanceOf(DataIntegrityError);
      expect(holder.data()).toEqual({ kept: true });
    });

    it('should reject a JSON array', async () => {
      const filePath = join(dir, 'array.json');
      await fs.writeFile(filePath, '[1, 2]');
      const holder = new FileBackedJsonObject(null, filePath);

      await expect(holder.load()).rejects.toThrow(
        'FileBackedJsonObject data must be a JSON object',
      );
    });

    it('should do nothing without a path', async () => {
      const holder = new FileBackedJsonObject({ a: 1 });
      await holder.load();
      expect(holder.data()).toEqual({ a: 1 });
    });
  });

  describe('tryLoad', () => {
    it('should report a missing file as ok(false)', async () => {
      const holder = new FileBackedJsonObject(null, join(dir, 'missing.json'));
      const result = await holder.tryLoad();
      expect(result).toEqual({ ok: true, value: false });
    });

    it('should return the error for invalid content', async () => {
      const filePath = join(dir, 'broken.json');
      await fs.writeFile(filePath, 'nope');
      const result = await new FileBackedJsonObject(null, filePath).tryLoad();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DataIntegrityError);
        expect(result.error.filePath).toBe(filePath);
      }
    });

    it('should report a loaded file as ok(true)', async () => {
      const filePath = join(dir, 'object.json');
      await fs.writeFile(filePath, '{"a": 1}');
      const holder = new FileBackedJsonObject(null, filePath);
      expect(await holder.tryLoad()).toEqual({ ok: true, value: true });
      expect(holder.data()).toEqual({ a: 1 });
    });
  });

  describe('lazyReload', () => {
    it('should reload when the file changed after the last load', async () => {
      const filePath = join(dir, 'object.json');
      await fs.writeFile(filePath, '{"version": 1}');
      const holder = new FileBackedJsonObject(null, filePath);
      await holder.lazyReload();
      expect(holder.data()).toEqual({ version: 1 });

      await fs.writeFile(filePath, '{"version": 2}');
      const future = Date.now() / 1000 + 60;
      await fs.utimes(filePath, future, future);
      await holder.lazyReload();

      expect(holder.data()).toEqual({ version: 2 });
    });

    it('should not reload an unchanged file', async () => {
      const filePath = join(dir, 'object.json');
      await fs.writeFile(filePath, '{"version": 1}');
      const past = Date.now() / 1000 - 60;
      await fs.utimes(filePath, past, past);
      const holder = new FileBackedJsonObject({ version: 0 }, filePath);

      await holder.lazyReload();

      expect(holder.data()).toEqual({ version: 0 });
    });
  });

  describe('lazyGet', () => {
    it('should load on first access', async () => {
      const filePath = join(dir, 'object.json');
      await fs.writeFile(filePath, '{"field": "value"}');
      const holder = new FileBackedJsonObject(null, filePath);
      expect(await holder.lazyGet('field')).toBe('value');
    });
  });
});
