import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { PathValidationError, safeReadTextFile, validatePath } from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'typed-params-safe-fs-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('returns absolute paths unchanged', () => {
      expect(validatePath('/tmp/params.json')).toBe('/tmp/params.json');
    });

    it('resolves relative paths against the working directory', () => {
      const result = validatePath('./params.json');
      expect(result).toBe(path.resolve(process.cwd(), 'params.json'));
    });

    it('normalizes parent segments', () => {
      expect(validatePath('/tmp/a/../params.json')).toBe('/tmp/params.json');
    });

    it('rejects empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('rejects paths with null bytes', () => {
      expect(() => validatePath('/tmp/params\0.json')).toThrow('Path cannot contain null bytes');
    });

    it('rejects non-string values', () => {
      expect(() => validatePath(null)).toThrow('Path must be a string');
      expect(() => validatePath(42)).toThrow(PathValidationError);
    });

    it('carries the invalid path on the error', () => {
      try {
        validatePath('/tmp/a\0b');
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(PathValidationError);
        if (error instanceof PathValidationError) {
          expect(error.invalidPath).toBe('/tmp/a\0b');
          expect(error.name).toBe('PathValidationError');
        }
      }
    });

    it('always yields an absolute path for non-empty strings without null bytes', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (input) => {
            expect(path.isAbsolute(validatePath(input))).toBe(true);
          }
        )
      );
    });
  });

  describe('safeReadTextFile', () => {
    it('reads the file and reports its resolved path', async () => {
      const filePath = join(tempDir, 'params.json');
      await writeFile(filePath, '{"a": 1}', 'utf-8');

      const result = await safeReadTextFile(filePath);

      expect(result).toEqual({ resolvedPath: filePath, text: '{"a": 1}' });
    });

    it('rejects missing files', async () => {
      await expect(safeReadTextFile(join(tempDir, 'missing.json'))).rejects.toThrow('ENOENT');
    });

    it('rejects invalid paths before reading', async () => {
      await expect(safeReadTextFile('')).rejects.toThrow(PathValidationError);
    });
  });
});
