import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { DEFAULT_ENGINE_OPTIONS } from './defaults.js';
import type { EngineOptions } from './types.js';
import {
  MAX_DEPTH_LIMIT,
  OptionsValidationError,
  assertEngineOptionsValid,
  resolveEngineOptions,
  validateEngineOptions,
} from './validator.js';

function untypedOptions(json: string): EngineOptions {
  const parsed: EngineOptions = JSON.parse(json);
  return parsed;
}

describe('validateEngineOptions', () => {
  it('accepts the defaults', () => {
    expect(validateEngineOptions(DEFAULT_ENGINE_OPTIONS)).toEqual({ valid: true, errors: [] });
  });

  it('rejects a non-positive maxDepth', () => {
    const result = validateEngineOptions({ ...DEFAULT_ENGINE_OPTIONS, maxDepth: 0 });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { field: 'maxDepth', value: 0, message: "'maxDepth' must be a positive integer, got 0" },
    ]);
  });

  it('rejects a fractional maxDepth', () => {
    const result = validateEngineOptions({ ...DEFAULT_ENGINE_OPTIONS, maxDepth: 2.5 });
    expect(result.errors[0]?.message).toBe("'maxDepth' must be a positive integer, got 2.5");
  });

  it('rejects a maxDepth above the limit', () => {
    const result = validateEngineOptions({ ...DEFAULT_ENGINE_OPTIONS, maxDepth: MAX_DEPTH_LIMIT + 1 });
    expect(result.errors[0]?.message).toBe("'maxDepth' exceeds reasonable maximum of 10000");
  });

  it('accepts maxDepth at the limit', () => {
    expect(validateEngineOptions({ ...DEFAULT_ENGINE_OPTIONS, maxDepth: MAX_DEPTH_LIMIT }).valid).toBe(
      true
    );
  });

  it('rejects unknown enum values from untyped callers', () => {
    const result = validateEngineOptions(
      untypedOptions('{"maxDepth": 64, "primitives": "loose", "unknownKeys": "warn"}')
    );

    expect(result.errors.map((e) => e.message)).toEqual([
      "'primitives' must be one of 'strict', 'coerce', got 'loose'",
      "'unknownKeys' must be one of 'ignore', 'reject', got 'warn'",
    ]);
  });

  it('accepts every positive integer up to the limit', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: MAX_DEPTH_LIMIT }), (maxDepth) => {
        expect(validateEngineOptions({ ...DEFAULT_ENGINE_OPTIONS, maxDepth }).valid).toBe(true);
      })
    );
  });
});

describe('assertEngineOptionsValid', () => {
  it('throws with every error listed', () => {
    const options = untypedOptions('{"maxDepth": -1, "primitives": "loose", "unknownKeys": "ignore"}');

    expect(() => {
      assertEngineOptionsValid(options);
    }).toThrow(
      "Engine options validation failed with 2 error(s):\n" +
        "  - maxDepth: 'maxDepth' must be a positive integer, got -1\n" +
        "  - primitives: 'primitives' must be one of 'strict', 'coerce', got 'loose'"
    );
  });

  it('exposes the issues on the error', () => {
    try {
      assertEngineOptionsValid({ ...DEFAULT_ENGINE_OPTIONS, maxDepth: 0 });
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(OptionsValidationError);
      if (error instanceof OptionsValidationError) {
        expect(error.errors).toHaveLength(1);
        expect(error.errors[0]?.field).toBe('maxDepth');
      }
    }
  });
});

describe('resolveEngineOptions', () => {
  it('fills omitted options from the defaults', () => {
    expect(resolveEngineOptions({ primitives: 'coerce' })).toEqual({
      maxDepth: 64,
      primitives: 'coerce',
      unknownKeys: 'ignore',
    });
  });

  it('returns frozen options', () => {
    expect(Object.isFrozen(resolveEngineOptions())).toBe(true);
  });

  it('throws for invalid supplied options', () => {
    expect(() => resolveEngineOptions({ maxDepth: 0 })).toThrow(OptionsValidationError);
  });
});
