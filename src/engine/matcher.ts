/**
 * Type matcher: checks one raw value against one descriptor and converts it
 * into its typed form.
 *
 * Data mismatches never throw. Every function here returns a
 * {@link MatchResult} so that callers can keep walking sibling values and
 * report every problem of a build at once.
 *
 * @packageDocumentation
 */

import type { EngineOptions, PrimitiveMode } from '../config/types.js';
import { describeDescriptor } from '../schema/describe.js';
import { UnsupportedTypeError, describeUnknownDescriptor } from '../schema/errors.js';
import type {
  MappingDescriptor,
  PrimitiveDescriptor,
  PrimitiveKind,
  SequenceDescriptor,
  TypeDescriptor,
  UnionDescriptor,
} from '../schema/types.js';
import { buildSchema } from './builder.js';
import type { UnionAlternativeFailure } from './errors.js';
import { appendPath, type FieldPath } from './path.js';
import { ErrorReporter, type MatchResult } from './reporter.js';

/**
 * State shared by every step of one build.
 */
export interface MatchContext {
  readonly options: EngineOptions;
}

type PrimitiveMatch = { readonly matched: true; readonly value: unknown } | { readonly matched: false };

const NO_MATCH: PrimitiveMatch = { matched: false };

function hit(value: unknown): PrimitiveMatch {
  return { matched: true, value };
}

/**
 * Whether a raw value is a string-keyed mapping (a plain object).
 */
export function isRawMapping(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Coerces a raw value against a descriptor.
 *
 * @param descriptor - Expected shape.
 * @param raw - Raw value (`undefined` when absent).
 * @param path - Location of `raw`, for error attribution.
 * @param context - Options of the current build.
 * @returns The typed value, or every error found in the subtree.
 * @throws UnsupportedTypeError if the descriptor variant is not recognized.
 */
export function coerce(
  descriptor: TypeDescriptor,
  raw: unknown,
  path: FieldPath,
  context: MatchContext
): MatchResult {
  if (path.length > context.options.maxDepth) {
    const reporter = new ErrorReporter();
    reporter.depthExceeded(path, context.options.maxDepth, descriptor, raw);
    return reporter.failure();
  }

  switch (descriptor.kind) {
    case 'primitive':
      return coercePrimitive(descriptor, raw, path, context.options);
    case 'schema':
      return buildSchema(descriptor.schema, raw, path, context);
    case 'sequence':
      return coerceSequence(descriptor, raw, path, context);
    case 'mapping':
      return coerceMapping(descriptor, raw, path, context);
    case 'optional':
      if (raw === undefined || raw === null) {
        return { ok: true, value: undefined };
      }
      return coerce(descriptor.inner, raw, path, context);
    case 'union':
      return coerceUnion(descriptor, raw, path, context);
    default:
      return unsupported(descriptor);
  }
}

function unsupported(descriptor: never): never {
  const kind = describeUnknownDescriptor(descriptor);
  throw new UnsupportedTypeError(`Unsupported type descriptor '${kind}'`, kind, '<unknown>');
}

function coercePrimitive(
  descriptor: PrimitiveDescriptor,
  raw: unknown,
  path: FieldPath,
  options: EngineOptions
): MatchResult {
  const reporter = new ErrorReporter();
  const opaque = descriptor.primitive === 'unknown' && raw !== undefined;
  if (opaque && exceedsDepth(raw, path.length, options.maxDepth)) {
    reporter.depthExceeded(path, options.maxDepth, descriptor, raw);
    return reporter.failure();
  }

  const match = matchPrimitive(descriptor.primitive, raw, options.primitives);
  if (match.matched) {
    return { ok: true, value: match.value };
  }

  reporter.typeMismatch(path, descriptor.primitive, raw);
  return reporter.failure();
}

/**
 * Whether anything nested inside `raw` sits deeper than `maxDepth`, counting
 * `raw` itself at `depth`. Walks with an explicit stack.
 */
function exceedsDepth(raw: unknown, depth: number, maxDepth: number): boolean {
  const deepestVisit = new Map<object, number>();
  const pending: [unknown, number][] = [[raw, depth]];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const [value, valueDepth] = next;
    if (typeof value !== 'object' || value === null) {
      continue;
    }
    const visited = deepestVisit.get(value);
    if (visited !== undefined && visited >= valueDepth) {
      continue;
    }
    deepestVisit.set(value, valueDepth);

    for (const child of Object.values(value)) {
      if (valueDepth + 1 > maxDepth) {
        return true;
      }
      pending.push([child, valueDepth + 1]);
    }
  }
  return false;
}

const DECIMAL_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/** Parses a plain decimal string; hex, binary, octal and exponent forms are refused. */
function parseNumeric(raw: unknown): number | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }
  const trimmed = raw.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function matchPrimitive(kind: PrimitiveKind, raw: unknown, mode: PrimitiveMode): PrimitiveMatch {
  const coercing = mode === 'coerce';

  switch (kind) {
    case 'string':
      if (typeof raw === 'string') {
        return hit(raw);
      }
      if (coercing && ((typeof raw === 'number' && Number.isFinite(raw)) || typeof raw === 'boolean')) {
        return hit(String(raw));
      }
      return NO_MATCH;
    case 'number': {
      if (typeof raw === 'number') {
        return Number.isFinite(raw) ? hit(raw) : NO_MATCH;
      }
      const parsed = coercing ? parseNumeric(raw) : undefined;
      return parsed === undefined ? NO_MATCH : hit(parsed);
    }
    case 'integer': {
      const candidate = typeof raw === 'number' ? raw : coercing ? parseNumeric(raw) : undefined;
      return candidate !== undefined && Number.isInteger(candidate) ? hit(candidate) : NO_MATCH;
    }
    case 'boolean':
      if (typeof raw === 'boolean') {
        return hit(raw);
      }
      if (coercing && typeof raw === 'string') {
        const normalized = raw.trim().toLowerCase();
        if (normalized === 'true' || normalized === 'false') {
          return hit(normalized === 'true');
        }
      }
      return NO_MATCH;
    case 'null':
      return raw === null ? hit(null) : NO_MATCH;
    case 'unknown':
      return raw === undefined ? NO_MATCH : copyUnknown(raw);
  }
}

function deepFreeze<T>(value: T): T {
  const pending: unknown[] = [value];
  for (let next = pending.pop(); next !== undefined || pending.length > 0; next = pending.pop()) {
    if (typeof next === 'object' && next !== null && !Object.isFrozen(next)) {
      Object.freeze(next);
      for (const child of Object.values(next)) {
        pending.push(child);
      }
    }
  }
  return value;
}

function copyUnknown(raw: unknown): PrimitiveMatch {
  let copy: unknown;
  try {
    copy = structuredClone(raw);
  } catch {
    // Not plain data (functions, symbols): not a raw value.
    return NO_MATCH;
  }
  return hit(deepFreeze(copy));
}

function coerceSequence(
  descriptor: SequenceDescriptor,
  raw: unknown,
  path: FieldPath,
  context: MatchContext
): MatchResult {
  const reporter = new ErrorReporter();
  if (!Array.isArray(raw)) {
    reporter.typeMismatch(path, describeDescriptor(descriptor), raw);
    return reporter.failure();
  }

  const elements: readonly unknown[] = raw;
  const items: unknown[] = [];
  elements.forEach((element, index) => {
    const result = coerce(descriptor.element, element, appendPath(path, index), context);
    if (result.ok) {
      items.push(result.value);
    } else {
      reporter.merge(result.errors);
    }
  });

  if (!reporter.isEmpty) {
    return reporter.failure();
  }
  return { ok: true, value: Object.freeze(items) };
}

function coerceMapping(
  descriptor: MappingDescriptor,
  raw: unknown,
  path: FieldPath,
  context: MatchContext
): MatchResult {
  const reporter = new ErrorReporter();
  if (!isRawMapping(raw)) {
    reporter.typeMismatch(path, describeDescriptor(descriptor), raw);
    return reporter.failure();
  }

  // Raw keys are always strings, so non-string key kinds parse them whatever the mode.
  const keyContext: MatchContext = { options: { ...context.options, primitives: 'coerce' } };
  const entries: [string, unknown][] = [];
  const seen = new Set<string>();
  for (const [rawKey, rawValue] of Object.entries(raw)) {
    const entryPath = appendPath(path, rawKey);
    const key = coerce(descriptor.key, rawKey, entryPath, keyContext);
    const value = coerce(descriptor.value, rawValue, entryPath, context);

    if (!key.ok) {
      reporter.merge(key.errors);
    }
    if (!value.ok) {
      reporter.merge(value.errors);
    }
    if (!key.ok || !value.ok) {
      continue;
    }

    const outputKey = String(key.value);
    if (seen.has(outputKey)) {
      reporter.duplicateKey(entryPath, outputKey, descriptor.key, rawKey);
      continue;
    }
    seen.add(outputKey);
    entries.push([outputKey, value.value]);
  }

  if (!reporter.isEmpty) {
    return reporter.failure();
  }
  return { ok: true, value: Object.freeze(Object.fromEntries(entries)) };
}

function coerceUnion(
  descriptor: UnionDescriptor,
  raw: unknown,
  path: FieldPath,
  context: MatchContext
): MatchResult {
  const failures: UnionAlternativeFailure[] = [];

  for (const alternative of descriptor.alternatives) {
    const result = coerce(alternative, raw, path, context);
    if (result.ok) {
      return result;
    }
    failures.push({ expected: describeDescriptor(alternative), errors: result.errors });
  }

  const reporter = new ErrorReporter();
  reporter.unionMismatch(path, describeDescriptor(descriptor), raw, failures);
  return reporter.failure();
}
