import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { t } from '../schema/descriptors.js';
import { defineSchema } from '../schema/schema.js';
import { construct } from './builder.js';
import { isInstanceOf, paramsEqual, schemaOf, toRawValue } from './instance.js';

const Report = defineSchema('Report', {
  ROW_NAMES: t.object('RowNames', { TOTAL_ROW: t.string(), QUESTION_ROW: t.string() }),
  PUBLICATION_ROW_ORDER: t.array(t.string()),
  THRESHOLDS: t.record(t.number()),
  FOOTNOTE: t.optional(t.string()),
});

const SameFields = defineSchema('Report', Report.fields);

const raw = {
  ROW_NAMES: { TOTAL_ROW: 'total_row_name', QUESTION_ROW: 'question_row_name' },
  PUBLICATION_ROW_ORDER: ['total_row_name'],
  THRESHOLDS: { minimum: 10 },
};

describe('schemaOf', () => {
  it('returns the schema type that built an instance', () => {
    expect(schemaOf(construct(Report, raw))).toBe(Report);
  });

  it('returns undefined for anything else', () => {
    expect(schemaOf(raw)).toBeUndefined();
    expect(schemaOf('Report')).toBeUndefined();
    expect(schemaOf(null)).toBeUndefined();
  });
});

describe('isInstanceOf', () => {
  it('distinguishes schema types with identical fields', () => {
    const report = construct(Report, raw);

    expect(isInstanceOf(Report, report)).toBe(true);
    expect(isInstanceOf(SameFields, report)).toBe(false);
  });
});

describe('toRawValue', () => {
  it('returns plain mutable data', () => {
    const value = toRawValue(construct(Report, raw));

    expect(value).toEqual(raw);
    expect(Object.isFrozen(value)).toBe(false);
    expect(schemaOf(value)).toBeUndefined();
  });

  it('drops fields without a value', () => {
    expect(toRawValue({ a: 1, b: undefined })).toEqual({ a: 1 });
  });

  it('round-trips through construct', () => {
    const strings = fc.string();
    fc.assert(
      fc.property(
        fc.record({
          ROW_NAMES: fc.record({ TOTAL_ROW: strings, QUESTION_ROW: strings }),
          PUBLICATION_ROW_ORDER: fc.array(strings),
          THRESHOLDS: fc.dictionary(
            fc.string().filter((key) => key !== '__proto__'),
            fc.double({ noNaN: true, noDefaultInfinity: true })
          ),
          FOOTNOTE: fc.option(strings, { nil: undefined }),
        }),
        (input) => {
          const first = construct(Report, input);
          const second = construct(Report, toRawValue(first));

          expect(paramsEqual(first, second)).toBe(true);
        }
      )
    );
  });
});

describe('paramsEqual', () => {
  it('is true for instances of the same schema with equal values', () => {
    expect(paramsEqual(construct(Report, raw), construct(Report, structuredClone(raw)))).toBe(true);
  });

  it('is false when values differ', () => {
    const other = { ...raw, PUBLICATION_ROW_ORDER: [] };
    expect(paramsEqual(construct(Report, raw), construct(Report, other))).toBe(false);
  });

  it('is false across schema types, even with identical fields', () => {
    expect(paramsEqual(construct(Report, raw), construct(SameFields, raw))).toBe(false);
  });

  it('is false for values that are not instances', () => {
    expect(paramsEqual(raw, raw)).toBe(false);
  });
});
