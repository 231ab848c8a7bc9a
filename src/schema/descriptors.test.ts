import { describe, it, expect, expectTypeOf } from 'vitest';
import { t } from './descriptors.js';
import { defineSchema } from './schema.js';
import type { Infer, InstanceOf } from './types.js';

describe('t', () => {
  it('builds primitive descriptors', () => {
    expect(t.string()).toEqual({ kind: 'primitive', primitive: 'string' });
    expect(t.boolean()).toEqual({ kind: 'primitive', primitive: 'boolean' });
  });

  it('builds composite descriptors', () => {
    expect(t.array(t.integer())).toEqual({
      kind: 'sequence',
      element: { kind: 'primitive', primitive: 'integer' },
    });
    expect(t.record(t.number())).toEqual({
      kind: 'mapping',
      key: { kind: 'primitive', primitive: 'string' },
      value: { kind: 'primitive', primitive: 'number' },
    });
    expect(t.union(t.string(), t.null())).toEqual({
      kind: 'union',
      alternatives: [
        { kind: 'primitive', primitive: 'string' },
        { kind: 'primitive', primitive: 'null' },
      ],
    });
  });

  it('freezes every descriptor', () => {
    expect(Object.isFrozen(t.string())).toBe(true);
    expect(Object.isFrozen(t.optional(t.string()))).toBe(true);
    expect(Object.isFrozen(t.mapping(t.string(), t.integer()))).toBe(true);
  });

  it('declares inline schema types with t.object', () => {
    const descriptor = t.object('RowNames', { TOTAL_ROW: t.string() });
    expect(descriptor.kind).toBe('schema');
    expect(descriptor.schema.name).toBe('RowNames');
    expect(Object.keys(descriptor.schema.fields)).toEqual(['TOTAL_ROW']);
  });

  it('infers the static type of built values', () => {
    const Params = defineSchema('Params', {
      YEAR: t.integer(),
      ROW_NAMES: t.object('RowNames', { TOTAL_ROW: t.string() }),
      PUBLICATION_ROW_ORDER: t.array(t.string()),
      FOOTNOTE: t.optional(t.string()),
      SUPPRESSION: t.union(t.integer(), t.null()),
    });

    type Built = InstanceOf<typeof Params>;
    expectTypeOf<Built>().toMatchTypeOf<{
      readonly YEAR: number;
      readonly ROW_NAMES: { readonly TOTAL_ROW: string };
      readonly PUBLICATION_ROW_ORDER: readonly string[];
      readonly SUPPRESSION: number | null;
      readonly FOOTNOTE?: string | undefined;
    }>();
    expectTypeOf<Built['YEAR']>().toEqualTypeOf<number>();
    expectTypeOf<Built['SUPPRESSION']>().toEqualTypeOf<number | null>();
    expectTypeOf<Infer<ReturnType<typeof t.unknown>>>().toEqualTypeOf<unknown>();
  });
});

describe('defineSchema', () => {
  it('copies and freezes the field map', () => {
    const fields = { TOTAL_ROW: t.string() };
    const RowNames = defineSchema('RowNames', fields);

    expect(RowNames.fields).not.toBe(fields);
    expect(Object.isFrozen(RowNames.fields)).toBe(true);
    expect(Object.isFrozen(RowNames)).toBe(true);
    expect(RowNames).toEqual({ kind: 'schema-type', name: 'RowNames', fields });
  });
});
