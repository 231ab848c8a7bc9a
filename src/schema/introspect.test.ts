import { describe, it, expect } from 'vitest';
import { t } from './descriptors.js';
import { ConfigurationError, UnsupportedTypeError } from './errors.js';
import { declaredFields, fieldEntries, isOptionalDescriptor } from './introspect.js';
import { defineSchema } from './schema.js';
import type { FieldMap, SchemaType, TypeDescriptor } from './types.js';

function untypedFields(json: string): FieldMap {
  const fields: FieldMap = JSON.parse(json);
  return fields;
}

describe('declaredFields', () => {
  const RowNames = defineSchema('RowNames', { TOTAL_ROW: t.string(), QUESTION_ROW: t.string() });
  const Params = defineSchema('Params', {
    ROW_NAMES: t.schema(RowNames),
    PUBLICATION_ROW_ORDER: t.array(t.string()),
  });

  it('returns fields in declaration order', () => {
    expect([...declaredFields(Params).keys()]).toEqual(['ROW_NAMES', 'PUBLICATION_ROW_ORDER']);
  });

  it('maps each field to its descriptor', () => {
    const fields = declaredFields(RowNames);
    expect(fields.get('TOTAL_ROW')).toEqual({ kind: 'primitive', primitive: 'string' });
    expect(fields.get('__proto__')).toBeUndefined();
  });

  it('returns a fresh map on every call', () => {
    const first = declaredFields(Params);
    const second = declaredFields(Params);

    expect(second).not.toBe(first);
    expect(second.size).toBe(2);
    expect(second.has('EXTRA')).toBe(false);
  });

  it('caches field entries per schema type', () => {
    expect(fieldEntries(Params)).toBe(fieldEntries(Params));
  });
});

describe('schema declaration checks', () => {
  it('rejects a schema without fields', () => {
    expect(() => defineSchema('Empty', {})).toThrow(
      'Schema definition for Empty does not contain any fields'
    );
  });

  it('rejects a field without a descriptor', () => {
    try {
      defineSchema('Bad', untypedFields('{"f": null}'));
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe("Field 'Bad.f' does not have a resolvable type descriptor");
        expect(error.schemaName).toBe('Bad');
        expect(error.fieldName).toBe('f');
      }
    }
  });

  it('rejects an unknown descriptor kind as unsupported', () => {
    try {
      defineSchema('Bad', untypedFields('{"f": {"kind": "tuple"}}'));
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedTypeError);
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof UnsupportedTypeError) {
        expect(error.message).toBe("Field 'Bad.f' uses unsupported type descriptor 'tuple'");
        expect(error.descriptorKind).toBe('tuple');
      }
    }
  });

  it('rejects an unknown primitive kind', () => {
    expect(() =>
      defineSchema('Bad', untypedFields('{"f": {"kind": "primitive", "primitive": "date"}}'))
    ).toThrow("Field 'Bad.f' uses unsupported primitive kind 'date'");
  });

  it('rejects a union without alternatives', () => {
    expect(() =>
      defineSchema('Bad', untypedFields('{"f": {"kind": "union", "alternatives": []}}'))
    ).toThrow("Field 'Bad.f' declares a union without alternatives");
  });

  it('checks descriptors nested inside arrays and unions', () => {
    expect(() =>
      defineSchema(
        'Bad',
        untypedFields(
          '{"f": {"kind": "sequence", "element": {"kind": "union", "alternatives": [{"kind": "map"}]}}}'
        )
      )
    ).toThrow("Field 'Bad.f' uses unsupported type descriptor 'map'");
  });

  it('rejects values that are not schema types', () => {
    const notASchema: SchemaType = JSON.parse('{"name": "Params"}');
    expect(() => fieldEntries(notASchema)).toThrow(
      'Expected a schema type declared with defineSchema, got object'
    );
  });

  it('rejects schema types that contain themselves', () => {
    const fields: Record<string, TypeDescriptor> = { id: t.integer() };
    const Node: SchemaType = { kind: 'schema-type', name: 'Node', fields };
    fields.next = t.optional(t.schema(Node));

    expect(() => fieldEntries(Node)).toThrow(
      'Schema Node contains itself through nested fields: Node -> Node'
    );
  });

  it('names every schema type of an indirect cycle', () => {
    const aFields: Record<string, TypeDescriptor> = {};
    const A: SchemaType = { kind: 'schema-type', name: 'A', fields: aFields };
    const B: SchemaType = { kind: 'schema-type', name: 'B', fields: { a: t.schema(A) } };
    aFields.b = t.array(t.schema(B));

    expect(() => fieldEntries(A)).toThrow('Schema A contains itself through nested fields: A -> B -> A');
  });
});

describe('isOptionalDescriptor', () => {
  it('is true for optional descriptors', () => {
    expect(isOptionalDescriptor(t.optional(t.string()))).toBe(true);
  });

  it('is true for unions with an optional alternative', () => {
    expect(isOptionalDescriptor(t.union(t.integer(), t.optional(t.string())))).toBe(true);
  });

  it('is false for everything else', () => {
    expect(isOptionalDescriptor(t.string())).toBe(false);
    expect(isOptionalDescriptor(t.union(t.integer(), t.null()))).toBe(false);
    expect(isOptionalDescriptor(t.array(t.optional(t.string())))).toBe(false);
  });
});
