import { describe, it, expect } from 'vitest';
import { defineRecord, field } from '../../../src/domain/model/RecordType.js';
import { isRowbindError } from '../../../src/domain/model/RowbindError.js';
import { bindHeader } from '../../../src/domain/services/HeaderBinder.js';
import { resolveSchema } from '../../../src/domain/services/TagResolver.js';

const Person = defineRecord('Person', {
  name: field.string('name'),
  active: field.bool('active'),
  note: field.string(),
});

const schema = resolveSchema(Person);

function bindError(header: readonly string[]): unknown {
  try {
    bindHeader(schema, header);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('bindHeader', () => {
  it('should resolve each column to its header index', () => {
    const binding = bindHeader(schema, ['name', 'active']);
    expect(binding.entries).toEqual([
      { field: 'name', column: 'name', index: 0 },
      { field: 'active', column: 'active', index: 1 },
    ]);
  });

  it('should not depend on header order and ignore extra columns', () => {
    const binding = bindHeader(schema, ['id', 'active', 'extra', 'name']);
    expect(binding.entries.map((e) => e.index)).toEqual([3, 1]);
  });

  it('should let the last occurrence of a repeated header name win', () => {
    const binding = bindHeader(schema, ['name', 'active', 'name']);
    expect(binding.entries[0]).toEqual({ field: 'name', column: 'name', index: 2 });
  });

  it('should keep a reference to the schema', () => {
    expect(bindHeader(schema, ['name', 'active']).schema).toBe(schema);
  });

  it('should fail with COLUMN_NOT_FOUND when an annotated column is missing', () => {
    const error = bindError(['name', 'enabled']);

    expect(isRowbindError(error, 'COLUMN_NOT_FOUND')).toBe(true);
    if (!isRowbindError(error)) return;
    expect(error.column).toBe('active');
    expect(error.field).toBe('active');
    expect(error.message).toBe("column 'active' does not exist");
  });

  it('should report the first missing column in declaration order', () => {
    const error = bindError(['other']);
    expect(isRowbindError(error) ? error.column : undefined).toBe('name');
  });

  it('should match column names exactly', () => {
    expect(isRowbindError(bindError(['Name', 'active']), 'COLUMN_NOT_FOUND')).toBe(true);
    expect(isRowbindError(bindError([' name', 'active']), 'COLUMN_NOT_FOUND')).toBe(true);
  });

  it('should bind an empty schema to any header', () => {
    const Empty = defineRecord('Empty', { a: field.string() });
    expect(bindHeader(resolveSchema(Empty), []).entries).toEqual([]);
  });
});
