import { describe, it, expect } from 'vitest';
import {
  RowbindError,
  duplicateColumnMapping,
  invalidOption,
  invalidValue,
  isRowbindError,
  notARecordType,
  sinkWriteError,
  sourceReadError,
} from '../../../src/domain/model/RowbindError.js';

describe('RowbindError', () => {
  it('should be an Error with a name and code', () => {
    const error = new RowbindError('COLUMN_NOT_FOUND', 'missing', { column: 'name' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RowbindError');
    expect(error.code).toBe('COLUMN_NOT_FOUND');
    expect(error.column).toBe('name');
  });

  it('should copy context and prefix the message in atRow()', () => {
    const original = new RowbindError('INVALID_INT', "field int32 'age' invalid: 'x'", {
      field: 'age',
      value: 'x',
      kind: 'int32',
    });

    const tagged = original.atRow(7);

    expect(tagged.message).toBe("row 7: field int32 'age' invalid: 'x'");
    expect(tagged.row).toBe(7);
    expect(tagged.field).toBe('age');
    expect(tagged.value).toBe('x');
    expect(tagged.kind).toBe('int32');
    expect(original.row).toBeUndefined();
  });

  it('should narrow with isRowbindError()', () => {
    const error: unknown = new RowbindError('ROW_TOO_SHORT', 'short');

    expect(isRowbindError(error)).toBe(true);
    expect(isRowbindError(error, 'ROW_TOO_SHORT')).toBe(true);
    expect(isRowbindError(error, 'INVALID_BOOL')).toBe(false);
    expect(isRowbindError(new Error('plain'))).toBe(false);
  });
});

describe('error factories', () => {
  it('should describe the offending value for NOT_A_RECORD_TYPE', () => {
    expect(notARecordType(null).message).toBe('null is not a record type');
    expect(notARecordType('Person').message).toBe('string is not a record type');
  });

  it('should list the fields sharing a column', () => {
    const error = duplicateColumnMapping('name', ['first', 'last']);
    expect(error.message).toBe("column 'name' is mapped by more than one field: first, last");
    expect(error.fields).toEqual(['first', 'last']);
  });

  it('should keep the I/O failure as cause', () => {
    const cause = new Error('disk full');

    const write = sinkWriteError(cause);
    expect(write.code).toBe('SINK_WRITE_ERROR');
    expect(write.message).toBe('unable to write sink: disk full');
    expect(write.cause).toBe(cause);

    const read = sourceReadError('socket closed');
    expect(read.message).toBe('unable to read source: socket closed');
  });

  it('should show bigint values with their suffix', () => {
    expect(invalidValue('id', 'int32', 5n).message).toBe("field int32 'id' cannot hold bigint value 5n");
  });

  it('should name the option and the rejected value', () => {
    const error = invalidOption('floatDigits', -1, 'an integer between 0 and 100');

    expect(error.code).toBe('INVALID_OPTION');
    expect(error.value).toBe(-1);
    expect(error.message).toBe('floatDigits must be an integer between 0 and 100, got -1');
  });
});
