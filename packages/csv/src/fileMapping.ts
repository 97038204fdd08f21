import { FilePathSink, FilePathSource } from '@rowbind/core';
import type { FieldMap, RecordOf, RecordType } from '@rowbind/core';
import { CsvMapper } from './CsvMapper.js';
import type { CsvMapperConfig } from './CsvMapper.js';

/**
 * Read a CSV file into records of `recordType`. The first row is the header;
 * columns are matched by the names given in the field annotations.
 */
export function readToRecords<F extends FieldMap>(
  filePath: string,
  recordType: RecordType<F>,
  config?: CsvMapperConfig,
): Promise<RecordOf<F>[]> {
  return new CsvMapper(recordType, config).read(new FilePathSource(filePath, { encoding: config?.encoding }));
}

/**
 * Write records of `recordType` to a CSV file, replacing it. The header lists
 * the annotated columns in field declaration order.
 */
export function writeFromRecords<F extends FieldMap>(
  filePath: string,
  recordType: RecordType<F>,
  records: readonly RecordOf<F>[],
  config?: CsvMapperConfig,
): Promise<void> {
  return new CsvMapper(recordType, config).write(new FilePathSink(filePath, { encoding: config?.encoding }), records);
}
