// Main entry point
export { CsvMapper } from './CsvMapper.js';
export type { CsvMapperConfig } from './CsvMapper.js';
export { readToRecords, writeFromRecords } from './fileMapping.js';

// Infrastructure adapters
export { CsvTokenizer } from './infrastructure/CsvTokenizer.js';

// Re-export the record declaration API and commonly used types from @rowbind/core for convenience
export type {
  RecordType,
  RecordOf,
  InferRecord,
  FieldMap,
  FieldDescriptor,
  Row,
  DataSource,
  SourceMetadata,
  DataSink,
  SinkMetadata,
  DomainEvent,
  EventType,
  EventPayload,
  RowbindErrorCode,
} from '@rowbind/core';

export {
  defineRecord,
  field,
  FieldKind,
  RowbindError,
  isRowbindError,
  BufferSource,
  FilePathSource,
  StreamSource,
  BufferSink,
  FilePathSink,
} from '@rowbind/core';
