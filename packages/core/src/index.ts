// Record type declaration
export { defineRecord, field, isRecordType } from './domain/model/RecordType.js';
export type {
  RecordType,
  RecordOf,
  InferRecord,
  FieldMap,
  FieldDescriptor,
  DeclaredField,
} from './domain/model/RecordType.js';
export { FieldKind, INTEGER_BOUNDS, isFieldKind, zeroValue } from './domain/model/FieldKind.js';
export type { KindValueMap, IntegerKind, FloatKind } from './domain/model/FieldKind.js';

// Schema, binding and rows
export type { Schema, SchemaEntry, Binding, BindingEntry, Row, EncodedTable } from './domain/model/Schema.js';

// Errors
export {
  RowbindError,
  isRowbindError,
  notARecordType,
  columnNotFound,
  rowTooShort,
  invalidBool,
  invalidInt,
  invalidFloat,
  unsupportedFieldKind,
  invalidValue,
  invalidOption,
  duplicateColumnMapping,
  sourceReadError,
  sinkWriteError,
} from './domain/model/RowbindError.js';
export type { RowbindErrorCode, RowbindErrorDetails } from './domain/model/RowbindError.js';

// Domain services
export { resolveSchema, findDuplicateColumns } from './domain/services/TagResolver.js';
export { bindHeader } from './domain/services/HeaderBinder.js';
export { decodeRow, decodeRows, encodeRecords } from './domain/services/ValueCoder.js';
export type { EncodeOptions } from './domain/services/ValueCoder.js';
export { codecFor } from './domain/services/KindCodec.js';
export type { KindCodec, FormatOptions } from './domain/services/KindCodec.js';

// Events
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorReporter } from './application/EventBus.js';
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ReadStartedEvent,
  ReadCompletedEvent,
  WriteStartedEvent,
  WriteCompletedEvent,
  MappingFailedEvent,
} from './domain/events/DomainEvents.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { DataSink, SinkMetadata } from './domain/ports/DataSink.js';

// Infrastructure adapters (built-in sources and sinks)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { BufferSink } from './infrastructure/sinks/BufferSink.js';
export { FilePathSink } from './infrastructure/sinks/FilePathSink.js';
export type { FilePathSinkOptions } from './infrastructure/sinks/FilePathSink.js';
