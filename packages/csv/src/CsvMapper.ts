import { StringDecoder } from 'node:string_decoder';
import {
  EventBus,
  bindHeader,
  decodeRows,
  duplicateColumnMapping,
  encodeRecords,
  findDuplicateColumns,
  isRowbindError,
  resolveSchema,
  sinkWriteError,
  sourceReadError,
  type DataSink,
  type DataSource,
  type DomainEvent,
  type EventPayload,
  type EventType,
  type FieldMap,
  type HandlerErrorReporter,
  type RecordOf,
  type RecordType,
  type Row,
  type Schema,
} from '@rowbind/core';
import { CsvTokenizer } from './infrastructure/CsvTokenizer.js';

/** Configuration for a `CsvMapper`. */
export interface CsvMapperConfig {
  /** Encoding used to turn Buffer chunks from a source into text. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /**
   * Fractional digits written for float fields. Default: `0`, which writes
   * `3.7` as `4`. Set it when the fractional part must survive a round trip.
   */
  readonly floatDigits?: number;
  /**
   * Accept record types where several fields share one column name. Reads then
   * bind every such field to the last header cell with that name. Default: `false`.
   */
  readonly allowDuplicateColumns?: boolean;
  /** Receives errors thrown by event subscribers. */
  readonly onHandlerError?: HandlerErrorReporter;
}

/**
 * Facade that maps CSV text to typed records and back: tokenize → resolve
 * schema → bind header → decode, and encode → serialize → write.
 *
 * @example
 * ```typescript
 * const Person = defineRecord('Person', { name: field.string('name'), age: field.int32('age') });
 * const mapper = new CsvMapper(Person);
 * const people = await mapper.read(new FilePathSource('people.csv'));
 * await mapper.write(new FilePathSink('copy.csv'), people);
 * ```
 */
export class CsvMapper<F extends FieldMap> {
  private readonly eventBus: EventBus;
  private readonly tokenizer = new CsvTokenizer();
  private readonly encoding: BufferEncoding;
  private readonly floatDigits: number;
  private readonly allowDuplicateColumns: boolean;

  constructor(
    private readonly recordType: RecordType<F>,
    config?: CsvMapperConfig,
  ) {
    this.encoding = config?.encoding ?? 'utf-8';
    this.floatDigits = config?.floatDigits ?? 0;
    this.allowDuplicateColumns = config?.allowDuplicateColumns ?? false;
    this.eventBus = new EventBus(config?.onHandlerError);
  }

  /**
   * Read the whole source and decode every data row. The first row is the header.
   *
   * @throws {RowbindError} `SOURCE_READ_ERROR` when the source fails or holds no header row,
   * otherwise whatever schema resolution, binding or decoding reports.
   */
  async read(source: DataSource): Promise<RecordOf<F>[]> {
    const meta = source.metadata();
    this.emit({ type: 'read:started', recordType: this.recordType.name, source: meta, timestamp: Date.now() });

    try {
      const content = await this.readAll(source);
      const records = this.decode(content);
      this.emit({
        type: 'read:completed',
        recordType: this.recordType.name,
        source: meta,
        recordCount: records.length,
        timestamp: Date.now(),
      });
      return records;
    } catch (error) {
      this.reportFailure('read', error);
      throw error;
    }
  }

  /**
   * Encode every record and hand the complete CSV text to the sink in one call.
   * Nothing is written when any record fails to encode.
   *
   * @throws {RowbindError} `SINK_WRITE_ERROR` when the sink rejects, otherwise whatever encoding reports.
   */
  async write(sink: DataSink, records: readonly RecordOf<F>[]): Promise<void> {
    const meta = sink.metadata();
    this.emit({
      type: 'write:started',
      recordType: this.recordType.name,
      sink: meta,
      recordCount: records.length,
      timestamp: Date.now(),
    });

    try {
      const rows = this.encode(records);
      try {
        await sink.write(this.tokenizer.serialize(rows));
      } catch (cause) {
        throw sinkWriteError(cause);
      }
      this.emit({
        type: 'write:completed',
        recordType: this.recordType.name,
        sink: meta,
        rowCount: rows.length,
        timestamp: Date.now(),
      });
    } catch (error) {
      this.reportFailure('write', error);
      throw error;
    }
  }

  /** Decode CSV text held in memory. Emits no events. */
  parse(content: string): RecordOf<F>[] {
    return this.decode(content);
  }

  /** Encode records to CSV text in memory. Emits no events. */
  stringify(records: readonly RecordOf<F>[]): string {
    return this.tokenizer.serialize(this.encode(records));
  }

  /** Subscribe to a mapper event. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every mapper event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  private decode(content: string): RecordOf<F>[] {
    const schema = this.schema();
    const [header, ...rows] = this.tokenizer.parse(content);
    if (header === undefined) {
      throw sourceReadError(new Error('source has no header row'));
    }
    const binding = bindHeader(schema, header);
    return decodeRows(binding, rows, this.recordType);
  }

  private encode(records: readonly RecordOf<F>[]): Row[] {
    const { header, rows } = encodeRecords(this.schema(), records, { floatDigits: this.floatDigits });
    return [header, ...rows];
  }

  private schema(): Schema<F> {
    const schema = resolveSchema(this.recordType);
    if (!this.allowDuplicateColumns) {
      const [duplicate] = findDuplicateColumns(schema);
      if (duplicate) {
        const [column, fields] = duplicate;
        throw duplicateColumnMapping(column, fields);
      }
    }
    return schema;
  }

  private async readAll(source: DataSource): Promise<string> {
    const chunks: string[] = [];
    const decoder = new StringDecoder(this.encoding);
    try {
      for await (const chunk of source.read()) {
        if (typeof chunk === 'string') {
          chunks.push(decoder.end(), chunk);
        } else {
          chunks.push(decoder.write(chunk));
        }
      }
      chunks.push(decoder.end());
    } catch (cause) {
      throw sourceReadError(cause);
    }
    return chunks.join('');
  }

  private reportFailure(operation: 'read' | 'write', error: unknown): void {
    if (!isRowbindError(error)) return;
    this.emit({ type: 'mapping:failed', recordType: this.recordType.name, operation, error, timestamp: Date.now() });
  }

  private emit(event: DomainEvent): void {
    this.eventBus.emit(event);
  }
}
