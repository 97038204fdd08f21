import type { SinkMetadata } from '../ports/DataSink.js';
import type { SourceMetadata } from '../ports/DataSource.js';
import type { RowbindError } from '../model/RowbindError.js';

/** Emitted before a source is consumed. */
export interface ReadStartedEvent {
  readonly type: 'read:started';
  readonly recordType: string;
  readonly source: SourceMetadata;
  readonly timestamp: number;
}

/** Emitted after every data row of a source has been decoded. */
export interface ReadCompletedEvent {
  readonly type: 'read:completed';
  readonly recordType: string;
  readonly source: SourceMetadata;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted before a record set is encoded. */
export interface WriteStartedEvent {
  readonly type: 'write:started';
  readonly recordType: string;
  readonly sink: SinkMetadata;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted once the sink has accepted the content. `rowCount` includes the header row. */
export interface WriteCompletedEvent {
  readonly type: 'write:completed';
  readonly recordType: string;
  readonly sink: SinkMetadata;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted when a read or write aborts. The same error is thrown to the caller. */
export interface MappingFailedEvent {
  readonly type: 'mapping:failed';
  readonly recordType: string;
  readonly operation: 'read' | 'write';
  readonly error: RowbindError;
  readonly timestamp: number;
}

export type DomainEvent =
  | ReadStartedEvent
  | ReadCompletedEvent
  | WriteStartedEvent
  | WriteCompletedEvent
  | MappingFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
