import type { FastifyBaseLogger } from 'fastify';
import type { EntityFilter, EntityKind, EntityRecords, StoredRecord } from './registry.js';

/**
 * Generic document access keyed by entity kind. Every operation fails with
 * `StoreUnavailableError` when there is no live connection.
 */
export interface DocumentStore {
  isAvailable(): boolean;

  /** Inserts `record` as given and returns the generated id. */
  createDocument<K extends EntityKind>(kind: K, record: EntityRecords[K]): Promise<string>;

  /** Equality match, store-native order. */
  findDocuments<K extends EntityKind>(kind: K, filter: EntityFilter<K>, limit?: number): Promise<StoredRecord<K>[]>;

  findOne<K extends EntityKind>(kind: K, filter: EntityFilter<K>): Promise<StoredRecord<K> | null>;

  /** `$set` on the first match; a no-op when nothing matches. */
  updateOne<K extends EntityKind>(kind: K, filter: EntityFilter<K>, fields: EntityFilter<K>): Promise<void>;

  /** Best-effort and idempotent: failures are logged, never thrown. */
  ensureIndexes(log: FastifyBaseLogger): Promise<void>;

  listCollections(): Promise<string[]>;
}
