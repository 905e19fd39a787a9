import type { FastifyBaseLogger } from 'fastify';
import mongoose from 'mongoose';
import { DuplicateKeyError, StoreUnavailableError } from '../errors.js';
import type { DocumentStore } from './documentStore.js';
import {
  entities,
  entityKinds,
  type EntityFilter,
  type EntityKind,
  type EntityRecords,
  type StoredRecord,
} from './registry.js';

type Rows = { [K in EntityKind]: StoredRecord<K>[] };

// Mirrors the unique indexes declared on the mongoose schemas.
const UNIQUE_FIELDS: Partial<Record<EntityKind, string[]>> = {
  user: ['email'],
};

function matches(row: object, filter: object): boolean {
  return Object.entries(filter).every(([key, value]) => value === undefined || Reflect.get(row, key) === value);
}

/**
 * In-process DocumentStore. Used by the tests in place of MongoDB; `available` toggles
 * the outage path and `operations` counts every call that reached the store.
 */
export class MemoryDocumentStore implements DocumentStore {
  available: boolean;
  failIndexes: boolean;
  operations = 0;
  indexesEnsured = false;

  private readonly rows: Rows = { user: [], course: [], scheduleEntry: [], announcement: [] };

  constructor(options: { available?: boolean; failIndexes?: boolean } = {}) {
    this.available = options.available ?? true;
    this.failIndexes = options.failIndexes ?? false;
  }

  isAvailable(): boolean {
    return this.available;
  }

  private touch() {
    this.operations += 1;
    if (!this.available) {
      throw new StoreUnavailableError();
    }
  }

  async createDocument<K extends EntityKind>(kind: K, record: EntityRecords[K]): Promise<string> {
    this.touch();
    const rows: StoredRecord<K>[] = this.rows[kind];
    for (const field of UNIQUE_FIELDS[kind] ?? []) {
      const value = Reflect.get(record, field);
      if (rows.some((row) => Reflect.get(row, field) === value)) {
        throw new DuplicateKeyError(entities[kind].collection);
      }
    }
    const id = new mongoose.Types.ObjectId().toHexString();
    rows.push({ ...record, id });
    return id;
  }

  async findDocuments<K extends EntityKind>(
    kind: K,
    filter: EntityFilter<K>,
    limit?: number
  ): Promise<StoredRecord<K>[]> {
    this.touch();
    const rows: StoredRecord<K>[] = this.rows[kind];
    const found = rows.filter((row) => matches(row, filter)).map((row) => ({ ...row }));
    return limit !== undefined && limit > 0 ? found.slice(0, limit) : found;
  }

  async findOne<K extends EntityKind>(kind: K, filter: EntityFilter<K>): Promise<StoredRecord<K> | null> {
    const [first] = await this.findDocuments(kind, filter, 1);
    return first ?? null;
  }

  async updateOne<K extends EntityKind>(kind: K, filter: EntityFilter<K>, fields: EntityFilter<K>): Promise<void> {
    this.touch();
    const rows: StoredRecord<K>[] = this.rows[kind];
    const row = rows.find((r) => matches(r, filter));
    if (!row) return;
    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined) Reflect.set(row, key, value);
    }
  }

  async ensureIndexes(log: FastifyBaseLogger): Promise<void> {
    if (this.failIndexes || !this.available) {
      log.warn({ collections: entityKinds.map((kind) => entities[kind].collection) }, 'index setup failed');
      return;
    }
    this.indexesEnsured = true;
  }

  async listCollections(): Promise<string[]> {
    this.touch();
    return entityKinds.filter((kind) => this.rows[kind].length > 0).map((kind) => entities[kind].collection);
  }
}
