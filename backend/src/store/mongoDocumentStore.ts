import type { FastifyBaseLogger } from 'fastify';
import mongoose from 'mongoose';
import {
  DuplicateKeyError,
  ReadFailureError,
  StoreUnavailableError,
  WriteFailureError,
} from '../errors.js';
import { isMongoConnected, listMongoCollections } from '../db.js';
import type { DocumentStore } from './documentStore.js';
import {
  entities,
  entityKinds,
  type EntityFilter,
  type EntityKind,
  type EntityRecords,
  type StoredRecord,
} from './registry.js';

const DUPLICATE_KEY_CODE = 11000;

export function isDuplicateKeyError(err: unknown): boolean {
  return err instanceof mongoose.mongo.MongoServerError && err.code === DUPLICATE_KEY_CODE;
}

/** Copies own enumerable fields into a plain document, skipping undefined filter values. */
export function toMongoDocument(value: object): mongoose.mongo.Document {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

export function decodeDocument<K extends EntityKind>(kind: K, raw: mongoose.mongo.Document): StoredRecord<K> {
  const { _id, ...fields } = raw;
  const parsed = entities[kind].stored.safeParse({ ...fields, id: String(_id) });
  if (!parsed.success) {
    throw new ReadFailureError(entities[kind].collection, parsed.error);
  }
  return parsed.data;
}

/** DocumentStore over the process-wide mongoose connection (see db.ts). */
export class MongoDocumentStore implements DocumentStore {
  isAvailable(): boolean {
    return isMongoConnected();
  }

  private collectionFor(kind: EntityKind) {
    if (!this.isAvailable()) {
      throw new StoreUnavailableError();
    }
    return entities[kind].model.collection;
  }

  async createDocument<K extends EntityKind>(kind: K, record: EntityRecords[K]): Promise<string> {
    const collection = this.collectionFor(kind);
    try {
      const result = await collection.insertOne(toMongoDocument(record));
      return String(result.insertedId);
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new DuplicateKeyError(entities[kind].collection, err);
      }
      throw new WriteFailureError(entities[kind].collection, err);
    }
  }

  async findDocuments<K extends EntityKind>(
    kind: K,
    filter: EntityFilter<K>,
    limit?: number
  ): Promise<StoredRecord<K>[]> {
    const collection = this.collectionFor(kind);
    let docs: mongoose.mongo.Document[];
    try {
      docs = await collection.find(toMongoDocument(filter), limit !== undefined ? { limit } : {}).toArray();
    } catch (err) {
      throw new ReadFailureError(entities[kind].collection, err);
    }
    return docs.map((doc) => decodeDocument(kind, doc));
  }

  async findOne<K extends EntityKind>(kind: K, filter: EntityFilter<K>): Promise<StoredRecord<K> | null> {
    const collection = this.collectionFor(kind);
    let doc: mongoose.mongo.Document | null;
    try {
      doc = await collection.findOne(toMongoDocument(filter));
    } catch (err) {
      throw new ReadFailureError(entities[kind].collection, err);
    }
    return doc ? decodeDocument(kind, doc) : null;
  }

  async updateOne<K extends EntityKind>(kind: K, filter: EntityFilter<K>, fields: EntityFilter<K>): Promise<void> {
    const collection = this.collectionFor(kind);
    try {
      await collection.updateOne(toMongoDocument(filter), { $set: toMongoDocument(fields) });
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new DuplicateKeyError(entities[kind].collection, err);
      }
      throw new WriteFailureError(entities[kind].collection, err);
    }
  }

  async ensureIndexes(log: FastifyBaseLogger): Promise<void> {
    if (!this.isAvailable()) {
      log.warn('index setup skipped: database not connected');
      return;
    }
    for (const kind of entityKinds) {
      const { collection, model } = entities[kind];
      try {
        await model.createIndexes();
        log.info({ collection }, 'indexes ensured');
      } catch (err) {
        log.warn({ err, collection }, 'index setup failed');
      }
    }
  }

  async listCollections(): Promise<string[]> {
    if (!this.isAvailable()) {
      throw new StoreUnavailableError();
    }
    try {
      return await listMongoCollections();
    } catch (err) {
      throw new ReadFailureError('collections', err);
    }
  }
}
