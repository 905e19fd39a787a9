import Fastify from 'fastify';
import mongoose from 'mongoose';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DuplicateKeyError,
  ReadFailureError,
  StoreUnavailableError,
  WriteFailureError,
} from '../errors.js';
import { decodeDocument, isDuplicateKeyError, MongoDocumentStore, toMongoDocument } from './mongoDocumentStore.js';
import { entities } from './registry.js';

describe('toMongoDocument', () => {
  it('keeps nulls and drops undefined values', () => {
    expect(toMongoDocument({ email: 'alice@example.edu', major: null, year: undefined })).toEqual({
      email: 'alice@example.edu',
      major: null,
    });
  });
});

describe('decodeDocument', () => {
  it('stringifies the object id into `id`', () => {
    const _id = new mongoose.Types.ObjectId('64b7f0c2a1b2c3d4e5f60718');
    const decoded = decodeDocument('announcement', { _id, title: 'Tip', body: 'Plan ahead', visible: true });
    expect(decoded).toEqual({ id: '64b7f0c2a1b2c3d4e5f60718', title: 'Tip', body: 'Plan ahead', visible: true });
  });

  it('fails the read for a document of the wrong shape', () => {
    const _id = new mongoose.Types.ObjectId();
    expect(() => decodeDocument('course', { _id, title: 'No code' })).toThrow(ReadFailureError);
  });
});

describe('isDuplicateKeyError', () => {
  it('recognises server error 11000 only', () => {
    expect(isDuplicateKeyError(new mongoose.mongo.MongoServerError({ message: 'E11000 duplicate key', code: 11000 }))).toBe(
      true
    );
    expect(isDuplicateKeyError(new mongoose.mongo.MongoServerError({ message: 'other', code: 2 }))).toBe(false);
    expect(isDuplicateKeyError(new Error('E11000'))).toBe(false);
  });
});

describe('MongoDocumentStore without a connection', () => {
  const store = new MongoDocumentStore();

  it('is not available', () => {
    expect(store.isAvailable()).toBe(false);
  });

  it('fails every operation with StoreUnavailable', async () => {
    await expect(
      store.createDocument('announcement', { title: 'Tip', body: 'Plan ahead', visible: true })
    ).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(store.findDocuments('course', { owner_email: 'alice@example.edu' })).rejects.toBeInstanceOf(
      StoreUnavailableError
    );
    await expect(store.findOne('user', { email: 'alice@example.edu' })).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(store.listCollections()).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('skips index setup with a warning instead of throwing', async () => {
    const log = Fastify({ logger: false }).log;
    const warn = vi.spyOn(log, 'warn');
    const createIndexes = vi.spyOn(entities.user.model, 'createIndexes');
    await expect(store.ensureIndexes(log)).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith('index setup skipped: database not connected');
    expect(createIndexes).not.toHaveBeenCalled();
  });
});

describe('entity registry', () => {
  it('maps kinds to the collection names', () => {
    expect(entities.user.collection).toBe('user');
    expect(entities.scheduleEntry.collection).toBe('scheduleentry');
    expect(entities.user.model.collection.collectionName).toBe('user');
    expect(entities.scheduleEntry.model.collection.collectionName).toBe('scheduleentry');
  });
});

describe('MongoDocumentStore with a live connection', () => {
  const store = new MongoDocumentStore();
  const duplicate = () => new mongoose.mongo.MongoServerError({ message: 'E11000 duplicate key', code: 11000 });

  beforeEach(() => {
    vi.spyOn(store, 'isAvailable').mockReturnValue(true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const user = {
    name: 'Alice',
    email: 'alice@example.edu',
    password_hash: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    major: null,
    year: null,
    avatar: null,
  };

  it('returns the inserted id as a string', async () => {
    const insertedId = new mongoose.Types.ObjectId('64b7f0c2a1b2c3d4e5f60718');
    const insertOne = vi
      .spyOn(entities.user.model.collection, 'insertOne')
      .mockResolvedValue({ acknowledged: true, insertedId });
    await expect(store.createDocument('user', user)).resolves.toBe('64b7f0c2a1b2c3d4e5f60718');
    expect(insertOne).toHaveBeenCalledWith(user);
  });

  it('maps a duplicate key on insert to DuplicateKeyError', async () => {
    vi.spyOn(entities.user.model.collection, 'insertOne').mockRejectedValue(duplicate());
    await expect(store.createDocument('user', user)).rejects.toBeInstanceOf(DuplicateKeyError);
  });

  it('maps any other insert failure to WriteFailureError', async () => {
    vi.spyOn(entities.user.model.collection, 'insertOne').mockRejectedValue(new Error('not primary'));
    const err = await store.createDocument('user', user).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WriteFailureError);
    expect(err).toHaveProperty('message', 'Write to user failed: not primary');
  });

  it('passes the limit to the query and maps a failure to ReadFailureError', async () => {
    const find = vi.spyOn(entities.announcement.model.collection, 'find').mockImplementation(() => {
      throw new Error('cursor killed');
    });
    await expect(store.findDocuments('announcement', { visible: true }, 5)).rejects.toBeInstanceOf(ReadFailureError);
    expect(find).toHaveBeenCalledWith({ visible: true }, { limit: 5 });

    await expect(store.findDocuments('announcement', { visible: true })).rejects.toBeInstanceOf(ReadFailureError);
    expect(find).toHaveBeenLastCalledWith({ visible: true }, {});
  });

  it('decodes a found document', async () => {
    const _id = new mongoose.Types.ObjectId('64b7f0c2a1b2c3d4e5f60719');
    vi.spyOn(entities.user.model.collection, 'findOne').mockResolvedValue({ _id, ...user });
    await expect(store.findOne('user', { email: user.email })).resolves.toEqual({ id: _id.toHexString(), ...user });
  });

  it('maps update failures like inserts', async () => {
    const updateOne = vi
      .spyOn(entities.user.model.collection, 'updateOne')
      .mockRejectedValueOnce(duplicate())
      .mockRejectedValueOnce(new Error('write concern timeout'));
    await expect(store.updateOne('user', { email: user.email }, { major: 'CS' })).rejects.toBeInstanceOf(
      DuplicateKeyError
    );
    await expect(store.updateOne('user', { email: user.email }, { major: 'CS' })).rejects.toBeInstanceOf(
      WriteFailureError
    );
    expect(updateOne).toHaveBeenCalledWith({ email: 'alice@example.edu' }, { $set: { major: 'CS' } });
  });

  it('keeps indexing the other collections when one fails', async () => {
    const log = Fastify({ logger: false }).log;
    const warn = vi.spyOn(log, 'warn');
    const failure = new Error('index build aborted');
    const userIndexes = vi.spyOn(entities.user.model, 'createIndexes').mockRejectedValue(failure);
    const others = [entities.course, entities.scheduleEntry, entities.announcement].map((binding) =>
      vi.spyOn(binding.model, 'createIndexes').mockResolvedValue(undefined)
    );

    await expect(store.ensureIndexes(log)).resolves.toBeUndefined();

    expect(userIndexes).toHaveBeenCalledTimes(1);
    for (const spy of others) {
      expect(spy).toHaveBeenCalledTimes(1);
    }
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith({ err: failure, collection: 'user' }, 'index setup failed');
  });
});
