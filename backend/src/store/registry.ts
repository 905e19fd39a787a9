import { z } from 'zod';
import type mongoose from 'mongoose';
import { AnnouncementModel, CourseModel, ScheduleEntryModel, UserModel } from '../models/index.js';
import {
  announcementSchema,
  courseSchema,
  scheduleEntrySchema,
  userRecordSchema,
  type AnnouncementRecord,
  type CourseRecord,
  type ScheduleEntryRecord,
  type UserRecord,
} from '../validation/schemas.js';

export type EntityRecords = {
  user: UserRecord;
  course: CourseRecord;
  scheduleEntry: ScheduleEntryRecord;
  announcement: AnnouncementRecord;
};

export type EntityKind = keyof EntityRecords;

export type StoredRecord<K extends EntityKind> = EntityRecords[K] & { id: string };

export type EntityFilter<K extends EntityKind> = Partial<EntityRecords[K]>;

/** The parts of a mongoose model the store needs: its native collection and its index spec. */
export type IndexedCollection = {
  collection: mongoose.Collection;
  createIndexes(): Promise<void>;
};

export type EntityBinding<K extends EntityKind> = {
  collection: string;
  model: IndexedCollection;
  /** Decodes a raw document (with `id` already stringified) into a typed record. */
  stored: z.ZodType<StoredRecord<K>, z.ZodTypeDef, unknown>;
};

const withId = { id: z.string() };

export const entities: { [K in EntityKind]: EntityBinding<K> } = {
  user: {
    collection: 'user',
    model: UserModel,
    stored: userRecordSchema.extend(withId),
  },
  course: {
    collection: 'course',
    model: CourseModel,
    stored: courseSchema.extend(withId),
  },
  scheduleEntry: {
    collection: 'scheduleentry',
    model: ScheduleEntryModel,
    stored: scheduleEntrySchema.extend(withId),
  },
  announcement: {
    collection: 'announcement',
    model: AnnouncementModel,
    stored: announcementSchema.extend(withId),
  },
};

export const entityKinds: EntityKind[] = ['user', 'course', 'scheduleEntry', 'announcement'];
