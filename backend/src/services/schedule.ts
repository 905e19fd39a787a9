import type { DocumentStore } from '../store/documentStore.js';
import type { StoredRecord } from '../store/registry.js';
import { normalizeEmail, scheduleEntrySchema } from '../validation/schemas.js';
import { validate } from '../validation/validate.js';

export async function createScheduleEntry(store: DocumentStore, input: unknown): Promise<string> {
  const entry = validate(scheduleEntrySchema, input);
  return store.createDocument('scheduleEntry', entry);
}

export async function listScheduleByOwner(
  store: DocumentStore,
  ownerEmail: string
): Promise<StoredRecord<'scheduleEntry'>[]> {
  return store.findDocuments('scheduleEntry', { owner_email: normalizeEmail(ownerEmail) });
}
