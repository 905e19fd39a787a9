import type { DocumentStore } from '../store/documentStore.js';
import type { StoredRecord } from '../store/registry.js';
import { courseSchema, normalizeEmail } from '../validation/schemas.js';
import { validate } from '../validation/validate.js';

// owner_email is taken from the caller as-is; nothing checks it against a login.
export async function createCourse(store: DocumentStore, input: unknown): Promise<string> {
  const course = validate(courseSchema, input);
  return store.createDocument('course', course);
}

export async function listCoursesByOwner(store: DocumentStore, ownerEmail: string): Promise<StoredRecord<'course'>[]> {
  return store.findDocuments('course', { owner_email: normalizeEmail(ownerEmail) });
}
