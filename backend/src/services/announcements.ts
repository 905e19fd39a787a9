import type { FastifyBaseLogger } from 'fastify';
import type { DocumentStore } from '../store/documentStore.js';
import type { StoredRecord } from '../store/registry.js';

export const ANNOUNCEMENT_LIMIT = 5;

export type FallbackAnnouncement = {
  title: string;
  body: string;
};

export type PublicAnnouncement = StoredRecord<'announcement'> | FallbackAnnouncement;

export const FALLBACK_ANNOUNCEMENTS: readonly FallbackAnnouncement[] = [
  { title: 'Welcome to Campus Scheduler', body: 'Plan classes, labs, study sessions in one place.' },
  { title: 'Tip', body: 'Drag across the grid to create a block of study time.' },
];

/** Visible announcements, or the static fallback when the store cannot answer. Never throws. */
export async function listAnnouncements(store: DocumentStore, log: FastifyBaseLogger): Promise<PublicAnnouncement[]> {
  try {
    return await store.findDocuments('announcement', { visible: true }, ANNOUNCEMENT_LIMIT);
  } catch (err) {
    log.warn({ err }, 'announcements unavailable, serving fallback');
    return FALLBACK_ANNOUNCEMENTS.map((a) => ({ ...a }));
  }
}
