import 'dotenv/config';
import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadConfig } from '../config.js';
import { connectMongo, disconnectMongo } from '../db.js';
import type { DocumentStore } from '../store/documentStore.js';
import { MongoDocumentStore } from '../store/mongoDocumentStore.js';
import { announcementSchema, type AnnouncementRecord } from '../validation/schemas.js';
import { validate } from '../validation/validate.js';

function hasFlag(name: string): boolean {
  return process.argv.includes(name);
}

export function parseAnnouncementsFile(contents: string): AnnouncementRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (e) {
    throw new Error(`Announcements file is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return validate(z.array(announcementSchema), raw);
}

export async function seedAnnouncements(store: DocumentStore, announcements: AnnouncementRecord[]): Promise<string[]> {
  const ids: string[] = [];
  for (const announcement of announcements) {
    ids.push(await store.createDocument('announcement', announcement));
  }
  return ids;
}

async function main() {
  const file = process.argv.slice(2).find((arg) => !arg.startsWith('--'));
  if (!file) {
    throw new Error('Usage: seedAnnouncements <file.json> [--apply]');
  }
  const apply = hasFlag('--apply');

  const announcements = parseAnnouncementsFile(await fs.readFile(file, 'utf8'));

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify({ mode: apply ? 'APPLY' : 'DRY_RUN', count: announcements.length, sample: announcements.slice(0, 3) }, null, 2)
  );
  if (!apply) {
    return;
  }

  const { mongoUri, databaseName } = loadConfig();
  if (!mongoUri) {
    throw new Error('Missing MONGO_URI');
  }
  await connectMongo(mongoUri, databaseName);
  try {
    const ids = await seedAnnouncements(new MongoDocumentStore(), announcements);
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ inserted: ids.length, ids }, null, 2));
  } finally {
    await disconnectMongo();
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((e) => {
    // eslint-disable-next-line no-console
    console.error(e);
    process.exit(1);
  });
}
