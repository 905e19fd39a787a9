import { beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../errors.js';
import { MemoryDocumentStore } from '../store/memoryDocumentStore.js';
import { createScheduleEntry, listScheduleByOwner } from './schedule.js';

describe('schedule', () => {
  let store: MemoryDocumentStore;

  beforeEach(() => {
    store = new MemoryDocumentStore();
  });

  it('lists a created entry with every submitted field and its id', async () => {
    const payload = {
      owner_email: 'alice@example.edu',
      title: 'Chemistry lab',
      day: 'Tue',
      start_time: '14:00',
      end_time: '16:30',
      location: 'Room B12',
      notes: 'Bring goggles',
      color: '#ff8800',
    };
    const id = await createScheduleEntry(store, payload);

    const entries = await listScheduleByOwner(store, payload.owner_email);
    expect(entries).toEqual([{ ...payload, id }]);
  });

  it('keeps entries of other owners out', async () => {
    await createScheduleEntry(store, {
      owner_email: 'bob@example.edu',
      title: 'Study group',
      day: 'Wed',
      start_time: '18:00',
      end_time: '19:00',
    });
    expect(await listScheduleByOwner(store, 'alice@example.edu')).toEqual([]);
  });

  it('requires the owner email to be well formed', async () => {
    await expect(
      createScheduleEntry(store, { owner_email: 'alice', title: 'Lab', day: 'Mon', start_time: '09:00', end_time: '10:00' })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(store.operations).toBe(0);
  });
});
