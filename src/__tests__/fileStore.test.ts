import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { worktimeDefinition, type WorktimePayload } from '../entities';
import { createFileReplicaStore, replicaFilePath } from '../storage/fileStore';
import { fromStoredRecords } from '../storage/replicaStore';
import type { SyncRecord } from '../types';

const period = { year: 2024, month: 5 };

describe('file replica store', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'replicas-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('lays files out by role, entity, owner and period', () => {
    expect(replicaFilePath('/data', 'worktime', 'j doe', period, 'reviewer')).toBe(
      join('/data', 'reviewer', 'worktime', 'j%20doe', '2024-05.json')
    );
    expect(replicaFilePath('/data', 'worktime', 'jdoe', { year: 2024 }, 'producer')).toBe(
      join('/data', 'producer', 'worktime', 'jdoe', '2024.json')
    );
  });

  it('returns an empty replica when nothing was saved', async () => {
    const store = createFileReplicaStore({ dataDir, entity: worktimeDefinition });

    await expect(store.loadReplica('jdoe', period, 'producer')).resolves.toEqual({
      ownerId: 'jdoe',
      period,
      role: 'producer',
      records: []
    });
  });

  it('reads back what it wrote, leaving no temporary files', async () => {
    const store = createFileReplicaStore({ dataDir, entity: worktimeDefinition });
    const records: SyncRecord<string, WorktimePayload>[] = [
      {
        key: '2024-05-10',
        ownerId: 'jdoe',
        payload: { dayStartTime: '08:00', dayEndTime: '16:30', totalWorkedMinutes: 480 },
        tag: 'USER_EDITED',
        editedAt: 28_000_000
      }
    ];

    await store.saveReplica('jdoe', period, 'producer', records);
    const replica = await store.loadReplica('jdoe', period, 'producer');

    expect(replica.records).toEqual(records);
    const file = replicaFilePath(dataDir, 'worktime', 'jdoe', period, 'producer');
    expect(await readdir(dirname(file))).toEqual(['2024-05.json']);
    const document = JSON.parse(await readFile(file, 'utf8'));
    expect(document.role).toBe('producer');
    expect(document.records[0].tag).toBe('USER_EDITED');
  });

  it('drops malformed payload fields and records with bad keys', async () => {
    const store = createFileReplicaStore({ dataDir, entity: worktimeDefinition });
    const file = replicaFilePath(dataDir, 'worktime', 'jdoe', period, 'reviewer');
    await mkdir(dirname(file), { recursive: true });
    await writeFile(
      file,
      JSON.stringify({
        ownerId: 'jdoe',
        period,
        role: 'reviewer',
        records: [
          { key: '2024-05-02', ownerId: 'jdoe', payload: { totalWorkedMinutes: 'eight', dayStartTime: '07:00' } },
          { key: 'yesterday', ownerId: 'jdoe', payload: {}, tag: 'ADMIN_FINAL' },
          { key: '2024-05-03', ownerId: 'jdoe', payload: 'garbage', tag: 'ADMIN_FINAL' }
        ]
      })
    );

    const replica = await store.loadReplica('jdoe', period, 'reviewer');

    expect(replica.records).toEqual([
      { key: '2024-05-02', ownerId: 'jdoe', payload: { dayStartTime: '07:00' } },
      { key: '2024-05-03', ownerId: 'jdoe', payload: {}, tag: 'ADMIN_FINAL' }
    ]);
    expect(replica.records[0].payload.totalWorkedMinutes).toBeUndefined();
    expect(replica.records[0].tag).toBeUndefined();
  });

  it('keeps the rest of a replica when single records are damaged', async () => {
    const store = createFileReplicaStore({ dataDir, entity: worktimeDefinition });
    const file = replicaFilePath(dataDir, 'worktime', 'jdoe', period, 'producer');
    await mkdir(dirname(file), { recursive: true });
    await writeFile(
      file,
      JSON.stringify({
        ownerId: 'jdoe',
        period,
        role: 'producer',
        records: [
          { key: '2024-05-10', ownerId: 'jdoe', payload: { timeOffType: 'CO' }, tag: 'USER_INPUT' },
          { key: '2024-05-11', payload: { dayStartTime: '09:00' }, tag: 'USER_INPUT' },
          { key: '2024-05-12', ownerId: 'jdoe', payload: {}, tag: 42, editedAt: 'noon' },
          'not a record',
          null
        ]
      })
    );

    const replica = await store.loadReplica('jdoe', period, 'producer');

    expect(replica.records).toEqual([
      { key: '2024-05-10', ownerId: 'jdoe', payload: { timeOffType: 'CO' }, tag: 'USER_INPUT' },
      { key: '2024-05-11', ownerId: 'jdoe', payload: { dayStartTime: '09:00' }, tag: 'USER_INPUT' },
      { key: '2024-05-12', ownerId: 'jdoe', payload: {} }
    ]);
    expect('tag' in replica.records[2]).toBe(false);
    expect('editedAt' in replica.records[2]).toBe(false);
  });
});

describe('fromStoredRecords', () => {
  it('gives records without an owner to the replica owner', () => {
    const records = fromStoredRecords(
      worktimeDefinition,
      [
        { key: '2024-05-10', ownerId: 'jdoe', payload: { totalWorkedMinutes: 480 }, tag: 'USER_DONE' },
        { key: '2024-05-11', payload: { totalWorkedMinutes: 300 }, tag: 'USER_INPUT' }
      ],
      'jdoe'
    );

    expect(records.map((record) => [record.key, record.ownerId, record.tag])).toEqual([
      ['2024-05-10', 'jdoe', 'USER_DONE'],
      ['2024-05-11', 'jdoe', 'USER_INPUT']
    ]);
  });

  it('still rejects a record list that is not an array', () => {
    expect(() => fromStoredRecords(worktimeDefinition, { key: '2024-05-10' }, 'jdoe')).toThrow();
  });
});
