import { describe, expect, it } from 'vitest';
import {
  checkRegisterTable,
  registerTable,
  worktimeTable,
  type CheckRegisterPayload,
  type RegisterPayload,
  type WorktimePayload
} from '../entities';
import { reconcileReplicas } from '../reconciler';
import type { SyncRecord } from '../types';

type Day = SyncRecord<string, WorktimePayload>;

function day(key: string, tag: string, payload: WorktimePayload, editedAt?: number): Day {
  const record: Day = { key, ownerId: 'jdoe', payload, tag };
  return editedAt === undefined ? record : { ...record, editedAt };
}

function line(key: number, date: string, tag = 'USER_INPUT'): SyncRecord<number, RegisterPayload> {
  return { key, ownerId: 'jdoe', payload: { date, orderId: `ORD-${key}` }, tag };
}

type Check = SyncRecord<number, CheckRegisterPayload>;

function check(key: number, date: string, checkType: string, tag: string, editedAt?: number): Check {
  const record: Check = { key, ownerId: 'jdoe', payload: { date, orderId: `ORD-${key}`, checkType }, tag };
  return editedAt === undefined ? record : { ...record, editedAt };
}

describe('reconcileReplicas', () => {
  it('copies new producer input into an absent reviewer replica', () => {
    const entry = day('2024-05-10', 'USER_INPUT', { totalWorkedMinutes: 480 });

    const result = reconcileReplicas(worktimeTable, [entry], [], { initiator: 'producer' });

    expect(result.merged).toEqual([entry]);
    expect(result.merged[0].tag).toBe('USER_INPUT');
    expect(result.reviewerOut).toEqual([entry]);
    expect(result.writeTargets).toEqual(['producer', 'reviewer']);
    expect(result.deltas).toEqual([]);
  });

  it('keeps the reviewer snapshot while the producer record is open', () => {
    const open = day('2024-05-11', 'USER_IN_PROCESS', { dayStartTime: '09:00', dayEndTime: null });
    const edited = day('2024-05-11', 'ADMIN_EDITED', { dayStartTime: '09:00', dayEndTime: '17:00' }, 50);

    const result = reconcileReplicas(worktimeTable, [open], [edited], { initiator: 'producer' });

    expect(result.merged).toEqual([open]);
    expect(result.producerOut).toEqual([open]);
    expect(result.reviewerOut).toEqual([edited]);
    expect(result.writeTargets).toEqual(['producer']);
  });

  it('covers the union of keys, drops tombstones and sorts by date', () => {
    const producer = [
      day('2024-05-12', 'USER_INPUT', { totalWorkedMinutes: 300 }),
      day('2024-05-10', 'USER_INPUT', { totalWorkedMinutes: 480 })
    ];
    const reviewer = [
      day('2024-05-12', 'ADMIN_BLANK', { totalWorkedMinutes: 300 }),
      day('2024-05-11', 'ADMIN_FINAL', { totalWorkedMinutes: 450 })
    ];

    const result = reconcileReplicas(worktimeTable, producer, reviewer, { initiator: 'reviewer' });

    expect(result.merged.map((r) => r.key)).toEqual(['2024-05-10', '2024-05-11']);
    expect(result.merged[1].tag).toBe('USER_DONE');
    expect(result.decisions).toEqual([
      { key: '2024-05-12', rule: 'reviewer_tombstone', kind: 'drop' },
      { key: '2024-05-10', rule: 'producer_new_input', kind: 'keep' },
      { key: '2024-05-11', rule: 'reviewer_introduced', kind: 'keep' }
    ]);
    expect(result.writeTargets).toEqual(['reviewer', 'producer']);
  });

  it('orders register lines by date descending, then key descending', () => {
    const producer = [line(1, '2024-05-02'), line(2, '2024-05-03'), line(3, '2024-05-03')];

    const result = reconcileReplicas(registerTable, producer, [], { initiator: 'producer' });

    expect(result.merged.map((r) => r.key)).toEqual([3, 2, 1]);
  });

  it('reports a key with an unknown tag and leaves both copies alone', () => {
    const broken = day('2024-05-03', 'SOMETHING_ELSE', { totalWorkedMinutes: 1 });
    const fine = day('2024-05-04', 'USER_INPUT', { totalWorkedMinutes: 2 });
    const reviewerCopy = day('2024-05-03', 'ADMIN_FINAL', { totalWorkedMinutes: 3 });

    const result = reconcileReplicas(worktimeTable, [broken, fine], [reviewerCopy], {
      initiator: 'producer'
    });

    expect(result.merged).toEqual([fine]);
    expect(result.failures).toEqual([
      {
        key: '2024-05-03',
        role: 'producer',
        tag: 'SOMETHING_ELSE',
        message: 'Unknown worktime tag "SOMETHING_ELSE" on key 2024-05-03'
      }
    ]);
    expect(result.producerOut).toEqual([broken, fine]);
    expect(result.reviewerOut).toEqual([reviewerCopy, fine]);
  });

  it('keeps the last record when a replica repeats a key', () => {
    const first = day('2024-05-10', 'USER_INPUT', { totalWorkedMinutes: 100 });
    const second = day('2024-05-10', 'USER_INPUT', { totalWorkedMinutes: 200 });

    const result = reconcileReplicas(worktimeTable, [first, second], [], { initiator: 'producer' });

    expect(result.merged).toEqual([second]);
  });

  it('seeds an empty producer replica from the reviewer', () => {
    const signed = day('2024-05-02', 'ADMIN_FINAL', { totalWorkedMinutes: 480 });
    const corrected = day('2024-05-01', 'ADMIN_EDITED', { totalWorkedMinutes: 420 }, 7);

    const result = reconcileReplicas(worktimeTable, [], [signed, corrected], {
      initiator: 'reviewer'
    });

    expect(result.producerOut).toEqual([
      { ...corrected, tag: 'USER_DONE' },
      { ...signed, tag: 'USER_DONE' }
    ]);
    expect(result.writeTargets).toEqual(['reviewer', 'producer']);
  });

  it('writes nothing when both replicas are empty', () => {
    const result = reconcileReplicas(worktimeTable, [], [], { initiator: 'producer' });

    expect(result.merged).toEqual([]);
    expect(result.writeTargets).toEqual([]);
  });

  it('converges: a second pass over its own output changes nothing', () => {
    const producer = [
      day('2024-05-01', 'USER_INPUT', { totalWorkedMinutes: 480 }),
      day('2024-05-02', 'USER_IN_PROCESS', { dayStartTime: '08:00' }),
      day('2024-05-03', 'USER_EDITED', { totalWorkedMinutes: 400 }, 200),
      day('2024-05-04', 'USER_DONE', { totalWorkedMinutes: 480 }),
      day('2024-05-05', 'USER_INPUT', { timeOffType: 'CO' })
    ];
    const reviewer = [
      day('2024-05-02', 'ADMIN_EDITED', { dayStartTime: '08:00', dayEndTime: '16:00' }, 100),
      day('2024-05-03', 'USER_DONE', { totalWorkedMinutes: 480 }),
      day('2024-05-04', 'ADMIN_EDITED', { totalWorkedMinutes: 460 }, 300),
      day('2024-05-05', 'ADMIN_BLANK', { timeOffType: 'CO' }),
      day('2024-05-06', 'ADMIN_FINAL', { totalWorkedMinutes: 480 })
    ];

    const first = reconcileReplicas(worktimeTable, producer, reviewer, { initiator: 'producer' });
    const second = reconcileReplicas(worktimeTable, first.producerOut, first.reviewerOut, {
      initiator: 'producer'
    });

    expect(first.merged.map((r) => [r.key, r.tag])).toEqual([
      ['2024-05-01', 'USER_INPUT'],
      ['2024-05-02', 'USER_IN_PROCESS'],
      ['2024-05-03', 'USER_EDITED'],
      ['2024-05-04', 'USER_DONE'],
      ['2024-05-06', 'USER_DONE']
    ]);
    expect(first.deltas.map((d) => [d.key, d.amount])).toEqual([['2024-05-05', 1]]);

    expect(second.merged).toEqual(first.merged);
    expect(second.producerOut).toEqual(first.producerOut);
    expect(second.reviewerOut).toEqual(first.reviewerOut);
    expect(second.deltas).toEqual([]);
    expect(second.writeTargets).toEqual(['producer']);
  });

  describe('check register', () => {
    const producer = [
      check(7, '2024-05-02', 'final', 'USER_EDITED', 100),
      check(8, '2024-05-03', 'final', 'USER_EDITED', 100),
      check(9, '2024-05-02', 'proof', 'USER_EDITED', 100)
    ];
    const reviewer = [
      check(7, '2024-05-02', 'final', 'ADMIN_BLANK'),
      check(8, '2024-05-03', 'draft', 'ADMIN_DONE'),
      check(9, '2024-05-02', 'proof', 'ADMIN_DONE')
    ];

    it('reads the legacy checker tag as a producer edit', () => {
      const result = reconcileReplicas(checkRegisterTable, producer, reviewer, { initiator: 'producer' });

      expect(result.decisions).toEqual([
        { key: 7, rule: 'producer_resurrects', kind: 'keep' },
        { key: 8, rule: 'producer_edit_wins', kind: 'keep' },
        { key: 9, rule: 'producer_edit_acknowledged', kind: 'keep' }
      ]);
      expect(result.merged.map((r) => [r.key, r.tag])).toEqual([
        [8, 'TL_EDITED'],
        [9, 'CHECKING_DONE'],
        [7, 'TL_EDITED']
      ]);
      expect(result.merged[0].payload.checkType).toBe('final');
      expect(result.reviewerOut).toEqual([
        reviewer[1],
        { ...producer[2], tag: 'CHECKING_DONE' },
        reviewer[0]
      ]);
      expect(result.writeTargets).toEqual(['producer', 'reviewer']);
      expect(result.deltas).toEqual([]);
    });

    it('changes nothing on a second pass', () => {
      const first = reconcileReplicas(checkRegisterTable, producer, reviewer, { initiator: 'producer' });
      const second = reconcileReplicas(checkRegisterTable, first.producerOut, first.reviewerOut, {
        initiator: 'producer'
      });

      expect(second.merged).toEqual(first.merged);
      expect(second.producerOut).toEqual(first.producerOut);
      expect(second.reviewerOut).toEqual(first.reviewerOut);
      expect(second.writeTargets).toEqual(['producer']);
      expect(second.decisions.map((d) => d.rule)).toEqual([
        'producer_edit_wins',
        'already_converged',
        'producer_resurrects'
      ]);
    });
  });
});
