/**
 * @fileoverview Work-time entity: one record per worked (or absent) day.
 *
 * Keys are `YYYY-MM-DD` dates and the merged set is ordered by date
 * ascending. A day booked as paid leave (`timeOffType` `CO`) consumes one
 * `paid_leave_day` from the owner's yearly quota.
 */

import { z } from 'zod';
import { defineMergeTable } from '../conflicts';
import { defineVocabulary } from '../status';
import { compareDates, isoDate, lenient } from './fields';
import type { EntityDefinition } from './types';

export const PAID_LEAVE_TYPE = 'CO';
export const PAID_LEAVE_QUOTA = 'paid_leave_day';

export const worktimePayloadSchema = z.object({
  dayStartTime: lenient(z.string()),
  dayEndTime: lenient(z.string().nullable()),
  temporaryStopCount: lenient(z.number().int().nonnegative()),
  lunchBreakDeducted: lenient(z.boolean()),
  timeOffType: lenient(z.string().nullable()),
  totalWorkedMinutes: lenient(z.number()),
  totalTemporaryStopMinutes: lenient(z.number()),
  totalOvertimeMinutes: lenient(z.number())
});

export type WorktimePayload = z.infer<typeof worktimePayloadSchema>;

export const worktimeVocabulary = defineVocabulary(
  'worktime',
  {
    INPUT: 'USER_INPUT',
    IN_PROGRESS: 'USER_IN_PROCESS',
    EDITED_BY_PRODUCER: 'USER_EDITED',
    ACK_DONE: 'USER_DONE',
    EDITED_BY_REVIEWER: 'ADMIN_EDITED',
    TOMBSTONE: 'ADMIN_BLANK',
    REVIEW_DONE: 'ADMIN_FINAL'
  },
  { ADMIN_DONE: 'REVIEW_DONE' }
);

export const worktimeTable = defineMergeTable<string, WorktimePayload>({
  entityType: 'worktime',
  vocabulary: worktimeVocabulary,
  compare: (a, b) => compareDates(a.key, b.key),
  quotaKinds: (payload) => (payload.timeOffType === PAID_LEAVE_TYPE ? [PAID_LEAVE_QUOTA] : [])
});

export const worktimeDefinition: EntityDefinition<string, WorktimePayload> = {
  table: worktimeTable,
  keySchema: isoDate,
  payloadSchema: worktimePayloadSchema
};
