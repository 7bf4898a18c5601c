/**
 * @fileoverview Production-order register: one line per order action.
 *
 * Keys are integer entry ids. Lines are ordered newest date first, then by
 * id descending.
 */

import { z } from 'zod';
import { defineMergeTable } from '../conflicts';
import { defineVocabulary } from '../status';
import type { SyncRecord } from '../types';
import { compareDates, isoDate, lenient } from './fields';
import type { EntityDefinition } from './types';

export const registerPayloadSchema = z.object({
  date: lenient(isoDate),
  orderId: lenient(z.string()),
  productionId: lenient(z.string()),
  omsId: lenient(z.string()),
  clientName: lenient(z.string()),
  actionType: lenient(z.string()),
  printPrepTypes: lenient(z.array(z.string())),
  colorsProfile: lenient(z.string()),
  articleNumbers: lenient(z.number().int()),
  graphicComplexity: lenient(z.number()),
  observations: lenient(z.string())
});

export type RegisterPayload = z.infer<typeof registerPayloadSchema>;

export const registerVocabulary = defineVocabulary('register', {
  INPUT: 'USER_INPUT',
  IN_PROGRESS: 'USER_IN_PROCESS',
  EDITED_BY_PRODUCER: 'USER_EDITED',
  ACK_DONE: 'USER_DONE',
  EDITED_BY_REVIEWER: 'ADMIN_EDITED',
  TOMBSTONE: 'ADMIN_BLANK',
  REVIEW_DONE: 'ADMIN_DONE'
});

/** Date descending, then key descending. Shared by both register-style entities. */
export function compareRegisterLines(
  a: SyncRecord<number, { date?: string }>,
  b: SyncRecord<number, { date?: string }>
): number {
  const byDate = compareDates(b.payload.date, a.payload.date);
  if (byDate !== 0) return byDate;
  return b.key - a.key;
}

export const registerTable = defineMergeTable<number, RegisterPayload>({
  entityType: 'register',
  vocabulary: registerVocabulary,
  compare: compareRegisterLines
});

export const registerDefinition: EntityDefinition<number, RegisterPayload> = {
  table: registerTable,
  keySchema: z.number().int(),
  payloadSchema: registerPayloadSchema
};
