/**
 * @fileoverview Quality-check register, kept by a checker and reviewed by an
 * admin.
 *
 * The checker plays the producer role. Older files wrote `USER_EDITED` for a
 * checker edit; it is still read as one.
 */

import { z } from 'zod';
import { defineMergeTable } from '../conflicts';
import { defineVocabulary } from '../status';
import { isoDate, lenient } from './fields';
import { compareRegisterLines } from './register';
import type { EntityDefinition } from './types';

export const checkRegisterPayloadSchema = z.object({
  date: lenient(isoDate),
  orderId: lenient(z.string()),
  productionId: lenient(z.string()),
  omsId: lenient(z.string()),
  designerName: lenient(z.string()),
  checkType: lenient(z.string()),
  articleNumbers: lenient(z.number().int()),
  filesNumbers: lenient(z.number().int()),
  errorDescription: lenient(z.string()),
  approvalStatus: lenient(z.string()),
  orderValue: lenient(z.number())
});

export type CheckRegisterPayload = z.infer<typeof checkRegisterPayloadSchema>;

export const checkRegisterVocabulary = defineVocabulary(
  'check_register',
  {
    INPUT: 'CHECKING_INPUT',
    IN_PROGRESS: 'CHECKING_IN_PROCESS',
    EDITED_BY_PRODUCER: 'TL_EDITED',
    ACK_DONE: 'CHECKING_DONE',
    EDITED_BY_REVIEWER: 'ADMIN_EDITED',
    TOMBSTONE: 'ADMIN_BLANK',
    REVIEW_DONE: 'ADMIN_DONE'
  },
  { USER_EDITED: 'EDITED_BY_PRODUCER' }
);

export const checkRegisterTable = defineMergeTable<number, CheckRegisterPayload>({
  entityType: 'check_register',
  vocabulary: checkRegisterVocabulary,
  compare: compareRegisterLines
});

export const checkRegisterDefinition: EntityDefinition<number, CheckRegisterPayload> = {
  table: checkRegisterTable,
  keySchema: z.number().int(),
  payloadSchema: checkRegisterPayloadSchema
};
