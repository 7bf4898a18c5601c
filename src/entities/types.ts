import type { z } from 'zod';
import type { MergeTable } from '../conflicts';
import type { RecordKey } from '../types';

/**
 * A zod schema whose input is anything read from storage. Payload schemas
 * fall back to `undefined` for malformed fields, so their input type is
 * `unknown` rather than the output type.
 */
export type StoredSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Everything a store and the engine need to handle one entity type. */
export interface EntityDefinition<K extends RecordKey = RecordKey, P = unknown> {
  readonly table: MergeTable<K, P>;
  readonly keySchema: StoredSchema<K>;
  readonly payloadSchema: StoredSchema<P>;
}
