/**
 * @fileoverview Sync Status Vocabulary
 *
 * Every entity type writes its own status strings (`USER_EDITED`,
 * `ADMIN_BLANK`, `CHECKING_DONE`, ...) but they all map onto the same seven
 * canonical tags the merge table reasons about:
 *
 * | Canonical            | Meaning                                        | Set by   |
 * |----------------------|------------------------------------------------|----------|
 * | `INPUT`              | Freshly created, not yet reviewed              | producer |
 * | `IN_PROGRESS`        | Open record the producer is still building     | producer |
 * | `EDITED_BY_PRODUCER` | Producer changed an already reviewed record    | producer |
 * | `ACK_DONE`           | Converged, no open edit                        | producer |
 * | `EDITED_BY_REVIEWER` | Reviewer changed the content                   | reviewer |
 * | `TOMBSTONE`          | Reviewer marked the record for deletion        | reviewer |
 * | `REVIEW_DONE`        | Reviewer processed it without changing content | reviewer |
 *
 * A vocabulary may also accept aliases: strings that are read as a canonical
 * tag but never written back.
 */

import { UnknownTagError } from './errors';
import type { RecordKey } from './types';

export const CANONICAL_TAGS = [
  'INPUT',
  'IN_PROGRESS',
  'EDITED_BY_PRODUCER',
  'ACK_DONE',
  'EDITED_BY_REVIEWER',
  'TOMBSTONE',
  'REVIEW_DONE'
] as const;

export type CanonicalTag = (typeof CANONICAL_TAGS)[number];

export interface TagVocabulary {
  readonly entityType: string;
  /** Every string this vocabulary accepts, written tags first. */
  readonly tags: readonly string[];
  /**
   * Map an entity tag to its canonical role. A missing tag reads as `INPUT`.
   *
   * @throws {UnknownTagError} When the tag is outside the vocabulary.
   */
  toCanonical(tag: string | undefined, key?: RecordKey): CanonicalTag;
  /** The string written for a canonical tag. */
  fromCanonical(tag: CanonicalTag): string;
  isKnownTag(tag: string): boolean;
}

/**
 * Build an entity vocabulary.
 *
 * @param emitted - The string written for each canonical tag. Must be distinct.
 * @param aliases - Extra strings read as a canonical tag.
 *
 * @example
 * const vocab = defineVocabulary('check_register', {
 *   INPUT: 'CHECKING_INPUT',
 *   ...
 *   EDITED_BY_PRODUCER: 'TL_EDITED'
 * }, { USER_EDITED: 'EDITED_BY_PRODUCER' });
 * vocab.toCanonical('USER_EDITED'); // 'EDITED_BY_PRODUCER'
 */
export function defineVocabulary(
  entityType: string,
  emitted: Readonly<Record<CanonicalTag, string>>,
  aliases: Readonly<Record<string, CanonicalTag>> = {}
): TagVocabulary {
  const lookup = new Map<string, CanonicalTag>();

  for (const canonical of CANONICAL_TAGS) {
    const written = emitted[canonical];
    if (lookup.has(written)) {
      throw new Error(`Vocabulary ${entityType} writes "${written}" for more than one tag`);
    }
    lookup.set(written, canonical);
  }
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (lookup.has(alias) && lookup.get(alias) !== canonical) {
      throw new Error(`Vocabulary ${entityType} alias "${alias}" conflicts with a written tag`);
    }
    lookup.set(alias, canonical);
  }

  const tags = Object.freeze([...lookup.keys()]);

  return Object.freeze({
    entityType,
    tags,
    toCanonical(tag: string | undefined, key?: RecordKey): CanonicalTag {
      if (tag === undefined) return 'INPUT';
      const canonical = lookup.get(tag);
      if (canonical === undefined) throw new UnknownTagError(entityType, tag, key);
      return canonical;
    },
    fromCanonical(tag: CanonicalTag): string {
      return emitted[tag];
    },
    isKnownTag(tag: string): boolean {
      return lookup.has(tag);
    }
  });
}
