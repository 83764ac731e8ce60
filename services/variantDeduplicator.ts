/**
 * VARIANT DEDUPLICATOR
 *
 * Collapses the unioned candidates so no two records share the identity key
 * (gene, proteinChange, cdnaChange). First seen wins, in rule priority order;
 * a later duplicate is dropped whole, fields are never merged across records.
 *
 * A candidate is also a duplicate when a kept record for the same gene already
 * carries every change field the candidate has (a low-arity rematch of a
 * table row that recorded both c. and p. changes).
 */

import { Array as A } from "effect";
import type { VariantRecord } from "../schemas/mtbReport";

export type VariantIdentity = Pick<VariantRecord, "gene" | "proteinChange" | "cdnaChange">;

export const variantIdentityKey = (variant: VariantIdentity): string =>
  `${variant.gene}|${variant.proteinChange ?? ""}|${variant.cdnaChange ?? ""}`;

interface DedupeState {
  readonly keys: ReadonlySet<string>;
  readonly kept: ReadonlyArray<VariantRecord>;
}

const emptyState: DedupeState = { keys: new Set(), kept: [] };

const isSubsumedBy = (candidate: VariantIdentity, kept: VariantIdentity): boolean =>
  candidate.gene === kept.gene &&
  (candidate.proteinChange === null || candidate.proteinChange === kept.proteinChange) &&
  (candidate.cdnaChange === null || candidate.cdnaChange === kept.cdnaChange);

const step = (state: DedupeState, candidate: VariantRecord): DedupeState => {
  const key = variantIdentityKey(candidate);
  if (state.keys.has(key) || state.kept.some((kept) => isSubsumedBy(candidate, kept))) {
    return state;
  }
  return {
    keys: new Set([...state.keys, key]),
    kept: [...state.kept, candidate],
  };
};

/**
 * Fold candidates into a duplicate-free list, preserving first-seen order
 */
export const dedupeVariants = (
  candidates: ReadonlyArray<VariantRecord>
): ReadonlyArray<VariantRecord> => A.reduce(candidates, emptyState, step).kept;
