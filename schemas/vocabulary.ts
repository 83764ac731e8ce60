/**
 * CONTROLLED VOCABULARY SCHEMA
 *
 * Codes returned by the vocabulary service (HGNC genes, RxNorm drugs,
 * ICD-O-3 diagnoses) and the on-disk JSON layout they are loaded from.
 */

import { Schema as S } from "effect";

// ============================================================================
// RESOLVED CODES
// ============================================================================

export const GeneCodeSchema = S.Struct({
  system: S.Literal("HGNC"),
  symbol: S.String,
  code: S.String, // e.g. "HGNC:3236"
  display: S.String,
  chromosome: S.NullOr(S.String),
  actionable: S.Boolean,
});
export type GeneCode = S.Schema.Type<typeof GeneCodeSchema>;

export const DrugCodeSchema = S.Struct({
  system: S.Literal("RxNorm"),
  name: S.String, // canonical lowercase vocabulary key
  code: S.String,
  display: S.String,
  targets: S.Array(S.String),
  evidenceLevel: S.String,
});
export type DrugCode = S.Schema.Type<typeof DrugCodeSchema>;

export const DiagnosisCodeSchema = S.Struct({
  system: S.Literal("ICD-O-3"),
  code: S.String, // morphology, e.g. "8140/3"
  display: S.String,
  topography: S.NullOr(S.String),
});
export type DiagnosisCode = S.Schema.Type<typeof DiagnosisCodeSchema>;

// ============================================================================
// VOCABULARY FILES
// ============================================================================

const VocabularyMetadataSchema = S.Struct({
  source: S.String,
  version: S.String,
});

export const GeneEntrySchema = S.Struct({
  code: S.String,
  name: S.String,
  chromosome: S.optional(S.String),
  actionable: S.Boolean,
  aliases: S.optional(S.Array(S.String)),
});
export type GeneEntry = S.Schema.Type<typeof GeneEntrySchema>;

export const DrugEntrySchema = S.Struct({
  code: S.String,
  display: S.String,
  targets: S.Array(S.String),
  indication: S.optional(S.String),
  evidenceLevel: S.optional(S.String),
});
export type DrugEntry = S.Schema.Type<typeof DrugEntrySchema>;

export const DiagnosisEntrySchema = S.Struct({
  code: S.String,
  display: S.String,
  topography: S.optional(S.String),
});
export type DiagnosisEntry = S.Schema.Type<typeof DiagnosisEntrySchema>;

export const GeneVocabularyFileSchema = S.Struct({
  metadata: VocabularyMetadataSchema,
  genes: S.Record({ key: S.String, value: GeneEntrySchema }),
});

export const DrugVocabularyFileSchema = S.Struct({
  metadata: VocabularyMetadataSchema,
  drugs: S.Record({ key: S.String, value: DrugEntrySchema }),
});

export const DiagnosisVocabularyFileSchema = S.Struct({
  metadata: VocabularyMetadataSchema,
  diagnoses: S.Record({ key: S.String, value: DiagnosisEntrySchema }),
});

/**
 * Raw vocabulary tables, keyed as in the JSON files:
 * genes by uppercase symbol, drugs and diagnoses by lowercase name.
 */
export interface VocabularyData {
  readonly genes: Readonly<Record<string, GeneEntry>>;
  readonly drugs: Readonly<Record<string, DrugEntry>>;
  readonly diagnoses: Readonly<Record<string, DiagnosisEntry>>;
}
