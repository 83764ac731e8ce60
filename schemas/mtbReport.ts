/**
 * MTB REPORT SCHEMA
 *
 * Typed records produced from one molecular tumor board report:
 * - Patient demographics
 * - Diagnosis with ICD-O mapping
 * - Genomic variants (point mutations, fusions, CNVs, exon alterations)
 * - Therapeutic recommendations with RxNorm mapping
 * - Quality metrics
 *
 * Every record is created fresh per parse call and frozen once assembled.
 */

import { Schema as S } from "effect";
import { DiagnosisCodeSchema, DrugCodeSchema, GeneCodeSchema } from "./vocabulary";

// ============================================================================
// PATIENT
// ============================================================================

export const SexSchema = S.Union(S.Literal("M"), S.Literal("F"), S.Literal("unknown"));
export type Sex = S.Schema.Type<typeof SexSchema>;

export const PatientRecordSchema = S.Struct({
  id: S.NullOr(S.String),
  age: S.NullOr(S.Int.pipe(S.between(0, 120))),
  sex: SexSchema,
  birthDate: S.NullOr(S.String), // ISO yyyy-MM-dd
});
export type PatientRecord = S.Schema.Type<typeof PatientRecordSchema>;

// ============================================================================
// DIAGNOSIS
// ============================================================================

export const DiagnosisRecordSchema = S.Struct({
  primaryDiagnosis: S.NullOr(S.String),
  stage: S.NullOr(S.String), // I-IV with optional A/B/C
  histology: S.NullOr(S.String),
  vocabularyCode: S.NullOr(DiagnosisCodeSchema),
});
export type DiagnosisRecord = S.Schema.Type<typeof DiagnosisRecordSchema>;

// ============================================================================
// VARIANT
// ============================================================================

export const KNOWN_CLASSIFICATIONS = [
  "Pathogenic",
  "Likely Pathogenic",
  "VUS",
  "Likely Benign",
  "Benign",
  "unknown",
] as const;
export type KnownClassification = (typeof KNOWN_CLASSIFICATIONS)[number];

export const VariantTypeSchema = S.Union(
  S.Literal("point"),
  S.Literal("fusion"),
  S.Literal("cnv"),
  S.Literal("exon")
);
export type VariantType = S.Schema.Type<typeof VariantTypeSchema>;

export const VariantRecordSchema = S.Struct({
  gene: S.String, // uppercase; fusions as "GENE1::GENE2"
  cdnaChange: S.NullOr(S.String),
  proteinChange: S.NullOr(S.String),
  // one of KNOWN_CLASSIFICATIONS, or a title-cased label that had no synonym
  classification: S.String,
  vaf: S.NullOr(S.Number.pipe(S.greaterThan(0), S.lessThanOrEqualTo(100))),
  geneVocabularyCode: S.NullOr(GeneCodeSchema),
  variantType: VariantTypeSchema,
  copyNumber: S.NullOr(S.Number),
  rawText: S.NullOr(S.String),
});
export type VariantRecord = S.Schema.Type<typeof VariantRecordSchema>;

/** A variant before the vocabulary gate attaches its gene code. */
export type VariantCandidate = Omit<VariantRecord, "geneVocabularyCode">;

export const FUSION_PROTEIN_CHANGE = "fusion";

// ============================================================================
// THERAPEUTIC RECOMMENDATION
// ============================================================================

export const TherapeuticRecommendationSchema = S.Struct({
  drug: S.String, // lowercase generic name
  geneTarget: S.NullOr(S.String),
  evidenceLevel: S.String,
  drugVocabularyCode: S.NullOr(DrugCodeSchema),
});
export type TherapeuticRecommendation = S.Schema.Type<typeof TherapeuticRecommendationSchema>;

// ============================================================================
// QUALITY METRICS
// ============================================================================

export const QualityMetricsSchema = S.Struct({
  totalFieldsExpected: S.Int,
  filledFields: S.Int,
  completenessPct: S.Number.pipe(S.between(0, 100)),
  variantsFound: S.Int,
  variantsWithVaf: S.Int,
  variantsClassified: S.Int,
  variantsWithGeneCode: S.Int,
  drugsIdentified: S.Int,
  drugsMapped: S.Int,
  diagnosisMapped: S.Boolean,
  patientComplete: S.Boolean,
  warnings: S.Array(S.String),
});
export type QualityMetrics = S.Schema.Type<typeof QualityMetricsSchema>;

export const QualityLevelSchema = S.Union(
  S.Literal("Excellent"),
  S.Literal("Good"),
  S.Literal("Acceptable"),
  S.Literal("Poor"),
  S.Literal("Critical")
);
export type QualityLevel = S.Schema.Type<typeof QualityLevelSchema>;

export const DetailedQualityReportSchema = S.Struct({
  overallScore: S.Number,
  qualityLevel: QualityLevelSchema,
  patientScore: S.Number,
  diagnosisScore: S.Number,
  variantsScore: S.Number,
  therapeuticsScore: S.Number,
  variantsWithHgvs: S.Int,
  variantsActionable: S.Int,
  genesMappedPct: S.Number,
  drugsMappedPct: S.Number,
  errors: S.Array(S.String),
  warnings: S.Array(S.String),
  recommendations: S.Array(S.String),
});
export type DetailedQualityReport = S.Schema.Type<typeof DetailedQualityReportSchema>;

// ============================================================================
// EXTRACTION REPORT
// ============================================================================

export const ExtractionReportSchema = S.Struct({
  patient: PatientRecordSchema,
  diagnosis: DiagnosisRecordSchema,
  variants: S.Array(VariantRecordSchema),
  recommendations: S.Array(TherapeuticRecommendationSchema),
  tmb: S.NullOr(S.Number.pipe(S.greaterThan(0), S.lessThan(1000))),
  ngsMethod: S.NullOr(S.String),
  reportDate: S.NullOr(S.String),
  quality: QualityMetricsSchema,
});
export type ExtractionReport = S.Schema.Type<typeof ExtractionReportSchema>;

/** Everything the quality assessor reads; the report minus its metrics. */
export type ReportContent = Omit<ExtractionReport, "quality">;
