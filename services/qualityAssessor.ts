/**
 * QUALITY ASSESSOR
 *
 * Completeness metrics and warnings for one extracted report.
 *
 * Completeness = filled / expected, where expected covers six base fields
 * (patient id, age, sex; diagnosis text, stage; TMB) plus three fields per
 * variant (gene code, VAF, classification). The denominator grows with the
 * variant count, so percentages are not comparable across reports.
 */

import type {
  DetailedQualityReport,
  QualityLevel,
  QualityMetrics,
  ReportContent,
  VariantRecord,
} from "../schemas/mtbReport";

const BASE_FIELDS = 6;
const FIELDS_PER_VARIANT = 3;

const round1 = (value: number): number => Math.round(value * 10) / 10;

const percent = (part: number, whole: number): number => (whole === 0 ? 0 : (part / whole) * 100);

// ============================================================================
// WARNINGS
// ============================================================================

/**
 * Ordered warning list with exact-match deduplication
 */
export class WarningCollector {
  private readonly warnings: string[] = [];

  add(warning: string): void {
    if (!this.warnings.includes(warning)) {
      this.warnings.push(warning);
    }
  }

  addIf(condition: boolean, warning: string): void {
    if (condition) this.add(warning);
  }

  getWarnings(): ReadonlyArray<string> {
    return [...this.warnings];
  }

  hasWarnings(): boolean {
    return this.warnings.length > 0;
  }
}

export const WARNINGS = {
  noVariants: "no variants extracted",
  diagnosisMissing: "diagnosis not found",
  diagnosisUnmapped: "diagnosis not mapped to ICD-O",
  patientIncomplete: "patient information incomplete",
  tmbMissing: "TMB not found",
} as const;

// ============================================================================
// PREDICATES
// ============================================================================

export const isPatientComplete = (patient: ReportContent["patient"]): boolean =>
  patient.id !== null && patient.age !== null && patient.sex !== "unknown";

const isClassified = (variant: VariantRecord): boolean => variant.classification !== "unknown";

const hasHgvs = (variant: VariantRecord): boolean =>
  variant.cdnaChange !== null || (variant.proteinChange?.startsWith("p.") ?? false);

/** Gene mapped and classified (Likely) Pathogenic */
export const isActionableVariant = (variant: VariantRecord): boolean =>
  variant.geneVocabularyCode !== null &&
  (variant.classification === "Pathogenic" || variant.classification === "Likely Pathogenic");

// ============================================================================
// CORE METRICS
// ============================================================================

export const assessQuality = (report: ReportContent): QualityMetrics => {
  const { patient, diagnosis, variants, recommendations, tmb } = report;

  const baseFilled = [
    patient.id !== null,
    patient.age !== null,
    patient.sex !== "unknown",
    diagnosis.primaryDiagnosis !== null,
    diagnosis.stage !== null,
    tmb !== null,
  ].filter(Boolean).length;

  const variantsWithVaf = variants.filter((v) => v.vaf !== null).length;
  const variantsClassified = variants.filter(isClassified).length;
  const variantsWithGeneCode = variants.filter((v) => v.geneVocabularyCode !== null).length;

  const totalFieldsExpected = BASE_FIELDS + FIELDS_PER_VARIANT * variants.length;
  const filledFields = baseFilled + variantsWithVaf + variantsClassified + variantsWithGeneCode;

  const diagnosisMapped = diagnosis.vocabularyCode !== null;
  const patientComplete = isPatientComplete(patient);

  const collector = new WarningCollector();
  collector.addIf(variants.length === 0, WARNINGS.noVariants);
  if (diagnosis.primaryDiagnosis === null) {
    collector.add(WARNINGS.diagnosisMissing);
  } else if (!diagnosisMapped) {
    collector.add(WARNINGS.diagnosisUnmapped);
  }
  collector.addIf(!patientComplete, WARNINGS.patientIncomplete);
  collector.addIf(tmb === null, WARNINGS.tmbMissing);
  collector.addIf(
    variants.length > 0 && variantsWithVaf < variants.length,
    `VAF missing for ${variants.length - variantsWithVaf} of ${variants.length} variants`
  );
  collector.addIf(
    variantsWithGeneCode < variants.length,
    `${variants.length - variantsWithGeneCode} gene(s) not mapped to HGNC`
  );

  return {
    totalFieldsExpected,
    filledFields,
    completenessPct: round1(percent(filledFields, totalFieldsExpected)),
    variantsFound: variants.length,
    variantsWithVaf,
    variantsClassified,
    variantsWithGeneCode,
    drugsIdentified: recommendations.length,
    drugsMapped: recommendations.filter((r) => r.drugVocabularyCode !== null).length,
    diagnosisMapped,
    patientComplete,
    warnings: collector.getWarnings(),
  };
};

// ============================================================================
// DETAILED SCORING
// ============================================================================

const SECTION_WEIGHTS = {
  patient: 0.2,
  diagnosis: 0.25,
  variants: 0.35,
  therapeutics: 0.2,
} as const;

export const qualityLevelFor = (score: number): QualityLevel => {
  if (score >= 90) return "Excellent";
  if (score >= 75) return "Good";
  if (score >= 60) return "Acceptable";
  if (score >= 40) return "Poor";
  return "Critical";
};

/**
 * Weighted section scores (0-100 each), overall level and suggestions
 * for improving the source report.
 */
export const assessDetailedQuality = (report: ReportContent): DetailedQualityReport => {
  const { patient, diagnosis, variants, recommendations } = report;
  const errors: string[] = [];
  const warnings = new WarningCollector();

  // Patient: id 30, age 25, sex 25, birth date 20
  let patientScore = 0;
  if (patient.id !== null) patientScore += 30;
  else errors.push("patient ID missing");
  if (patient.age !== null) patientScore += 25;
  else warnings.add("patient age missing");
  if (patient.sex !== "unknown") patientScore += 25;
  else warnings.add("patient sex missing");
  if (patient.birthDate !== null) patientScore += 20;
  else warnings.add("patient birth date missing");

  // Diagnosis: text 40, ICD-O code 30, stage 20, histology 10
  let diagnosisScore = 0;
  if (diagnosis.primaryDiagnosis !== null) diagnosisScore += 40;
  else errors.push("primary diagnosis missing");
  if (diagnosis.vocabularyCode !== null) diagnosisScore += 30;
  else warnings.add(WARNINGS.diagnosisUnmapped);
  if (diagnosis.stage !== null) diagnosisScore += 20;
  else warnings.add("cancer stage missing");
  if (diagnosis.histology !== null) diagnosisScore += 10;

  // Variants: presence 20, then 20 each for HGVS, VAF, classification, HGNC coverage
  const variantsWithHgvs = variants.filter(hasHgvs).length;
  const variantsActionable = variants.filter(isActionableVariant).length;
  const hgvsPct = percent(variantsWithHgvs, variants.length);
  const vafPct = percent(variants.filter((v) => v.vaf !== null).length, variants.length);
  const classPct = percent(variants.filter(isClassified).length, variants.length);
  const genesMappedPct = percent(
    variants.filter((v) => v.geneVocabularyCode !== null).length,
    variants.length
  );

  let variantsScore = 0;
  if (variants.length === 0) {
    errors.push("no variants found in report");
  } else {
    variantsScore = 20 + (hgvsPct + vafPct + classPct + genesMappedPct) * 0.2;
    warnings.addIf(hgvsPct < 50, "less than 50% of variants have HGVS nomenclature");
    warnings.addIf(vafPct < 50, "less than 50% of variants have VAF");
    warnings.addIf(classPct < 50, "less than 50% of variants are classified");
    warnings.addIf(genesMappedPct < 80, "less than 80% of genes mapped to HGNC");
  }

  // Therapeutics: presence 30, RxNorm 40, targets 20, evidence 10; none found scores 50
  const drugsMappedPct = percent(
    recommendations.filter((r) => r.drugVocabularyCode !== null).length,
    recommendations.length
  );
  let therapeuticsScore = 50;
  if (recommendations.length === 0) {
    warnings.add("no therapeutic recommendations found");
  } else {
    const targetPct = percent(
      recommendations.filter((r) => r.geneTarget !== null).length,
      recommendations.length
    );
    const evidencePct = percent(
      recommendations.filter((r) => r.evidenceLevel !== "Unknown").length,
      recommendations.length
    );
    therapeuticsScore = 30 + drugsMappedPct * 0.4 + targetPct * 0.2 + evidencePct * 0.1;
    warnings.addIf(drugsMappedPct < 80, "less than 80% of drugs mapped to RxNorm");
  }

  const overallScore = round1(
    patientScore * SECTION_WEIGHTS.patient +
      diagnosisScore * SECTION_WEIGHTS.diagnosis +
      variantsScore * SECTION_WEIGHTS.variants +
      therapeuticsScore * SECTION_WEIGHTS.therapeutics
  );

  const recommendationsOut: string[] = [];
  if (patientScore < 80) {
    recommendationsOut.push("Improve patient data completeness (ID, age, sex, birth date)");
  }
  if (diagnosis.vocabularyCode === null) {
    recommendationsOut.push("Map diagnosis to ICD-O codes for better interoperability");
  }
  if (variantsWithHgvs < variants.length) {
    recommendationsOut.push("Use HGVS nomenclature (c./p.) for all variants");
  }
  if (vafPct < 80 && variants.length > 0) {
    recommendationsOut.push("Include VAF (Variant Allele Frequency) for variants when available");
  }
  if (genesMappedPct < 90 && variants.length > 0) {
    recommendationsOut.push("Verify gene symbols match HGNC nomenclature");
  }
  if (recommendations.length > 0 && drugsMappedPct < 80) {
    recommendationsOut.push("Use standard drug names mappable to RxNorm");
  }
  if (overallScore < 60) {
    recommendationsOut.push("Review report format to ensure all key fields are extractable");
  }

  return {
    overallScore,
    qualityLevel: qualityLevelFor(overallScore),
    patientScore: round1(patientScore),
    diagnosisScore: round1(diagnosisScore),
    variantsScore: round1(variantsScore),
    therapeuticsScore: round1(therapeuticsScore),
    variantsWithHgvs,
    variantsActionable,
    genesMappedPct: round1(genesMappedPct),
    drugsMappedPct: round1(drugsMappedPct),
    errors,
    warnings: warnings.getWarnings(),
    recommendations: recommendationsOut,
  };
};
