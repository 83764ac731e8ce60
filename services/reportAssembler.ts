/**
 * REPORT ASSEMBLER
 *
 * Sole constructor of ExtractionReport. Composes the extracted parts with
 * their quality metrics and freezes the result; no validation happens here.
 */

import type {
  ExtractionReport,
  QualityMetrics,
  ReportContent,
  VariantRecord,
} from "../schemas/mtbReport";
import { FUSION_PROTEIN_CHANGE } from "../schemas/mtbReport";
import { defaultParserConfig, type ParserConfig } from "../schemas/parserConfig";
import { isActionableVariant } from "./qualityAssessor";

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

export const assembleReport = (content: ReportContent, quality: QualityMetrics): ExtractionReport =>
  deepFreeze({
    patient: { ...content.patient },
    diagnosis: { ...content.diagnosis },
    variants: content.variants.map((variant) => ({ ...variant })),
    recommendations: content.recommendations.map((recommendation) => ({ ...recommendation })),
    tmb: content.tmb,
    ngsMethod: content.ngsMethod,
    reportDate: content.reportDate,
    quality: { ...quality, warnings: [...quality.warnings] },
  });

// ============================================================================
// REPORT QUERIES
// ============================================================================

export const actionableVariants = (report: ExtractionReport): ReadonlyArray<VariantRecord> =>
  report.variants.filter(isActionableVariant);

export const fusionVariants = (report: ExtractionReport): ReadonlyArray<VariantRecord> =>
  report.variants.filter((variant) => variant.proteinChange === FUSION_PROTEIN_CHANGE);

type TmbThreshold = Pick<ParserConfig, "tmbHighThreshold">;

/** TMB at or above config.tmbHighThreshold (mut/Mb) */
export const hasHighTmb = (
  report: ExtractionReport,
  config: TmbThreshold = defaultParserConfig
): boolean => report.tmb !== null && report.tmb >= config.tmbHighThreshold;

/**
 * Human-readable summary
 */
export const summarizeReport = (
  report: ExtractionReport,
  config: TmbThreshold = defaultParserConfig
): string => {
  const lines = [
    `Patient: ${report.patient.id ?? "unknown"}`,
    `Diagnosis: ${report.diagnosis.primaryDiagnosis ?? "not found"}` +
      (report.diagnosis.stage ? ` (stage ${report.diagnosis.stage})` : ""),
    `Variants: ${report.variants.length} total, ${actionableVariants(report).length} actionable`,
    `Fusions: ${fusionVariants(report).length}`,
    `TMB: ${report.tmb === null ? "not reported" : `${report.tmb} mut/Mb`}` +
      (hasHighTmb(report, config) ? " (high)" : ""),
    `Recommendations: ${report.recommendations.length}`,
    `Completeness: ${report.quality.completenessPct}%`,
  ];
  if (report.quality.warnings.length > 0) {
    lines.push(`Warnings: ${report.quality.warnings.join("; ")}`);
  }
  return lines.join("\n");
};
