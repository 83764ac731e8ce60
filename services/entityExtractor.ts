/**
 * ENTITY EXTRACTOR
 *
 * Pure, deterministic extraction of candidate entities from one report text:
 * patient, diagnosis, variants (point, fusion, exon, CNV), TMB, therapeutic
 * recommendations, NGS method and report date.
 *
 * Gene-bearing candidates pass a vocabulary gate: the token must be a known
 * HGNC symbol or resolve to a code. Anything else is dropped without a warning.
 */

import type {
  DiagnosisRecord,
  PatientRecord,
  Sex,
  TherapeuticRecommendation,
  VariantCandidate,
  VariantRecord,
} from "../schemas/mtbReport";
import type { GeneCode } from "../schemas/vocabulary";
import {
  deriveAge,
  normalizeDate,
  normalizeDiagnosisText,
  normalizeDrug,
  normalizeSex,
  normalizeStage,
} from "./normalizer";
import {
  CNV_RULES,
  DIAGNOSIS_PATTERNS,
  EXON_RULES,
  FUSION_RULES,
  HISTOLOGY_PATTERN,
  NGS_METHOD_PATTERNS,
  PATIENT_PATTERNS,
  REPORT_DATE_PATTERNS,
  STAGE_PATTERN,
  TMB_PATTERNS,
  VARIANT_RULES,
  buildDrugPatterns,
  type VariantRule,
} from "./patternRegistry";
import { collapseWhitespace } from "./textMatching";
import type { VocabularyService } from "./vocabulary.effect";

// ============================================================================
// HELPERS
// ============================================================================

/**
 * First capture (group 1) of the first pattern that matches and is accepted
 */
const firstCapture = (
  text: string,
  patterns: ReadonlyArray<RegExp>,
  accept: (value: string) => boolean = () => true
): string | null => {
  for (const pattern of patterns) {
    const value = pattern.exec(text)?.[1]?.trim();
    if (value !== undefined && value !== "" && accept(value)) {
      return value;
    }
  }
  return null;
};

const isValidAge = (value: string): boolean => {
  const age = Number.parseInt(value, 10);
  return age >= 0 && age <= 120;
};

/**
 * Vocabulary gate for a single gene symbol
 */
export const passesGeneGate = (vocabulary: VocabularyService, gene: string): boolean =>
  vocabulary.isKnownGene(gene) || vocabulary.lookupGene(gene) !== null;

const fusionPartners = (gene: string): ReadonlyArray<string> => gene.split("::");

const geneCodeFor = (vocabulary: VocabularyService, candidate: VariantCandidate): GeneCode | null => {
  if (candidate.variantType !== "fusion") {
    return vocabulary.lookupGene(candidate.gene);
  }
  for (const partner of fusionPartners(candidate.gene)) {
    const code = vocabulary.lookupGene(partner);
    if (code !== null) return code;
  }
  return null;
};

const acceptCandidate = (vocabulary: VocabularyService, candidate: VariantCandidate): boolean =>
  candidate.variantType === "fusion"
    ? fusionPartners(candidate.gene).some((partner) => passesGeneGate(vocabulary, partner))
    : passesGeneGate(vocabulary, candidate.gene);

/**
 * Run every rule over the text, in registry order, keeping gated matches
 */
export const applyVariantRules = (
  text: string,
  rules: ReadonlyArray<VariantRule>,
  vocabulary: VocabularyService
): ReadonlyArray<VariantRecord> =>
  rules.flatMap((rule) =>
    Array.from(text.matchAll(rule.pattern)).flatMap((match) => {
      const candidate = rule.build(match.slice(1), collapseWhitespace(match[0]));
      if (candidate === null || !acceptCandidate(vocabulary, candidate)) return [];
      return [{ ...candidate, geneVocabularyCode: geneCodeFor(vocabulary, candidate) }];
    })
  );

// ============================================================================
// PATIENT
// ============================================================================

/**
 * Patient demographics; age falls back to one derived from the birth date.
 */
export const extractPatient = (text: string, referenceDate: Date): PatientRecord => {
  const id = firstCapture(text, PATIENT_PATTERNS.id);
  const ageText = firstCapture(text, PATIENT_PATTERNS.age, isValidAge);
  const sexText = firstCapture(text, PATIENT_PATTERNS.sex);
  const birthText = firstCapture(text, PATIENT_PATTERNS.birthDate);

  const birthDate = birthText === null ? null : normalizeDate(birthText);
  const normalizedSex = sexText === null ? null : normalizeSex(sexText);
  const sex: Sex = normalizedSex === "M" || normalizedSex === "F" ? normalizedSex : "unknown";

  let age = ageText === null ? null : Number.parseInt(ageText, 10);
  if (age === null && birthDate !== null) {
    age = deriveAge(birthDate, referenceDate);
  }

  return { id, age, sex, birthDate };
};

// ============================================================================
// DIAGNOSIS
// ============================================================================

export const extractDiagnosis = (text: string, vocabulary: VocabularyService): DiagnosisRecord => {
  const diagnosisText = firstCapture(text, DIAGNOSIS_PATTERNS);
  const primaryDiagnosis = diagnosisText === null ? null : normalizeDiagnosisText(diagnosisText);

  const stageMatch = STAGE_PATTERN.exec(text);
  const stage = stageMatch ? normalizeStage(`${stageMatch[1]}${stageMatch[2] ?? ""}`) : null;

  const histologyText = firstCapture(text, [HISTOLOGY_PATTERN]);
  const histology = histologyText === null ? null : collapseWhitespace(histologyText).replace(/\.$/, "");

  return {
    primaryDiagnosis,
    stage,
    histology: histology === "" ? null : histology,
    vocabularyCode: primaryDiagnosis === null ? null : vocabulary.lookupDiagnosis(primaryDiagnosis),
  };
};

// ============================================================================
// VARIANTS
// ============================================================================

/** Point variants from the ordered variant rule families */
export const extractVariantCandidates = (
  text: string,
  vocabulary: VocabularyService
): ReadonlyArray<VariantRecord> => applyVariantRules(text, VARIANT_RULES, vocabulary);

/** Gene fusions; accepted when either partner passes the gate */
export const extractFusions = (
  text: string,
  vocabulary: VocabularyService
): ReadonlyArray<VariantRecord> => applyVariantRules(text, FUSION_RULES, vocabulary);

/** Exon-level insertions and deletions */
export const extractExonAlterations = (
  text: string,
  vocabulary: VocabularyService
): ReadonlyArray<VariantRecord> => applyVariantRules(text, EXON_RULES, vocabulary);

/** Amplifications, deletions, LOH and copy-number values */
export const extractCnvs = (
  text: string,
  vocabulary: VocabularyService
): ReadonlyArray<VariantRecord> => applyVariantRules(text, CNV_RULES, vocabulary);

/**
 * Union of every variant family in priority order:
 * point variants, fusions, exon alterations, CNVs. Not yet deduplicated.
 */
export const extractAllVariantCandidates = (
  text: string,
  vocabulary: VocabularyService
): ReadonlyArray<VariantRecord> => [
  ...extractVariantCandidates(text, vocabulary),
  ...extractFusions(text, vocabulary),
  ...extractExonAlterations(text, vocabulary),
  ...extractCnvs(text, vocabulary),
];

// ============================================================================
// TMB / NGS / REPORT DATE
// ============================================================================

export const extractTmb = (text: string): number | null => {
  const value = firstCapture(text, TMB_PATTERNS, (raw) => {
    const tmb = Number.parseFloat(raw);
    return tmb > 0 && tmb < 1000;
  });
  return value === null ? null : Number.parseFloat(value);
};

export const extractNgsMethod = (text: string): string | null => {
  const value = firstCapture(text, NGS_METHOD_PATTERNS);
  return value === null ? null : collapseWhitespace(value);
};

export const extractReportDate = (text: string): string | null => {
  const value = firstCapture(text, REPORT_DATE_PATTERNS);
  return value === null ? null : normalizeDate(value);
};

// ============================================================================
// THERAPEUTIC RECOMMENDATIONS
// ============================================================================

/**
 * Drugs mentioned in the text that map to RxNorm, one per canonical name.
 */
export const extractRecommendations = (
  text: string,
  vocabulary: VocabularyService
): ReadonlyArray<TherapeuticRecommendation> => {
  const recommendations: TherapeuticRecommendation[] = [];
  const seen = new Set<string>();

  for (const pattern of buildDrugPatterns(vocabulary.drugNames())) {
    for (const match of text.matchAll(pattern)) {
      const mention = match[1];
      if (mention === undefined) continue;

      const code = vocabulary.lookupDrug(normalizeDrug(mention));
      if (code === null) continue;

      const drug = normalizeDrug(code.name);
      if (seen.has(drug)) continue;
      seen.add(drug);

      recommendations.push({
        drug,
        geneTarget: code.targets.length > 0 ? code.targets.join(", ") : null,
        evidenceLevel: code.evidenceLevel,
        drugVocabularyCode: code,
      });
    }
  }

  return recommendations;
};
