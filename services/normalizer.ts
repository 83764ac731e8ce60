/**
 * VALUE NORMALIZER
 *
 * Pure, total mapping functions from free text to canonical values.
 * None of these throw; unrecognized input gets a best-effort value.
 */

import { differenceInYears, format, isValid, parse, parseISO } from "date-fns";
import type { KnownClassification } from "../schemas/mtbReport";
import { collapseWhitespace } from "./textMatching";

// ============================================================================
// CLASSIFICATION
// ============================================================================

const CLASSIFICATION_TABLE: Record<string, KnownClassification> = {
  pathogenic: "Pathogenic",
  patogenetica: "Pathogenic",
  patogenetico: "Pathogenic",
  patogenica: "Pathogenic",
  patogenico: "Pathogenic",
  patogena: "Pathogenic",
  "class 5": "Pathogenic",
  "classe 5": "Pathogenic",

  "likely pathogenic": "Likely Pathogenic",
  "probabilmente patogenetica": "Likely Pathogenic",
  "probabilmente patogenetico": "Likely Pathogenic",
  "probabilmente patogenica": "Likely Pathogenic",
  "probabilmente patogenico": "Likely Pathogenic",
  "class 4": "Likely Pathogenic",
  "classe 4": "Likely Pathogenic",

  vus: "VUS",
  "uncertain significance": "VUS",
  "variant of uncertain significance": "VUS",
  "significato incerto": "VUS",
  "variante di significato incerto": "VUS",
  "class 3": "VUS",
  "classe 3": "VUS",

  "likely benign": "Likely Benign",
  "probabilmente benigna": "Likely Benign",
  "probabilmente benigno": "Likely Benign",
  "class 2": "Likely Benign",
  "classe 2": "Likely Benign",

  benign: "Benign",
  benigna: "Benign",
  benigno: "Benign",
  "class 1": "Benign",
  "classe 1": "Benign",

  unknown: "unknown",
  "n/a": "unknown",
  "-": "unknown",
};

const CLASSIFICATION_SYNONYMS = new Map(Object.entries(CLASSIFICATION_TABLE));

const titleCase = (value: string): string =>
  value
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");

/**
 * Map a classification label (English or Italian) to the fixed set.
 * Unmatched labels come back cleaned and title-cased, never null.
 */
export const normalizeClassification = (raw: string | null | undefined): string => {
  if (!raw) return "unknown";
  const cleaned = collapseWhitespace(raw.replace(/[_]+/g, " ")).replace(/[.;:,]+$/, "");
  if (cleaned === "") return "unknown";
  const known = CLASSIFICATION_SYNONYMS.get(cleaned.toLowerCase());
  return known ?? titleCase(cleaned);
};

// ============================================================================
// SEX
// ============================================================================

const SEX_SYNONYMS = new Map<string, "M" | "F">([
  ["m", "M"],
  ["male", "M"],
  ["maschio", "M"],
  ["uomo", "M"],
  ["f", "F"],
  ["female", "F"],
  ["femmina", "F"],
  ["donna", "F"],
]);

/**
 * M/F for known synonyms; anything else passes through uppercased.
 */
export const normalizeSex = (raw: string): string => {
  const cleaned = raw.trim();
  return SEX_SYNONYMS.get(cleaned.toLowerCase()) ?? cleaned.toUpperCase();
};

// ============================================================================
// DATES
// ============================================================================

const DAY_FIRST_DATE = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Day-first date (DD/MM/YYYY, DD.MM.YYYY, DD-MM-YYYY) to ISO yyyy-MM-dd.
 *
 * Impossible calendar dates are still emitted zero-padded; ambiguous
 * day/month order is not detected.
 */
export const normalizeDate = (raw: string): string | null => {
  const value = raw.trim();
  if (ISO_DATE.test(value)) return value;

  const match = DAY_FIRST_DATE.exec(value);
  if (!match) return null;

  const [, day, month, year] = match;
  const parsed = parse(`${day}/${month}/${year}`, "d/M/yyyy", new Date(0));
  if (isValid(parsed)) {
    return format(parsed, "yyyy-MM-dd");
  }
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
};

/**
 * Whole years between an ISO birth date and the reference instant,
 * or null when the result falls outside 0-120.
 */
export const deriveAge = (birthDate: string, referenceDate: Date): number | null => {
  const birth = parseISO(birthDate);
  if (!isValid(birth)) return null;
  const age = differenceInYears(referenceDate, birth);
  return age >= 0 && age <= 120 ? age : null;
};

// ============================================================================
// GENES, DRUGS, STAGE, DIAGNOSIS
// ============================================================================

/**
 * Uppercase gene symbol; fusion partners are joined with "::".
 */
export const normalizeGene = (raw: string): string =>
  raw
    .trim()
    .replace(/^gene\s+/i, "")
    .split(/\s*::\s*/)
    .map((part) => part.toUpperCase())
    .join("::");

/**
 * Lowercase generic drug name without dosage or a trailing parenthetical.
 */
export const normalizeDrug = (raw: string): string =>
  collapseWhitespace(
    raw
      .toLowerCase()
      .replace(/\s*\([^)]*\)\s*$/, "")
      .replace(/\s+\d+(?:[.,]\d+)?\s*(?:mg\/m2|mg|mcg|µg|g|ml)\b.*$/, "")
  );

const STAGE = /^(IV|I{1,3})([ABC]?)$/;

/**
 * Roman numeral stage I-IV with optional A/B/C, or null.
 */
export const normalizeStage = (raw: string): string | null => {
  const cleaned = raw.trim().toUpperCase();
  return STAGE.test(cleaned) ? cleaned : null;
};

/**
 * Collapse whitespace and drop a trailing stage clause and punctuation.
 */
export const normalizeDiagnosisText = (raw: string): string | null => {
  const cleaned = collapseWhitespace(raw)
    .replace(/\s+(?:stadio|stage)\b.*$/i, "")
    .replace(/[\s,;:.-]+$/, "");
  return cleaned === "" ? null : cleaned;
};
