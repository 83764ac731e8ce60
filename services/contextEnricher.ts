/**
 * CONTEXT ENRICHER
 *
 * Post-pass that attaches a VAF to variants extracted without one, by
 * searching the report text near the gene or the mutation token.
 *
 * Strategies run in order and the first one that yields a value in (0, 100]
 * wins:
 * 1. gene-anchored:     "EGFR 16%"
 * 2. mutation-anchored: "Gly719Arg f.a. 61%", "... frequenza allelica 76%", "(L858R) 45%"
 * 3. window:            any percentage within +/- window chars of the first
 *                       occurrence of the mutation token
 *
 * Proximity only; no sentence or table awareness.
 */

import type { VariantRecord } from "../schemas/mtbReport";
import { parseVaf } from "./patternRegistry";
import { escapeRegExp } from "./textMatching";

const PERCENT = "(\\d+(?:\\.\\d+)?)%";

export interface VafStrategy {
  readonly name: string;
  readonly find: (variant: VariantRecord, text: string, window: number) => number | null;
}

/**
 * Protein or cDNA change without its "p."/"c." prefix
 */
export const mutationToken = (variant: VariantRecord): string | null => {
  const change = variant.proteinChange ?? variant.cdnaChange;
  if (change === null) return null;
  const token = change.replace(/^[pc]\./i, "");
  return token === "" ? null : token;
};

const firstValidPercent = (text: string, pattern: RegExp): number | null => {
  for (const match of text.matchAll(pattern)) {
    const value = parseVaf(match[1] ?? null);
    if (value !== null) return value;
  }
  return null;
};

const geneAnchored: VafStrategy = {
  name: "gene-anchored",
  find: (variant, text) =>
    firstValidPercent(text, new RegExp(`\\b${escapeRegExp(variant.gene)}\\s+${PERCENT}`, "gi")),
};

const mutationAnchored: VafStrategy = {
  name: "mutation-anchored",
  find: (variant, text) => {
    const token = mutationToken(variant);
    if (token === null) return null;
    const mutation = escapeRegExp(token);
    const patterns = [
      new RegExp(`${mutation}\\s+f\\.a\\.?\\s*${PERCENT}`, "gi"),
      new RegExp(`${mutation}.*?frequenza\\s+allelica\\s+${PERCENT}`, "gi"),
      new RegExp(`${mutation}\\s*\\)?\\s*${PERCENT}`, "gi"),
    ];
    for (const pattern of patterns) {
      const value = firstValidPercent(text, pattern);
      if (value !== null) return value;
    }
    return null;
  },
};

const proximityWindow: VafStrategy = {
  name: "window",
  find: (variant, text, window) => {
    const token = mutationToken(variant);
    if (token === null) return null;
    const occurrence = new RegExp(escapeRegExp(token), "i").exec(text);
    if (occurrence === null) return null;

    const start = Math.max(0, occurrence.index - window);
    const end = Math.min(text.length, occurrence.index + occurrence[0].length + window);
    return firstValidPercent(text.slice(start, end), new RegExp(PERCENT, "g"));
  },
};

export const VAF_STRATEGIES: ReadonlyArray<VafStrategy> = [
  geneAnchored,
  mutationAnchored,
  proximityWindow,
];

/**
 * Returns new records; variants that already carry a VAF are passed through.
 */
export const enrichVariantsWithVaf = (
  variants: ReadonlyArray<VariantRecord>,
  text: string,
  window: number,
  strategies: ReadonlyArray<VafStrategy> = VAF_STRATEGIES
): ReadonlyArray<VariantRecord> =>
  variants.map((variant) => {
    if (variant.vaf !== null) return variant;
    for (const strategy of strategies) {
      const vaf = strategy.find(variant, text, window);
      if (vaf !== null) return { ...variant, vaf };
    }
    return variant;
  });
