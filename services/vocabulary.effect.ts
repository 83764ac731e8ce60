/**
 * VOCABULARY SERVICE - EFFECT-TS
 *
 * Resolves free-text genes, drugs and diagnoses to controlled vocabulary
 * codes (HGNC, RxNorm, ICD-O-3). Lookups are synchronous and return null
 * for "unmapped", never an error.
 *
 * Matching strategy:
 * - Genes: exact symbol, then alias; fusions resolve through the first partner
 * - Drugs: exact name, then fuzzy (similarity >= drugCutoff)
 * - Diagnoses: exact, then longest contained key, then fuzzy (>= diagnosisCutoff)
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { Context, Effect, Layer, Schema as S } from "effect";
import type { ParserConfig } from "../schemas/parserConfig";
import {
  DiagnosisVocabularyFileSchema,
  DrugVocabularyFileSchema,
  GeneVocabularyFileSchema,
  type DiagnosisCode,
  type DiagnosisEntry,
  type DrugCode,
  type DrugEntry,
  type GeneCode,
  type GeneEntry,
  type VocabularyData,
} from "../schemas/vocabulary";
import { VocabularyLoadError } from "./errors";
import { closestMatch, collapseWhitespace } from "./textMatching";

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface VocabularyService {
  /**
   * HGNC code for a symbol, alias or fusion ("ALK::EML4" resolves ALK)
   */
  readonly lookupGene: (symbol: string) => GeneCode | null;

  /**
   * Exact membership test against the HGNC symbol table
   */
  readonly isKnownGene: (symbol: string) => boolean;

  /**
   * RxNorm code for a drug name (fuzzy)
   */
  readonly lookupDrug: (name: string) => DrugCode | null;

  /**
   * ICD-O-3 code for diagnosis text (substring, then fuzzy)
   */
  readonly lookupDiagnosis: (text: string) => DiagnosisCode | null;

  /**
   * Canonical drug names, longest first
   */
  readonly drugNames: () => ReadonlyArray<string>;

  /**
   * Drugs listing the gene among their targets
   */
  readonly drugsByTarget: (gene: string) => ReadonlyArray<DrugCode>;
}

export const VocabularyService =
  Context.GenericTag<VocabularyService>("VocabularyService");

export interface MatchingOptions {
  readonly diagnosisCutoff: number;
  readonly drugCutoff: number;
}

const defaultMatchingOptions: MatchingOptions = {
  diagnosisCutoff: 0.6,
  drugCutoff: 0.8,
};

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

const toDrugCode = (name: string, entry: DrugEntry): DrugCode => ({
  system: "RxNorm",
  name,
  code: entry.code,
  display: entry.display,
  targets: [...entry.targets],
  evidenceLevel: entry.evidenceLevel ?? "Unknown",
});

class VocabularyServiceImpl implements VocabularyService {
  private readonly genes: ReadonlyMap<string, GeneEntry>;
  private readonly drugs: ReadonlyMap<string, DrugEntry>;
  private readonly diagnoses: ReadonlyMap<string, DiagnosisEntry>;
  private readonly aliases = new Map<string, string>();
  private readonly drugKeys: ReadonlyArray<string>;
  private readonly diagnosisKeys: ReadonlyArray<string>;

  constructor(
    data: VocabularyData,
    private readonly options: MatchingOptions
  ) {
    // Own keys only: report words such as "constructor" are not entries.
    this.genes = new Map(Object.entries(data.genes));
    this.drugs = new Map(Object.entries(data.drugs));
    this.diagnoses = new Map(Object.entries(data.diagnoses));

    for (const [symbol, entry] of this.genes) {
      for (const alias of entry.aliases ?? []) {
        const key = alias.toUpperCase();
        if (!this.aliases.has(key) && !this.genes.has(key)) {
          this.aliases.set(key, symbol);
        }
      }
    }
    this.drugKeys = [...this.drugs.keys()];
    this.diagnosisKeys = [...this.diagnoses.keys()];
  }

  readonly lookupGene = (symbol: string): GeneCode | null => {
    const upper = symbol.trim().toUpperCase().split("::")[0].trim();
    if (upper === "") return null;
    const canonical = this.genes.has(upper) ? upper : this.aliases.get(upper);
    if (canonical === undefined) return null;

    const entry = this.genes.get(canonical);
    if (entry === undefined) return null;
    return {
      system: "HGNC",
      symbol: canonical,
      code: entry.code,
      display: entry.name,
      chromosome: entry.chromosome ?? null,
      actionable: entry.actionable,
    };
  };

  readonly isKnownGene = (symbol: string): boolean => this.genes.has(symbol.trim().toUpperCase());

  readonly lookupDrug = (name: string): DrugCode | null => {
    const lower = collapseWhitespace(name.toLowerCase());
    if (lower === "") return null;
    const key = this.drugs.has(lower)
      ? lower
      : closestMatch(lower, this.drugKeys, this.options.drugCutoff);
    const entry = key === null ? undefined : this.drugs.get(key);
    return key === null || entry === undefined ? null : toDrugCode(key, entry);
  };

  readonly lookupDiagnosis = (text: string): DiagnosisCode | null => {
    const lower = collapseWhitespace(text.toLowerCase());
    if (lower === "") return null;

    const key =
      (this.diagnoses.has(lower) ? lower : null) ??
      this.longestContainedKey(lower) ??
      this.firstContainingKey(lower) ??
      closestMatch(lower, this.diagnosisKeys, this.options.diagnosisCutoff);
    const entry = key === null ? undefined : this.diagnoses.get(key);
    if (entry === undefined) return null;

    return {
      system: "ICD-O-3",
      code: entry.code,
      display: entry.display,
      topography: entry.topography ?? null,
    };
  };

  readonly drugNames = (): ReadonlyArray<string> =>
    [...this.drugKeys].sort((a, b) => b.length - a.length || a.localeCompare(b));

  readonly drugsByTarget = (gene: string): ReadonlyArray<DrugCode> => {
    const upper = gene.trim().toUpperCase();
    return [...this.drugs]
      .filter(([, entry]) => entry.targets.some((t) => t.toUpperCase() === upper))
      .map(([key, entry]) => toDrugCode(key, entry));
  };

  private longestContainedKey(text: string): string | null {
    let best: string | null = null;
    for (const key of this.diagnosisKeys) {
      if (text.includes(key) && (best === null || key.length > best.length)) {
        best = key;
      }
    }
    return best;
  }

  private firstContainingKey(text: string): string | null {
    // Very short fragments would match almost any key.
    if (text.length < 4) return null;
    return this.diagnosisKeys.find((key) => key.includes(text)) ?? null;
  }
}

// ============================================================================
// LAYERS
// ============================================================================

/**
 * Build the service from in-memory tables
 */
export const makeVocabularyService = (
  data: VocabularyData,
  options: Partial<MatchingOptions> = {}
): VocabularyService =>
  new VocabularyServiceImpl(data, { ...defaultMatchingOptions, ...options });

export const VocabularyServiceFromData = (
  data: VocabularyData,
  options: Partial<MatchingOptions> = {}
): Layer.Layer<VocabularyService> =>
  Layer.succeed(VocabularyService, makeVocabularyService(data, options));

const readJsonFile = (file: string): Effect.Effect<unknown, VocabularyLoadError, never> =>
  Effect.try({
    try: () => JSON.parse(readFileSync(file, "utf-8")),
    catch: (error) =>
      new VocabularyLoadError({
        message: `Cannot read vocabulary file: ${error instanceof Error ? error.message : String(error)}`,
        file,
      }),
  });

const loadVocabularyFile = <A, I>(
  dir: string,
  fileName: string,
  schema: S.Schema<A, I>
): Effect.Effect<A, VocabularyLoadError, never> => {
  const file = join(dir, fileName);
  return readJsonFile(file).pipe(
    Effect.flatMap((json) =>
      S.decodeUnknown(schema)(json).pipe(
        Effect.mapError(
          (error) =>
            new VocabularyLoadError({
              message: `Vocabulary file does not match its schema: ${error.message}`,
              file,
            })
        )
      )
    )
  );
};

/**
 * Load hgnc_genes.json, rxnorm_drugs.json and icd_o_diagnoses.json
 */
export const loadVocabularyData = (
  dir: string
): Effect.Effect<VocabularyData, VocabularyLoadError, never> => {
  return Effect.gen(function* (_) {
    const genes = yield* _(loadVocabularyFile(dir, "hgnc_genes.json", GeneVocabularyFileSchema));
    const drugs = yield* _(loadVocabularyFile(dir, "rxnorm_drugs.json", DrugVocabularyFileSchema));
    const diagnoses = yield* _(
      loadVocabularyFile(dir, "icd_o_diagnoses.json", DiagnosisVocabularyFileSchema)
    );

    yield* _(
      Effect.logInfo("vocabularies loaded").pipe(
        Effect.annotateLogs({
          genes: Object.keys(genes.genes).length,
          drugs: Object.keys(drugs.drugs).length,
          diagnoses: Object.keys(diagnoses.diagnoses).length,
          hgncVersion: genes.metadata.version,
          rxnormVersion: drugs.metadata.version,
          icdoVersion: diagnoses.metadata.version,
        })
      )
    );

    return { genes: genes.genes, drugs: drugs.drugs, diagnoses: diagnoses.diagnoses };
  });
};

/**
 * Live layer reading the JSON vocabularies from config.vocabularyDir
 */
export const VocabularyServiceLive = (
  config: Pick<ParserConfig, "vocabularyDir" | "diagnosisCutoff" | "drugCutoff">
): Layer.Layer<VocabularyService, VocabularyLoadError> =>
  Layer.effect(
    VocabularyService,
    loadVocabularyData(config.vocabularyDir).pipe(
      Effect.map((data) =>
        makeVocabularyService(data, {
          diagnosisCutoff: config.diagnosisCutoff,
          drugCutoff: config.drugCutoff,
        })
      )
    )
  );
