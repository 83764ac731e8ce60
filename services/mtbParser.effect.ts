/**
 * MTB REPORT PARSER - EFFECT VERSION
 *
 * Runs the full pipeline over one report text:
 *
 *   extract -> dedupe -> enrich (VAF) -> assess -> assemble
 *
 * Architecture:
 * - Effect<ExtractionReport, never, VocabularyService>
 * - Extraction never fails; data-quality problems become warnings
 * - Stateless per call; the vocabulary is the only shared, read-only input
 * - The reference instant for age derivation is injectable, so repeated
 *   parses of the same text produce identical reports
 */

import { Effect, Layer } from "effect";
import type { ExtractionReport, ReportContent } from "../schemas/mtbReport";
import type { ParserConfig } from "../schemas/parserConfig";
import { mergeParserConfig } from "./config";
import { enrichVariantsWithVaf } from "./contextEnricher";
import {
  extractAllVariantCandidates,
  extractDiagnosis,
  extractNgsMethod,
  extractPatient,
  extractRecommendations,
  extractReportDate,
  extractTmb,
} from "./entityExtractor";
import type { VocabularyLoadError } from "./errors";
import { assessQuality } from "./qualityAssessor";
import { assembleReport } from "./reportAssembler";
import { AppLayer, withLogLevel } from "./runtime";
import { cleanReportText } from "./textMatching";
import { dedupeVariants } from "./variantDeduplicator";
import { VocabularyService, VocabularyServiceLive } from "./vocabulary.effect";

// ============================================================================
// OPTIONS
// ============================================================================

export interface ParseOptions {
  /** "Now" for deriving age from a birth date; defaults to the current instant */
  readonly referenceDate?: Date;
  readonly config?: Partial<ParserConfig>;
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Parse one MTB report into a frozen ExtractionReport
 */
export const parseReport = (
  text: string,
  options: ParseOptions = {}
): Effect.Effect<ExtractionReport, never, VocabularyService> => {
  return Effect.gen(function* (_) {
    const vocabulary = yield* _(VocabularyService);
    const config = mergeParserConfig(options.config);
    const referenceDate = options.referenceDate ?? new Date();
    const source = cleanReportText(text);

    const patient = extractPatient(source, referenceDate);
    const diagnosis = extractDiagnosis(source, vocabulary);

    const candidates = extractAllVariantCandidates(source, vocabulary);
    const unique = dedupeVariants(candidates);
    const variants = enrichVariantsWithVaf(unique, source, config.vafWindow);

    yield* _(
      Effect.logDebug("variants extracted").pipe(
        Effect.annotateLogs({
          candidates: candidates.length,
          kept: unique.length,
          enriched:
            variants.filter((v) => v.vaf !== null).length -
            unique.filter((v) => v.vaf !== null).length,
        })
      )
    );

    const content: ReportContent = {
      patient,
      diagnosis,
      variants,
      recommendations: extractRecommendations(source, vocabulary),
      tmb: extractTmb(source),
      ngsMethod: extractNgsMethod(source),
      reportDate: extractReportDate(source),
    };

    const quality = assessQuality(content);

    yield* _(
      Effect.logDebug("report assembled").pipe(
        Effect.annotateLogs({
          variants: quality.variantsFound,
          recommendations: quality.drugsIdentified,
          completenessPct: quality.completenessPct,
          warnings: quality.warnings.length,
        })
      )
    );

    return assembleReport(content, quality);
  }).pipe(Effect.withLogSpan("parseReport"));
};

/**
 * Parse independent reports concurrently; order of results matches input
 */
export const parseReports = (
  texts: ReadonlyArray<string>,
  options: ParseOptions = {}
): Effect.Effect<ReadonlyArray<ExtractionReport>, never, VocabularyService> =>
  Effect.forEach(texts, (text) => parseReport(text, options), { concurrency: "unbounded" });

// ============================================================================
// LAYERS & SYNC WRAPPERS
// ============================================================================

/**
 * Vocabulary from config.vocabularyDir plus logging at config.logLevel.
 * The level applies to effects run under this layer only.
 */
export const makeParserLayer = (
  config: ParserConfig
): Layer.Layer<VocabularyService, VocabularyLoadError> =>
  VocabularyServiceLive(config).pipe(
    Layer.provideMerge(
      Layer.merge(AppLayer, withLogLevel(config.logLevel))
    )
  );

/**
 * Sync wrapper for callers outside Effect
 */
export const parseReportSync = (
  text: string,
  vocabulary: VocabularyService,
  options: ParseOptions = {}
): ExtractionReport =>
  Effect.runSync(
    parseReport(text, options).pipe(
      Effect.provideService(VocabularyService, vocabulary),
      Effect.provide(AppLayer)
    )
  );
