/**
 * PARSER CONFIGURATION SCHEMA
 *
 * Tunables for vocabulary matching, VAF enrichment and reporting.
 * Defaults can be overridden per call or from MTB_PARSER_* environment variables.
 */

import { fileURLToPath } from "node:url";
import { Schema as S } from "effect";

export const LogLevelSchema = S.Union(
  S.Literal("debug"),
  S.Literal("info"),
  S.Literal("warn"),
  S.Literal("error")
);
export type LogLevel = S.Schema.Type<typeof LogLevelSchema>;

export const ParserConfigSchema = S.Struct({
  // Vocabulary
  vocabularyDir: S.String.pipe(S.minLength(1)),
  diagnosisCutoff: S.Number.pipe(S.between(0, 1)), // fuzzy similarity threshold
  drugCutoff: S.Number.pipe(S.between(0, 1)),

  // Enrichment
  vafWindow: S.Int.pipe(S.positive()), // characters either side of the mutation token

  // Reporting
  tmbHighThreshold: S.Number.pipe(S.positive()), // mut/Mb
  logLevel: LogLevelSchema,
});
export type ParserConfig = S.Schema.Type<typeof ParserConfigSchema>;

export const DEFAULT_VOCABULARY_DIR = fileURLToPath(
  new URL("../data/vocabularies/", import.meta.url)
);

export const defaultParserConfig: ParserConfig = {
  vocabularyDir: DEFAULT_VOCABULARY_DIR,
  diagnosisCutoff: 0.6,
  drugCutoff: 0.8,
  vafWindow: 100,
  tmbHighThreshold: 10,
  logLevel: "info",
};
