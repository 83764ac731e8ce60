/**
 * PARSER CONFIGURATION LOADER
 *
 * Reads MTB_PARSER_* environment variables over defaultParserConfig and
 * validates the merged result against ParserConfigSchema.
 */

import { Effect, Schema as S } from "effect";
import {
  ParserConfigSchema,
  defaultParserConfig,
  type ParserConfig,
} from "../schemas/parserConfig";
import { ConfigError } from "./errors";

type EnvSource = Readonly<Record<string, string | undefined>>;

export const ENV_KEYS = {
  vocabularyDir: "MTB_PARSER_VOCAB_DIR",
  diagnosisCutoff: "MTB_PARSER_DIAGNOSIS_CUTOFF",
  drugCutoff: "MTB_PARSER_DRUG_CUTOFF",
  vafWindow: "MTB_PARSER_VAF_WINDOW",
  tmbHighThreshold: "MTB_PARSER_TMB_HIGH",
  logLevel: "MTB_PARSER_LOG_LEVEL",
} as const satisfies Record<keyof ParserConfig, string>;

const CONFIG_FIELDS: ReadonlyArray<keyof ParserConfig> = [
  "vocabularyDir",
  "diagnosisCutoff",
  "drugCutoff",
  "vafWindow",
  "tmbHighThreshold",
  "logLevel",
];

const NUMERIC_FIELDS: ReadonlySet<keyof ParserConfig> = new Set<keyof ParserConfig>([
  "diagnosisCutoff",
  "drugCutoff",
  "vafWindow",
  "tmbHighThreshold",
]);

/**
 * Apply per-call overrides on top of a base configuration
 */
export const mergeParserConfig = (
  overrides: Partial<ParserConfig> = {},
  base: ParserConfig = defaultParserConfig
): ParserConfig => ({ ...base, ...overrides });

/**
 * Load configuration from the environment
 *
 * Unset or blank variables keep the base value.
 */
export const loadParserConfig = (
  env: EnvSource = process.env,
  base: ParserConfig = defaultParserConfig
): Effect.Effect<ParserConfig, ConfigError, never> => {
  return Effect.gen(function* (_) {
    const overrides: Record<string, unknown> = {};

    for (const field of CONFIG_FIELDS) {
      const key = ENV_KEYS[field];
      const raw = env[key]?.trim();
      if (raw === undefined || raw === "") continue;

      if (NUMERIC_FIELDS.has(field)) {
        const value = Number(raw);
        if (!Number.isFinite(value)) {
          return yield* _(
            Effect.fail(new ConfigError({ message: `${key} must be a number`, key, value: raw }))
          );
        }
        overrides[field] = value;
      } else if (field === "logLevel") {
        overrides[field] = raw.toLowerCase();
      } else {
        overrides[field] = raw;
      }
    }

    const config = yield* _(
      S.decodeUnknown(ParserConfigSchema)({ ...base, ...overrides }).pipe(
        Effect.mapError(
          (error) =>
            new ConfigError({ message: `Invalid parser configuration: ${error.message}` })
        )
      )
    );

    yield* _(
      Effect.logDebug("parser configuration loaded").pipe(
        Effect.annotateLogs({ overrides: Object.keys(overrides).length })
      )
    );

    return config;
  });
};
