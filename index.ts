export * from "./schemas";
export {
  parseReport,
  parseReports,
  parseReportSync,
  makeParserLayer,
  type ParseOptions,
} from "./services/mtbParser.effect";
export {
  VocabularyService,
  VocabularyServiceFromData,
  VocabularyServiceLive,
  loadVocabularyData,
  makeVocabularyService,
  type MatchingOptions,
} from "./services/vocabulary.effect";
export { loadParserConfig, mergeParserConfig, ENV_KEYS } from "./services/config";
export {
  extractPatient,
  extractDiagnosis,
  extractVariantCandidates,
  extractFusions,
  extractCnvs,
  extractExonAlterations,
  extractAllVariantCandidates,
  extractTmb,
  extractRecommendations,
  extractNgsMethod,
  extractReportDate,
} from "./services/entityExtractor";
export { dedupeVariants, variantIdentityKey } from "./services/variantDeduplicator";
export { enrichVariantsWithVaf, VAF_STRATEGIES, type VafStrategy } from "./services/contextEnricher";
export {
  normalizeClassification,
  normalizeSex,
  normalizeDate,
  normalizeGene,
  normalizeDrug,
  normalizeStage,
  normalizeDiagnosisText,
  deriveAge,
} from "./services/normalizer";
export { assessQuality, assessDetailedQuality, WARNINGS } from "./services/qualityAssessor";
export {
  assembleReport,
  actionableVariants,
  fusionVariants,
  hasHighTmb,
  summarizeReport,
} from "./services/reportAssembler";
export { VocabularyLoadError, ConfigError, type ServiceError } from "./services/errors";
export { appLogger, setLogLevel } from "./services/appLogger";
export { AppLayer, withLogLevel, runPromise, runSync, runSyncResult, serializeError, isRecoverable } from "./services/runtime";
