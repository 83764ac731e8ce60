/**
 * EFFECT RUNTIME - CENTRALIZED RUNTIME CONFIGURATION
 *
 * Provides a unified runtime for Effect-TS programs with:
 * - Structured JSON logging routed through appLogger
 * - Result-typed helpers for sync and async execution
 * - ServiceError helpers
 */

import { Effect, FiberRef, FiberRefs, HashMap, Layer, Logger, LogLevel } from "effect";
import type { LogLevel as AppLogLevel } from "../schemas/parserConfig";
import { appLogger } from "./appLogger";
import type { ServiceError } from "./errors";

// ============================================================================
// RUNTIME CONFIGURATION
// ============================================================================

const renderMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

/**
 * Minimum level for Effect logs on the current fiber; null defers to
 * appLogger's process-wide level
 */
const CurrentLogLevel = FiberRef.unsafeMake<AppLogLevel | null>(null);

const toAppLevel = (level: LogLevel.LogLevel): AppLogLevel => {
  switch (level.label) {
    case "FATAL":
    case "ERROR":
      return "error";
    case "WARN":
      return "warn";
    case "INFO":
      return "info";
    default:
      return "debug";
  }
};

/**
 * Effect logger backed by appLogger
 *
 * Annotations become top-level JSON fields; appLogger applies level
 * filtering and redaction.
 */
const AppLogger = Logger.make(({ logLevel, message, annotations, context }) => {
  const metadata: Record<string, unknown> = Object.fromEntries(HashMap.toEntries(annotations));
  const minimum = FiberRefs.getOrDefault(context, CurrentLogLevel) ?? undefined;
  appLogger.log(toAppLevel(logLevel), renderMessage(message), metadata, minimum);
});

/**
 * Log level for everything run under this layer, leaving the
 * process-wide appLogger level untouched
 */
const withLogLevel = (level: AppLogLevel): Layer.Layer<never> =>
  Layer.locallyScoped(CurrentLogLevel, level);

/**
 * Base runtime layer with logging
 *
 * Effect's own minimum level is opened up; appLogger decides what is emitted.
 */
const AppLayer = Layer.merge(
  Logger.replace(Logger.defaultLogger, AppLogger),
  Logger.minimumLogLevel(LogLevel.All)
);

// ============================================================================
// RUNTIME HELPERS
// ============================================================================

/**
 * Run Effect as Promise with error handling
 *
 * @example
 * const result = await runPromise(loadParserConfig(process.env));
 * if (result.success) {
 *   console.log(result.data.vafWindow);
 * }
 */
export const runPromise = <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<{ success: true; data: A } | { success: false; error: E }> => {
  return Effect.runPromise(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) =>
        Effect.succeed({ success: false as const, error })
      )
    )
  );
};

/**
 * Run Effect synchronously (for pure computations)
 *
 * CAUTION: Will throw if Effect fails
 *
 * @example
 * const report = runSync(parseReport(text).pipe(Effect.provide(vocabularyLayer)));
 */
export const runSync = <A>(
  effect: Effect.Effect<A, never, never>
): A => {
  return Effect.runSync(effect.pipe(Effect.provide(AppLayer)));
};

/**
 * Run Effect with Result type (no exceptions)
 *
 * Safer alternative to runSync for synchronous operations
 *
 * @example
 * const result = runSyncResult(loadParserConfig(process.env));
 * if (!result.success) {
 *   console.error(serializeError(result.error));
 * }
 */
export const runSyncResult = <A, E>(
  effect: Effect.Effect<A, E, never>
): { success: true; data: A } | { success: false; error: E } => {
  return Effect.runSync(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) =>
        Effect.succeed({ success: false as const, error })
      )
    )
  );
};

// ============================================================================
// SERVICE ERROR HELPERS
// ============================================================================

/**
 * Check if error is recoverable
 */
export const isRecoverable = (error: ServiceError): boolean => {
  return error.recoverable;
};

/**
 * Convert ServiceError to JSON for logging
 */
export const serializeError = (error: ServiceError): Record<string, unknown> => {
  return error.toJSON();
};

// ============================================================================
// EXPORTS
// ============================================================================

export { AppLayer, AppLogger, withLogLevel };
