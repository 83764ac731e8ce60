/**
 * SERVICE-LEVEL ERROR SYSTEM (Effect-TS)
 *
 * Errors are values, not exceptions. Composable, type-safe, structured.
 *
 * Extraction itself never fails: missing or unmapped data becomes a quality
 * warning. The errors below only occur while the parser is being set up.
 */

import { Data } from "effect";

/**
 * VOCABULARY LOAD ERROR - A vocabulary file is missing, unreadable or malformed
 *
 * Used by vocabulary.effect.ts when building the live layer
 */
export class VocabularyLoadError extends Data.TaggedError("VocabularyLoadError")<{
  readonly message: string;
  readonly file?: string;
  readonly context?: Record<string, unknown>;
}> {
  get recoverable(): boolean {
    return false; // Cannot gate genes without a vocabulary
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      file: this.file,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * CONFIG ERROR - An MTB_PARSER_* setting is out of range or not a number
 *
 * Used by config.ts when decoding environment overrides
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly key?: string;
  readonly value?: string;
}> {
  get recoverable(): boolean {
    return true; // Caller may fall back to defaultParserConfig
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      key: this.key,
      value: this.value,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Union of all service errors
 */
export type ServiceError = VocabularyLoadError | ConfigError;
