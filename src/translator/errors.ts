/**
 * Translator Module - Error Types
 *
 * Typed error unions for intent translation.
 * Errors are values, not exceptions.
 */
import type { DpidRole } from "../capabilities/index.js";

/**
 * Errors that can occur while translating an intent.
 */
export type TranslatorError =
  | {
      readonly type: "UNSUPPORTED_INTENT";
      readonly entityIndex: number;
      readonly intent: string;
      /** Role the entity would need to honour the intent */
      readonly missingRole: DpidRole;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_INTENT";
      readonly message: string;
      readonly issues: readonly string[];
    }
  | {
      readonly type: "UNKNOWN_ENTITY";
      readonly entityIndex: number;
      readonly entityCount: number;
      readonly message: string;
    };

/**
 * Create an UNSUPPORTED_INTENT error.
 */
export function unsupportedIntent(
  entityIndex: number,
  intent: string,
  missingRole: DpidRole,
): TranslatorError {
  return {
    type: "UNSUPPORTED_INTENT",
    entityIndex,
    intent,
    missingRole,
    message: `Entity ${entityIndex} has no ${missingRole} control`,
  };
}

/**
 * Create an INVALID_INTENT error.
 */
export function invalidIntent(issues: readonly string[]): TranslatorError {
  return {
    type: "INVALID_INTENT",
    message: `Invalid intent: ${issues.join("; ")}`,
    issues,
  };
}

/**
 * Create an UNKNOWN_ENTITY error.
 */
export function unknownEntity(
  entityIndex: number,
  entityCount: number,
): TranslatorError {
  return {
    type: "UNKNOWN_ENTITY",
    entityIndex,
    entityCount,
    message: `No entity at index ${entityIndex} (device has ${entityCount})`,
  };
}

/**
 * Format a TranslatorError for logging.
 */
export function formatTranslatorError(error: TranslatorError): string {
  switch (error.type) {
    case "UNSUPPORTED_INTENT":
      return `Unsupported intent "${error.intent}" on entity ${error.entityIndex}: missing ${error.missingRole}`;
    case "INVALID_INTENT":
      return error.message;
    case "UNKNOWN_ENTITY":
      return `Unknown entity: ${error.message}`;
  }
}
