/**
 * Translator Module - Public API
 *
 * Intents ↔ data point writes, raw state ↔ entity state.
 */

// Types
export type {
  ColorMode,
  DataPointWrite,
  EntityState,
  Intent,
  IntentInput,
  IntentType,
  ScaledChannel,
} from "./schema.js";
export type { TranslatorError } from "./errors.js";

// Schemas and constants
export {
  INACTIVE_SENTINEL,
  IntentSchema,
  MAX_KELVIN,
  MIN_KELVIN,
  WorkMode,
} from "./schema.js";

// Error utilities
export {
  formatTranslatorError,
  invalidIntent,
  unknownEntity,
  unsupportedIntent,
} from "./errors.js";

// Pure transformations
export {
  applyMask,
  deriveEntityState,
  findEntity,
  fromWire,
  intentToWrites,
  kelvinToMired,
  kelvinToWire,
  miredToKelvin,
  parseIntent,
  roundHalfUp,
  toWire,
  wireToKelvin,
} from "./transform.js";
