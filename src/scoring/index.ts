/**
 * Progress scoring
 */

export {
  FactMapSchema,
  FactUpdateSchema,
  FactValueSchema,
  factText,
  factValuesEqual,
  isEmptyFactValue,
  mergeFacts,
  stringifyFactValue,
  type FactMap,
  type FactUpdate,
  type FactValue,
} from "./facts.js";

export {
  INFORMATION_CATEGORIES,
  FieldRuleSchema,
  InformationSchemaSchema,
  findFieldRule,
  getInformationSchema,
  loadInformationSchema,
  type FieldRule,
  type InformationCategory,
  type InformationCategoryName,
  type InformationSchema,
  type SignalFamily,
} from "./schema.js";

export { scoreField } from "./field-score.js";
export { detectComprehensiveInfo, type ComprehensiveDetection } from "./comprehensive.js";

export {
  calculateProgress,
  findInformationGaps,
  normalizeProgress,
  smoothProgress,
  MAX_JUMP,
  MAX_JUMP_NEAR_COMPLETION,
  type CategoryScore,
  type InformationGap,
  type ProgressOptions,
  type ProgressResult,
} from "./scorer.js";
