/**
 * Cleanup module exports
 */

export {
  type RotationOptions,
  type RotationSummary,
  runRotation,
  type StorageRotationResult,
} from "./orchestrator";
export {
  ageInDays,
  classifyAge,
  isNoopPolicy,
  type RetentionSelection,
  type RetentionTier,
  selectFlat,
  selectForDeletion,
  selectTiered,
} from "./retention";
