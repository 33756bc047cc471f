export { TallyScan, validateBatch } from "./TallyScan";
export type { TallyScanOptions } from "./TallyScan";
export { DayProcessor } from "./DayProcessor";
export { RegionPipeline } from "./RegionPipeline";
export type { RegionPipelineDeps } from "./RegionPipeline";
export {
  TransactionAssociator,
  collapseRecords,
  inferPaymentMethod,
  sortRecords,
} from "./TransactionAssociator";
export type { AssociationInput, AssociatorConfig } from "./TransactionAssociator";
export { ConfidenceEngine } from "./confidence";
export {
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./config";
export type {
  AssociationConfig,
  HourRange,
  OCRConfig,
  ParsingConfig,
  PreprocessConfig,
  TallyScanConfig,
  TallyScanConfigInput,
  ValidationResult,
} from "./config";
export { ImageLoadError, TallyScanError } from "./errors";
export type { TallyScanErrorCode } from "./errors";
