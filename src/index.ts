/**
 * TallyScan - Sale records from card-machine and PIX statement screenshots
 *
 * Multi-strategy OCR over preprocessed screenshot regions, followed by
 * layered pattern heuristics that pair amounts with sale times.
 *
 * @packageDocumentation
 */

// ─── Primary API ──────────────────────────────────────────────────────────────
export { TallyScan, validateBatch } from "./core";
export type { TallyScanOptions } from "./core";

// Schema / types
export { NOT_FOUND } from "./schema/TransactionRecord";
export type {
  AmountCandidate,
  BatchResult,
  DateCandidate,
  DayInput,
  DayResult,
  EncodedRegionImage,
  FieldCandidate,
  FieldKind,
  MergedText,
  NotFound,
  OcrCandidate,
  PaymentMethod,
  PreparedImage,
  RawRegionImage,
  RegionImage,
  RegionResult,
  RegionStatus,
  TimeCandidate,
  TransactionRecord,
} from "./schema/TransactionRecord";

// Pipeline stages
export {
  ConfidenceEngine,
  DayProcessor,
  RegionPipeline,
  TransactionAssociator,
  inferPaymentMethod,
} from "./core";
export type { AssociationInput, RegionPipelineDeps } from "./core";
export { ImagePreprocessor } from "./image/ImagePreprocessor";
export { adaptiveThreshold } from "./image/adaptiveThreshold";

// OCR layer
export {
  DEFAULT_PROFILES,
  DEFAULT_VARIANTS,
  OCREnsemble,
  OCRError,
  TesseractOCR,
  mergeCandidates,
} from "./ocr";
export type {
  GeometricVariant,
  OCREnsembleOptions,
  OCRProfile,
  OCRProvider,
  OCRResult,
  TesseractOCROptions,
  VariantRenderer,
} from "./ocr";

// Parser layer
export {
  AmountExtractor,
  DateExtractor,
  TimeExtractor,
  normaliseOCRText,
} from "./parser";

// Configuration, validation & errors
export {
  DEFAULT_CONFIG,
  ImageLoadError,
  TallyScanError,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./core";
export type {
  TallyScanConfig,
  TallyScanConfigInput,
  TallyScanErrorCode,
  ValidationResult,
} from "./core";

// Sinks
export { MemoryRecordSink, RECORD_COLUMNS, toDelimitedRows } from "./sink/RecordSink";
export type { RecordSink, SinkContext } from "./sink/RecordSink";

// Logger
export { createLogger, silentLogger } from "./utils/logger";
export type { LogLevel, TallyScanLogger } from "./utils/logger";
