export { OCREnsemble, mergeCandidates } from "./OCREnsemble";
export type { OCREnsembleOptions, VariantRenderer } from "./OCREnsemble";
export { TesseractOCR } from "./TesseractOCR";
export type { TesseractOCROptions } from "./TesseractOCR";
export type { OCRProvider, OCRResult } from "./OCRProvider";
export { OCRError } from "./OCRProvider";
export { DEFAULT_PROFILES, DEFAULT_VARIANTS, strategyId } from "./profiles";
export type {
  CropBox,
  EngineMode,
  GeometricVariant,
  OCRProfile,
  PageSegMode,
} from "./profiles";
