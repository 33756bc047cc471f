/**
 * TallyScan – Recognition provider contract
 *
 * The ensemble talks to recognition engines only through `OCRProvider`.
 * Tesseract.js is the bundled implementation; tests use in-process stubs.
 */

import { TallyScanError } from "../core/errors";
import type { OCRProfile } from "./profiles";

export interface OCRResult {
  /** Raw text as the engine returned it (not trimmed) */
  text: string;
  /** Engine-reported mean confidence, 0–100; 0 when the engine has none */
  confidence: number;
  provider: string;
}

export interface OCRProvider {
  readonly name: string;

  /**
   * Read one encoded (PNG) image with one profile. The same buffer is handed
   * to every profile of a region and must come back unmodified. Failures
   * reject with OCRError.
   */
  recognize(image: Buffer, profile: OCRProfile): Promise<OCRResult>;

  isAvailable(): Promise<boolean>;

  /**
   * Calls whose profiles share a key run one at a time inside the provider
   * (one engine worker). Absent when every call can start immediately.
   */
  workerKey?(profile: OCRProfile): string;

  /** Shut down workers held by the provider */
  terminate?(): Promise<void>;
}

/** Recognition failure, tagged with the provider that raised it */
export class OCRError extends TallyScanError {
  constructor(
    message: string,
    public readonly provider: string,
    cause?: unknown,
  ) {
    super(`[${provider}] ${message}`, "OCR_FAILED", cause);
    this.name = "OCRError";
  }
}
