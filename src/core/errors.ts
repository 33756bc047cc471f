/**
 * TallyScan – Typed errors
 *
 * Only I/O-level failures and invalid input are exceptional. Parsing
 * ambiguity is expressed through data (the "not-found" sentinel and the
 * "(ATTENTION)" suffix) and never reaches this module.
 */

export type TallyScanErrorCode =
  | "INVALID_INPUT"
  | "INVALID_CONFIG"
  | "IMAGE_LOAD_FAILED"
  | "OCR_FAILED";

export class TallyScanError extends Error {
  constructor(
    message: string,
    public readonly code: TallyScanErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "TallyScanError";
  }
}

/** The region's bytes could not be decoded into pixels */
export class ImageLoadError extends TallyScanError {
  constructor(
    message: string,
    public readonly reference: string,
    cause?: unknown,
  ) {
    super(`${message} (${reference})`, "IMAGE_LOAD_FAILED", cause);
    this.name = "ImageLoadError";
  }
}
