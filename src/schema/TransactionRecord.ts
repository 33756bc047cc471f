/**
 * TallyScan – Canonical data model
 *
 * Every stage of the pipeline produces one of these shapes; nothing is
 * mutated after creation – later stages only filter or combine.
 */

/** Placeholder written wherever a field could not be determined */
export const NOT_FOUND = "not-found" as const;
export type NotFound = typeof NOT_FOUND;

// ─── Images ─────────────────────────────────────────────────────────────────

/** An encoded image file (PNG, JPEG, WebP, TIFF …) held in memory */
export interface EncodedRegionImage {
  kind: "encoded";
  data: Buffer;
  /** Identifies the originating screenshot/quadrant, e.g. "credito (3)_quadrante_02" */
  reference: string;
}

/** Decoded, row-major pixels */
export interface RawRegionImage {
  kind: "raw";
  pixels: Uint8Array;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
  reference: string;
}

export type RegionImage = EncodedRegionImage | RawRegionImage;

/** Single-channel, binarised, row-major buffer ready for recognition */
export interface PreparedImage {
  data: Buffer;
  width: number;
  height: number;
}

// ─── OCR ────────────────────────────────────────────────────────────────────

export interface OcrCandidate {
  sourceText: string;
  /** Provider-reported confidence, 0–100. Recorded, never blended. */
  confidence: number;
  /** "<variant id>/<profile id>" */
  strategyId: string;
}

export interface MergedText {
  text: string;
  estimatedConfidence: number;
  /** Strategy ids whose output survived deduplication, in join order */
  strategies: string[];
}

// ─── Field candidates ───────────────────────────────────────────────────────

export type FieldKind = "date" | "time" | "amount";

interface BaseCandidate {
  value: string;
  /** 0-based line index inside the merged text */
  position: number;
  /** Character offset inside the merged text */
  offset: number;
  /** Name of the pattern rule that produced the candidate */
  rule: string;
}

export interface DateCandidate extends BaseCandidate {
  kind: "date";
}

export interface TimeCandidate extends BaseCandidate {
  kind: "time";
  /** Hour/minute out of range – value carries the "(ATTENTION)" suffix */
  flagged: boolean;
  /** A leading 7/9 was read as 1 */
  corrected: boolean;
}

export interface AmountCandidate extends BaseCandidate {
  kind: "amount";
  amount: number;
}

export type FieldCandidate = DateCandidate | TimeCandidate | AmountCandidate;

// ─── Records ────────────────────────────────────────────────────────────────

export type PaymentMethod = "credit" | "debit" | "pix" | NotFound;

export interface TransactionRecord {
  /** DD/MM/YYYY */
  date: string;
  /** HH:MM, possibly suffixed with " (ATTENTION)" */
  time: string;
  amount: number | NotFound;
  paymentMethod: PaymentMethod;
  reference: string;
}

export type RegionStatus = "ok" | "empty" | "failed";

export interface RegionResult {
  reference: string;
  status: RegionStatus;
  mergedText: MergedText;
  records: TransactionRecord[];
  error?: string;
}

export interface DayInput {
  /** Day folder / screenshot name */
  label: string;
  /** Header region first, transaction regions after */
  regions: RegionImage[];
}

export interface DayResult {
  label: string;
  date: string;
  records: TransactionRecord[];
  regions: {
    total: number;
    processed: number;
    empty: number;
    failed: number;
  };
}

export interface BatchResult {
  days: DayResult[];
  records: TransactionRecord[];
  summary: {
    days: number;
    regions: number;
    records: number;
    skipped: number;
  };
}
