/**
 * TallyScan – Configuration
 *
 * One explicit object, resolved once by the driver and handed to every
 * component. Nothing here reads the environment or probes the file system.
 */

import type { GeometricVariant, OCRProfile } from "../ocr/profiles";
import { DEFAULT_PROFILES, DEFAULT_VARIANTS } from "../ocr/profiles";
import { TallyScanError } from "./errors";

// ─── Shape ────────────────────────────────────────────────────────────────────

export interface PreprocessConfig {
  /** Images wider than this are downscaled (aspect ratio kept) */
  maxWidth: number;
  /** 3×3 median filter before equalisation */
  denoise: boolean;
  clahe: {
    /** Tile grid size along each axis */
    tiles: number;
    /** Contrast limit, integer 0–100 */
    maxSlope: number;
  };
  threshold: {
    /** Odd neighbourhood size for the Gaussian mean */
    blockSize: number;
    /** Constant subtracted from the mean */
    c: number;
  };
}

export interface OCRConfig {
  profiles: OCRProfile[];
  variants: GeometricVariant[];
  /** Upper bound for a single recognition call */
  timeoutMs: number;
  /** Recognition calls in flight per region */
  concurrency: number;
}

export interface ParsingConfig {
  /** Read a leading 7/9 of an impossible hour as 1 */
  correctConfusableDigits: boolean;
  /** Amounts below this become "not-found" */
  minimumAmount: number;
}

export interface HourRange {
  from: number;
  to: number;
}

export interface AssociationConfig {
  /** Maximum line distance between an amount and its time */
  window: number;
  /** Inclusive hour-of-day range for orphan times */
  validHours: HourRange;
  /** Merge candidates with equal values that the ensemble repeated */
  collapseRepeats: boolean;
}

export interface TallyScanConfig {
  preprocess: PreprocessConfig;
  ocr: OCRConfig;
  parsing: ParsingConfig;
  association: AssociationConfig;
  debug: boolean;
}

export type TallyScanConfigInput = {
  preprocess?: Partial<Omit<PreprocessConfig, "clahe" | "threshold">> & {
    clahe?: Partial<PreprocessConfig["clahe"]>;
    threshold?: Partial<PreprocessConfig["threshold"]>;
  };
  ocr?: Partial<OCRConfig>;
  parsing?: Partial<ParsingConfig>;
  association?: Partial<Omit<AssociationConfig, "validHours">> & {
    validHours?: Partial<HourRange>;
  };
  debug?: boolean;
};

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: TallyScanConfig = {
  preprocess: {
    maxWidth: 2000,
    denoise: true,
    clahe: { tiles: 8, maxSlope: 2 },
    threshold: { blockSize: 11, c: 2 },
  },
  ocr: {
    profiles: DEFAULT_PROFILES,
    variants: DEFAULT_VARIANTS,
    timeoutMs: 30_000,
    concurrency: 1,
  },
  parsing: {
    correctConfusableDigits: true,
    minimumAmount: 1.0,
  },
  association: {
    window: 3,
    validHours: { from: 0, to: 23 },
    collapseRepeats: true,
  },
  debug: false,
};

export function resolveConfig(input: TallyScanConfigInput = {}): TallyScanConfig {
  const d = DEFAULT_CONFIG;
  return {
    preprocess: {
      maxWidth: input.preprocess?.maxWidth ?? d.preprocess.maxWidth,
      denoise: input.preprocess?.denoise ?? d.preprocess.denoise,
      clahe: { ...d.preprocess.clahe, ...input.preprocess?.clahe },
      threshold: { ...d.preprocess.threshold, ...input.preprocess?.threshold },
    },
    ocr: {
      profiles: input.ocr?.profiles ?? d.ocr.profiles,
      variants: input.ocr?.variants ?? d.ocr.variants,
      timeoutMs: input.ocr?.timeoutMs ?? d.ocr.timeoutMs,
      concurrency: input.ocr?.concurrency ?? d.ocr.concurrency,
    },
    parsing: { ...d.parsing, ...input.parsing },
    association: {
      window: input.association?.window ?? d.association.window,
      validHours: {
        ...d.association.validHours,
        ...input.association?.validHours,
      },
      collapseRepeats:
        input.association?.collapseRepeats ?? d.association.collapseRepeats,
    },
    debug: input.debug ?? d.debug,
  };
}

// ─── Validation ───────────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function isPositiveInt(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

export function validateConfig(config: TallyScanConfig): ValidationResult {
  const errors: string[] = [];
  const { preprocess, ocr, parsing, association } = config;

  if (!isPositiveInt(preprocess.maxWidth)) {
    errors.push("`preprocess.maxWidth` must be a positive integer.");
  }
  if (!isPositiveInt(preprocess.clahe.tiles)) {
    errors.push("`preprocess.clahe.tiles` must be a positive integer.");
  }
  if (
    !Number.isInteger(preprocess.clahe.maxSlope) ||
    preprocess.clahe.maxSlope < 0 ||
    preprocess.clahe.maxSlope > 100
  ) {
    errors.push("`preprocess.clahe.maxSlope` must be an integer between 0 and 100.");
  }
  const { blockSize } = preprocess.threshold;
  if (!Number.isInteger(blockSize) || blockSize < 3 || blockSize % 2 === 0) {
    errors.push("`preprocess.threshold.blockSize` must be an odd integer ≥ 3.");
  }
  if (!Number.isFinite(preprocess.threshold.c)) {
    errors.push("`preprocess.threshold.c` must be a finite number.");
  }

  if (ocr.profiles.length === 0) {
    errors.push("`ocr.profiles` must contain at least one profile.");
  }
  if (ocr.variants.length === 0) {
    errors.push("`ocr.variants` must contain at least one variant.");
  }
  const seen = new Set<string>();
  for (const id of [
    ...ocr.profiles.map((p) => `profile:${p.id}`),
    ...ocr.variants.map((v) => `variant:${v.id}`),
  ]) {
    if (seen.has(id)) errors.push(`Duplicate ${id.replace(":", " id ")}.`);
    seen.add(id);
  }
  for (const v of ocr.variants) {
    if (v.kind === "scale" && !(v.factor > 0)) {
      errors.push(`Variant '${v.id}' needs a positive scale factor.`);
    }
    if (v.kind === "crop") {
      const { left, top, width, height } = v.box;
      const inRange = [left, top, width, height].every((n) => n >= 0 && n <= 1);
      const overflows = left + width > 1 + 1e-9 || top + height > 1 + 1e-9;
      if (!inRange || width === 0 || height === 0 || overflows) {
        errors.push(`Variant '${v.id}' has a crop box outside the unit square.`);
      }
    }
  }
  if (!isPositiveInt(ocr.timeoutMs)) {
    errors.push("`ocr.timeoutMs` must be a positive integer.");
  }
  if (!isPositiveInt(ocr.concurrency)) {
    errors.push("`ocr.concurrency` must be a positive integer.");
  }

  if (!Number.isFinite(parsing.minimumAmount) || parsing.minimumAmount < 0) {
    errors.push("`parsing.minimumAmount` must be a non-negative number.");
  }

  if (!Number.isInteger(association.window) || association.window < 0) {
    errors.push("`association.window` must be a non-negative integer.");
  }
  const { from, to } = association.validHours;
  if (
    !Number.isInteger(from) ||
    !Number.isInteger(to) ||
    from < 0 ||
    to > 23 ||
    from > to
  ) {
    errors.push("`association.validHours` must satisfy 0 ≤ from ≤ to ≤ 23.");
  }

  return { valid: errors.length === 0, errors };
}

/** Resolve + validate in one go; throws on invalid input */
export function loadConfig(input: TallyScanConfigInput = {}): TallyScanConfig {
  const config = resolveConfig(input);
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new TallyScanError(
      `Invalid configuration: ${validation.errors.join("; ")}`,
      "INVALID_CONFIG",
    );
  }
  return config;
}
