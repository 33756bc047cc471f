/**
 * TallyScan – Recognition profiles and geometric variants
 *
 * The ensemble runs every profile over every variant. Declared order is
 * significant: it is the order in which surviving texts are joined.
 */

/** Tesseract page segmentation modes used by the ensemble */
export type PageSegMode = 3 | 4 | 6 | 7 | 8 | 11 | 13;

/** Tesseract engine modes */
export type EngineMode = 0 | 1 | 2 | 3;

export interface OCRProfile {
  id: string;
  pageSegMode: PageSegMode;
  engineMode: EngineMode;
  /** Tesseract language code ("por", "eng"); provider default when omitted */
  language?: string;
}

/** Fractions of the prepared image, all within [0, 1] */
export interface CropBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export type GeometricVariant =
  | { id: string; kind: "full" }
  | { id: string; kind: "crop"; box: CropBox }
  | { id: string; kind: "scale"; factor: number };

export const DEFAULT_PROFILES: OCRProfile[] = [
  { id: "psm6", pageSegMode: 6, engineMode: 3 },
  { id: "psm6-por", pageSegMode: 6, engineMode: 3, language: "por" },
  { id: "psm3", pageSegMode: 3, engineMode: 3 },
  { id: "psm4", pageSegMode: 4, engineMode: 3 },
  { id: "psm7", pageSegMode: 7, engineMode: 3 },
  { id: "psm8", pageSegMode: 8, engineMode: 3 },
  { id: "psm13", pageSegMode: 13, engineMode: 3 },
  { id: "oem1-psm6", pageSegMode: 6, engineMode: 1 },
];

const THIRD = 1 / 3;

export const DEFAULT_VARIANTS: GeometricVariant[] = [
  { id: "full", kind: "full" },
  { id: "top", kind: "crop", box: { left: 0, top: 0, width: 1, height: THIRD } },
  {
    id: "middle",
    kind: "crop",
    box: { left: 0, top: THIRD, width: 1, height: THIRD },
  },
  {
    id: "bottom",
    kind: "crop",
    box: { left: 0, top: 2 * THIRD, width: 1, height: 1 - 2 * THIRD },
  },
  { id: "left", kind: "crop", box: { left: 0, top: 0, width: 0.5, height: 1 } },
  { id: "right", kind: "crop", box: { left: 0.5, top: 0, width: 0.5, height: 1 } },
  { id: "scale-0.8", kind: "scale", factor: 0.8 },
  { id: "scale-1.2", kind: "scale", factor: 1.2 },
  { id: "scale-1.5", kind: "scale", factor: 1.5 },
];

export function strategyId(variant: GeometricVariant, profile: OCRProfile): string {
  return `${variant.id}/${profile.id}`;
}
