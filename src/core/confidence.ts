/**
 * TallyScan – Confidence estimation
 *
 * Scores a merge by how many distinct non-empty readings it holds.
 * Provider-reported confidence is not blended in.
 */

// ─── Constants ───────────────────────────────────────────────────────────────

const BASE = 30;
const PER_TEXT = 10;
const CEILING = 90;

// ─── Confidence Engine ────────────────────────────────────────────────────────

export class ConfidenceEngine {
  /**
   * Estimated confidence (0–90) for a merge of `distinctTexts` readings.
   * Zero readings → 0; otherwise 30 + 10 per reading, capped at 90.
   */
  estimate(distinctTexts: number): number {
    if (!Number.isFinite(distinctTexts) || distinctTexts <= 0) return 0;
    return Math.min(CEILING, BASE + PER_TEXT * Math.floor(distinctTexts));
  }
}
