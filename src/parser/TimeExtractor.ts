/**
 * TallyScan – Time extraction
 *
 * Every HH:MM on the region is a sale timestamp. A degree sign is a common
 * misread of the colon, and a leading "1" is often read as "7" or "9"
 * ("75:10" for "15:10"). Out-of-range times are kept and flagged so a human
 * can review them.
 */

import type { TimeCandidate } from "../schema/TransactionRecord";
import type { PatternRule } from "./primitives";
import { applyRule, pad2 } from "./primitives";

export const ATTENTION_SUFFIX = " (ATTENTION)";

export interface TimeExtractorOptions {
  /** Read a leading 7/9 of an impossible hour as 1 (default true) */
  correctConfusableDigits?: boolean;
}

export class TimeExtractor {
  private readonly rule: PatternRule<TimeCandidate>;

  constructor(options: TimeExtractorOptions = {}) {
    const correct = options.correctConfusableDigits ?? true;

    this.rule = {
      name: "clock",
      pattern: /\b(\d{1,2})[:°](\d{2})\b/g,
      build: (m, offset, line) => {
        let hour = m[1];
        const minute = m[2];
        let corrected = false;

        if (correct && Number(hour) >= 24 && /^[79]/.test(hour)) {
          hour = `1${hour.slice(1)}`;
          corrected = true;
        }

        const flagged = Number(hour) >= 24 || Number(minute) >= 60;
        const clock = `${pad2(hour)}:${minute}`;
        return {
          kind: "time",
          value: flagged ? `${clock}${ATTENTION_SUFFIX}` : clock,
          position: line,
          offset,
          rule: "clock",
          flagged,
          corrected,
        };
      },
    };
  }

  /** Every time on the text, in order of appearance */
  candidates(text: string): TimeCandidate[] {
    if (!text) return [];
    return applyRule(this.rule, text);
  }

  /** Time values only */
  extract(text: string): string[] {
    return this.candidates(text).map((c) => c.value);
  }
}
