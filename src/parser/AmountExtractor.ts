/**
 * TallyScan – Amount extraction
 *
 * Tiered, most specific first; the first tier that yields anything wins.
 *
 *  1. currency-marker     R$ 16,37 · R$:7,73 · R$.1.234,56 · R$16 37
 *  2. bare-decimal-comma  16,37 without marker, time-like pairs rejected
 *  3. bare-decimal-dot    16.37 without marker, same rejection
 *  4. marker-fallback     R$ 22 – the rest of the line as a plain number
 *
 * Tiers 2–3 reject anything that could be a clock reading (integer 0–23
 * with fraction 0–59).
 */

import type { AmountCandidate, NotFound } from "../schema/TransactionRecord";
import { NOT_FOUND } from "../schema/TransactionRecord";
import type { PatternRule } from "./primitives";
import { firstMatchingRule, roundMoney } from "./primitives";

function amountCandidate(
  rule: string,
  amount: number,
  offset: number,
  line: number,
): AmountCandidate | null {
  if (!Number.isFinite(amount)) return null;
  const rounded = roundMoney(amount);
  return {
    kind: "amount",
    value: rounded.toFixed(2),
    amount: rounded,
    position: line,
    offset,
    rule,
  };
}

/** 16,37 could be 16:37 read with a comma */
export function looksLikeClock(integer: string, fraction: string): boolean {
  const h = Number(integer);
  const m = Number(fraction);
  return h >= 0 && h <= 23 && m >= 0 && m <= 59;
}

function bareDecimalRule(name: string, separator: "," | "."): PatternRule<AmountCandidate> {
  const sep = separator === "," ? "," : "\\.";
  return {
    name,
    // Not part of a longer number such as 1.234,56 or 29.09.2025
    pattern: new RegExp(`(?<![\\d.,])\\b(\\d{1,4})${sep}(\\d{2})\\b(?![.,]\\d)`, "g"),
    build: (m, offset, line) =>
      looksLikeClock(m[1], m[2])
        ? null
        : amountCandidate(name, Number(`${m[1]}.${m[2]}`), offset, line),
  };
}

export const AMOUNT_RULES: PatternRule<AmountCandidate>[] = [
  {
    name: "currency-marker",
    pattern:
      /R\$[.: \t]*(?:(\d{1,3}(?:[., ]\d{3})+|\d{1,4})[.,](\d{2})|(\d{1,4})[ \t]+(\d{2}))(?!\d)/g,
    build: (m, offset, line) => {
      const integer = (m[1] ?? m[3] ?? "").replace(/[., ]/g, "");
      const fraction = m[2] ?? m[4] ?? "";
      if (!integer || !fraction) return null;
      return amountCandidate("currency-marker", Number(`${integer}.${fraction}`), offset, line);
    },
  },
  bareDecimalRule("bare-decimal-comma", ","),
  bareDecimalRule("bare-decimal-dot", "."),
  {
    name: "marker-fallback",
    pattern: /R\$[.: \t]*([^\n]*)/g,
    build: (m, offset, line) => {
      const rest = m[1].trim().replace(",", ".");
      if (!/^\d+(?:\.\d+)?$/.test(rest)) return null;
      return amountCandidate("marker-fallback", Number(rest), offset, line);
    },
  },
];

export class AmountExtractor {
  private readonly rules: readonly PatternRule<AmountCandidate>[];

  constructor(rules: readonly PatternRule<AmountCandidate>[] = AMOUNT_RULES) {
    this.rules = rules;
  }

  /** Candidates of the winning tier, in text order */
  candidates(text: string): AmountCandidate[] {
    if (!text) return [];
    return firstMatchingRule(this.rules, text);
  }

  /**
   * Single best amount: the largest value ≥ 1.00, else the largest value
   * found, else "not-found".
   */
  extract(text: string): number | NotFound {
    const amounts = this.candidates(text).map((c) => c.amount);
    if (amounts.length === 0) return NOT_FOUND;
    const valid = amounts.filter((a) => a >= 1);
    return Math.max(...(valid.length > 0 ? valid : amounts));
  }
}
