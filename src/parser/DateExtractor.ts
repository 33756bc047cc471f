/**
 * TallyScan – Date extraction
 *
 * Statement headers print the day as "29 set. 2025"; exports and manual
 * notes use numeric forms. Rules are tried in order and the first one
 * that matches anywhere decides – only its first match is used.
 */

import type { DateCandidate, NotFound } from "../schema/TransactionRecord";
import { NOT_FOUND } from "../schema/TransactionRecord";
import type { PatternRule } from "./primitives";
import {
  MONTH_ABBREVIATIONS,
  MONTH_NAMES,
  firstMatchingRule,
  monthNumber,
  pad2,
  stripAccents,
} from "./primitives";

/** Texts earlier runs wrote in place of a date */
const PLACEHOLDERS = new Set([
  "date not identified",
  "data nao identificada",
  "nao encontrado",
  NOT_FOUND,
]);

function dateCandidate(
  rule: string,
  day: string,
  month: string,
  year: string,
  offset: number,
  line: number,
): DateCandidate {
  return {
    kind: "date",
    value: `${pad2(day)}/${pad2(month)}/${year}`,
    position: line,
    offset,
    rule,
  };
}

const MONTH_NAME_ALTERNATION = MONTH_NAMES.map((m) => m.replace("ç", "[çc]")).join("|");

export const DATE_RULES: PatternRule<DateCandidate>[] = [
  {
    // 29 set. 2025 / 29. SET 2025
    name: "abbreviated-month",
    pattern: new RegExp(
      `\\b(\\d{1,2})\\.?\\s+(${MONTH_ABBREVIATIONS.join("|")})\\.?\\s+(\\d{4})\\b`,
      "gi",
    ),
    build: (m, offset, line) =>
      dateCandidate("abbreviated-month", m[1], monthNumber(m[2]) ?? "01", m[3], offset, line),
  },
  {
    // 29 setembro 2025
    name: "full-month",
    pattern: new RegExp(`\\b(\\d{1,2})\\s+(${MONTH_NAME_ALTERNATION})\\.?\\s+(\\d{4})\\b`, "gi"),
    build: (m, offset, line) =>
      dateCandidate("full-month", m[1], monthNumber(m[2]) ?? "01", m[3], offset, line),
  },
  {
    // 29 stt. 2025 – unreadable month, kept with a January placeholder
    name: "generic-month",
    pattern: /\b(\d{1,2})\.?\s+([A-Za-zÀ-ÿ]{3,4})\.?\s+(\d{4})\b/g,
    build: (m, offset, line) =>
      dateCandidate("generic-month", m[1], monthNumber(m[2]) ?? "01", m[3], offset, line),
  },
  {
    // 29/09/2025, 29-09-2025
    name: "day-month-year",
    pattern: /\b(\d{1,2})[/-](\d{1,2})[/-](\d{4})\b/g,
    build: (m, offset, line) => dateCandidate("day-month-year", m[1], m[2], m[3], offset, line),
  },
  {
    // 2025/09/29, 2025-09-29
    name: "year-month-day",
    pattern: /\b(\d{4})[/-](\d{1,2})[/-](\d{1,2})\b/g,
    build: (m, offset, line) => dateCandidate("year-month-day", m[3], m[2], m[1], offset, line),
  },
  {
    // 29 de setembro de 2025
    name: "long-form",
    pattern: /\b(\d{1,2})\s+de\s+([A-Za-zÀ-ÿ]+)\s+de\s+(\d{4})\b/gi,
    build: (m, offset, line) =>
      dateCandidate("long-form", m[1], monthNumber(m[2]) ?? "01", m[3], offset, line),
  },
];

export class DateExtractor {
  private readonly rules: readonly PatternRule<DateCandidate>[];

  constructor(rules: readonly PatternRule<DateCandidate>[] = DATE_RULES) {
    this.rules = rules;
  }

  /** The winning candidate, or an empty list */
  candidates(text: string): DateCandidate[] {
    if (!text || isPlaceholder(text)) return [];
    return firstMatchingRule(this.rules, text).slice(0, 1);
  }

  /** DD/MM/YYYY, or "not-found" */
  extract(text: string): string | NotFound {
    return this.candidates(text)[0]?.value ?? NOT_FOUND;
  }
}

function isPlaceholder(text: string): boolean {
  return PLACEHOLDERS.has(stripAccents(text.trim()).toLowerCase());
}
