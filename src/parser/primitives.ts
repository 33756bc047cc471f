/**
 * TallyScan – Shared parsing primitives
 *
 * Text repair, month tables and position bookkeeping used by the field
 * extractors. No external dependencies – pure TypeScript.
 */

// ─── OCR text normalisation ───────────────────────────────────────────────────

/**
 * Repair OCR artefacts that break the currency and dash patterns.
 * Line structure is preserved: positions downstream are line indices.
 */
export function normaliseOCRText(raw: string): string {
  let t = raw;

  // 1. Strip invisible / zero-width characters
  t = t.replace(/[\u200B-\u200D\uFEFF]/g, "");

  // 2. Currency marker misreads: "RS 16,37", "R8 16,37", "R§16,37", "R $ 16,37"
  t = t.replace(/\bR(?:[S8§]|[ \t]+\$)(?=[.:]?[ \t]*\d)/g, "R$");

  // 3. Normalise dashes – OCR may produce em-dash or en-dash
  t = t.replace(/[–—]/g, "-");

  // 4. Trim trailing whitespace per line
  t = t.replace(/[ \t]+$/gm, "");

  return t;
}

/** "Março" → "marco" */
export function stripAccents(s: string): string {
  return s.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

export function pad2(n: string | number): string {
  return String(n).padStart(2, "0");
}

/** Round to cents without float artefacts (16.369999 → 16.37) */
export function roundMoney(n: number): number {
  return Math.round(n * 100) / 100;
}

// ─── Months ───────────────────────────────────────────────────────────────────

export const MONTH_ABBREVIATIONS = [
  "jan",
  "fev",
  "mar",
  "abr",
  "mai",
  "jun",
  "jul",
  "ago",
  "set",
  "out",
  "nov",
  "dez",
] as const;

export const MONTH_NAMES = [
  "janeiro",
  "fevereiro",
  "março",
  "abril",
  "maio",
  "junho",
  "julho",
  "agosto",
  "setembro",
  "outubro",
  "novembro",
  "dezembro",
] as const;

/**
 * Two-digit month for a Portuguese month word, keyed on its first three
 * letters ("Set." → "09"). Unknown words yield `undefined`.
 */
export function monthNumber(word: string): string | undefined {
  const key = stripAccents(word).toLowerCase().slice(0, 3);
  const index = MONTH_ABBREVIATIONS.findIndex((m) => m === key);
  return index === -1 ? undefined : pad2(index + 1);
}

// ─── Positions ────────────────────────────────────────────────────────────────

/**
 * Maps character offsets to 0-based line indices.
 */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === "\n") this.starts.push(i + 1);
    }
  }

  get lineCount(): number {
    return this.starts.length;
  }

  lineAt(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }
}

// ─── Pattern rules ────────────────────────────────────────────────────────────

/**
 * A named regex whose matches are turned into candidates. `build` may
 * return null to reject a match that the regex alone cannot rule out.
 */
export interface PatternRule<C> {
  name: string;
  /** Must carry the `g` flag */
  pattern: RegExp;
  build(match: RegExpMatchArray, offset: number, line: number): C | null;
}

/** All candidates one rule produces, in text order */
export function applyRule<C>(
  rule: PatternRule<C>,
  text: string,
  lines: LineIndex = new LineIndex(text),
): C[] {
  const out: C[] = [];
  for (const match of text.matchAll(rule.pattern)) {
    const offset = match.index ?? 0;
    const candidate = rule.build(match, offset, lines.lineAt(offset));
    if (candidate !== null) out.push(candidate);
  }
  return out;
}

/**
 * Candidates of the first rule, in declared order, that produces any.
 */
export function firstMatchingRule<C>(
  rules: readonly PatternRule<C>[],
  text: string,
): C[] {
  const lines = new LineIndex(text);
  for (const rule of rules) {
    const found = applyRule(rule, text, lines);
    if (found.length > 0) return found;
  }
  return [];
}
