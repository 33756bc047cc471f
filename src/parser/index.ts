export { AmountExtractor, AMOUNT_RULES, looksLikeClock } from "./AmountExtractor";
export { DateExtractor, DATE_RULES } from "./DateExtractor";
export { TimeExtractor, ATTENTION_SUFFIX } from "./TimeExtractor";
export type { TimeExtractorOptions } from "./TimeExtractor";
export {
  LineIndex,
  MONTH_ABBREVIATIONS,
  MONTH_NAMES,
  applyRule,
  firstMatchingRule,
  monthNumber,
  normaliseOCRText,
  stripAccents,
} from "./primitives";
export type { PatternRule } from "./primitives";
