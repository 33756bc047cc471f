/**
 * TallyScan – OCR Ensemble
 *
 * Runs every (variant × profile) strategy over a prepared region and merges
 * the readings. A single strategy routinely misses one of the sales on a
 * statement row; the union of all readings rarely does. Individual
 * failures are logged and skipped – the ensemble itself never throws.
 */

import { ConfidenceEngine } from "../core/confidence";
import type { MergedText, OcrCandidate, PreparedImage } from "../schema/TransactionRecord";
import { mapWithConcurrency, withTimeout } from "../utils/async";
import type { TallyScanLogger } from "../utils/logger";
import { describeError, silentLogger } from "../utils/logger";
import type { OCRProvider, OCRResult } from "./OCRProvider";
import type { GeometricVariant, OCRProfile } from "./profiles";
import { strategyId } from "./profiles";

/** Produces the encoded image for one geometric variant */
export interface VariantRenderer {
  renderVariant(prepared: PreparedImage, variant: GeometricVariant): Promise<Buffer>;
}

export interface OCREnsembleOptions {
  provider: OCRProvider;
  renderer: VariantRenderer;
  profiles: OCRProfile[];
  variants: GeometricVariant[];
  timeoutMs: number;
  concurrency: number;
  logger?: TallyScanLogger;
  confidence?: ConfidenceEngine;
}

interface Strategy {
  id: string;
  profile: OCRProfile;
  image: Buffer;
}

// ─── Merge ───────────────────────────────────────────────────────────────────

/**
 * Join candidate texts in the order given, dropping empty and repeated
 * readings.
 */
export function mergeCandidates(
  candidates: readonly OcrCandidate[],
  confidence: ConfidenceEngine = new ConfidenceEngine(),
): MergedText {
  const seen = new Set<string>();
  const texts: string[] = [];
  const strategies: string[] = [];

  for (const candidate of candidates) {
    const text = candidate.sourceText.trim();
    if (!text || seen.has(text)) continue;
    seen.add(text);
    texts.push(text);
    strategies.push(candidate.strategyId);
  }

  return {
    text: texts.join("\n"),
    estimatedConfidence: confidence.estimate(texts.length),
    strategies,
  };
}

// ─── Ensemble ────────────────────────────────────────────────────────────────

export class OCREnsemble {
  private readonly provider: OCRProvider;
  private readonly renderer: VariantRenderer;
  private readonly profiles: OCRProfile[];
  private readonly variants: GeometricVariant[];
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly logger: TallyScanLogger;
  private readonly confidence: ConfidenceEngine;

  constructor(options: OCREnsembleOptions) {
    this.provider = options.provider;
    this.renderer = options.renderer;
    this.profiles = options.profiles;
    this.variants = options.variants;
    this.timeoutMs = options.timeoutMs;
    this.concurrency = options.concurrency;
    this.logger = options.logger ?? silentLogger;
    this.confidence = options.confidence ?? new ConfidenceEngine();
  }

  async run(prepared: PreparedImage): Promise<MergedText> {
    if (!(await this.provider.isAvailable())) {
      this.logger.warn(`OCR provider '${this.provider.name}' is not available`);
      return mergeCandidates([], this.confidence);
    }

    const strategies = await this.buildStrategies(prepared);
    const lanes = new Map<string, Promise<void>>();
    const results = await mapWithConcurrency(strategies, this.concurrency, (s) =>
      this.invoke(s, lanes),
    );
    const candidates = results.filter((c): c is OcrCandidate => c !== null);

    const merged = mergeCandidates(candidates, this.confidence);
    this.logger.debug(
      `Ensemble: ${candidates.length}/${strategies.length} strategies read text, ` +
        `${merged.strategies.length} distinct, confidence=${merged.estimatedConfidence}`,
    );
    return merged;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async buildStrategies(prepared: PreparedImage): Promise<Strategy[]> {
    const strategies: Strategy[] = [];
    for (const variant of this.variants) {
      let image: Buffer;
      try {
        image = await this.renderer.renderVariant(prepared, variant);
      } catch (err) {
        this.logger.warn(`Variant '${variant.id}' could not be rendered: ${describeError(err)}`);
        continue;
      }
      for (const profile of this.profiles) {
        strategies.push({ id: strategyId(variant, profile), profile, image });
      }
    }
    return strategies;
  }

  /**
   * Start the call once its worker lane is free, so the timeout covers the
   * recognition and not the wait for earlier jobs on the same worker.
   */
  private recognize(strategy: Strategy, lanes: Map<string, Promise<void>>): Promise<OCRResult> {
    const start = (): Promise<OCRResult> =>
      withTimeout(
        this.provider.recognize(strategy.image, strategy.profile),
        this.timeoutMs,
        `Strategy '${strategy.id}'`,
      );

    const key = this.provider.workerKey?.(strategy.profile);
    if (key === undefined) return start();

    const bounded = (lanes.get(key) ?? Promise.resolve()).then(start);
    lanes.set(
      key,
      bounded.then(
        () => undefined,
        () => undefined,
      ),
    );
    return bounded;
  }

  private async invoke(
    strategy: Strategy,
    lanes: Map<string, Promise<void>>,
  ): Promise<OcrCandidate | null> {
    try {
      const result = await this.recognize(strategy, lanes);
      const text = result.text.trim();
      if (!text) {
        this.logger.debug(`Strategy '${strategy.id}' read no text`);
        return null;
      }
      return { sourceText: text, confidence: result.confidence, strategyId: strategy.id };
    } catch (err) {
      this.logger.warn(`Strategy '${strategy.id}' failed: ${describeError(err)}`);
      return null;
    }
  }
}
