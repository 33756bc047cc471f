/**
 * TallyScan – Main scanning API
 *
 * Usage:
 *   import { TallyScan } from "tallyscan";
 *
 *   const scanner = TallyScan.create({ tesseract: { langPath: "./tessdata" } });
 *   const result = await scanner.processBatch([
 *     { label: "credito (3)", regions: [header, ...quadrants] },
 *   ]);
 *   await scanner.close();
 *
 * Custom provider / sink:
 *   TallyScan.create({
 *     provider: myProvider,
 *     sink: new MemoryRecordSink(),
 *     config: { ocr: { concurrency: 4 }, debug: true },
 *   });
 */

import { ImagePreprocessor } from "../image/ImagePreprocessor";
import { OCREnsemble } from "../ocr/OCREnsemble";
import type { OCRProvider } from "../ocr/OCRProvider";
import { TesseractOCR } from "../ocr/TesseractOCR";
import type { TesseractOCROptions } from "../ocr/TesseractOCR";
import { AmountExtractor } from "../parser/AmountExtractor";
import { DateExtractor } from "../parser/DateExtractor";
import { TimeExtractor } from "../parser/TimeExtractor";
import type {
  BatchResult,
  DayInput,
  DayResult,
  RegionImage,
  RegionResult,
} from "../schema/TransactionRecord";
import { NOT_FOUND } from "../schema/TransactionRecord";
import type { RecordSink } from "../sink/RecordSink";
import type { TallyScanLogger } from "../utils/logger";
import { createLogger } from "../utils/logger";
import { ConfidenceEngine } from "./confidence";
import type { TallyScanConfig, TallyScanConfigInput, ValidationResult } from "./config";
import { loadConfig } from "./config";
import { DayProcessor } from "./DayProcessor";
import { TallyScanError } from "./errors";
import { RegionPipeline } from "./RegionPipeline";
import { TransactionAssociator } from "./TransactionAssociator";

export interface TallyScanOptions {
  config?: TallyScanConfigInput;
  /** Recognition provider; a TesseractOCR is created when omitted */
  provider?: OCRProvider;
  /** Options for the default TesseractOCR provider */
  tesseract?: TesseractOCROptions;
  /** Receives each day's records during processBatch() */
  sink?: RecordSink;
  logger?: TallyScanLogger;
}

// ─── Batch validation ─────────────────────────────────────────────────────────

/**
 * Check a batch before any region is touched. Returns all problems at once.
 */
export function validateBatch(days: readonly DayInput[]): ValidationResult {
  const errors: string[] = [];

  if (!Array.isArray(days) || days.length === 0) {
    errors.push("Batch must contain at least one day.");
    return { valid: false, errors };
  }

  const labels = new Set<string>();
  days.forEach((day, i) => {
    const label = typeof day.label === "string" ? day.label.trim() : "";
    if (!label) {
      errors.push(`Day #${i} has no label.`);
    } else if (labels.has(label)) {
      errors.push(`Duplicate day label '${label}'.`);
    } else {
      labels.add(label);
    }

    const regions: readonly RegionImage[] | undefined = day.regions;
    if (!regions) {
      errors.push(`Day '${label || `#${i}`}' has no region list.`);
      return;
    }
    regions.forEach((region: RegionImage, r: number) => {
      if (!region.reference) {
        errors.push(`Region #${r} of day '${label || `#${i}`}' has no reference.`);
      }
    });
  });

  return { valid: errors.length === 0, errors };
}

// ─── Scanner ──────────────────────────────────────────────────────────────────

export class TallyScan {
  readonly config: TallyScanConfig;

  private readonly provider: OCRProvider;
  private readonly pipeline: RegionPipeline;
  private readonly days: DayProcessor;
  private readonly sink: RecordSink | undefined;
  private readonly logger: TallyScanLogger;

  private constructor(
    config: TallyScanConfig,
    provider: OCRProvider,
    sink: RecordSink | undefined,
    logger: TallyScanLogger,
  ) {
    this.config = config;
    this.provider = provider;
    this.sink = sink;
    this.logger = logger;

    const preprocessor = new ImagePreprocessor(config.preprocess, logger);
    const ensemble = new OCREnsemble({
      provider,
      renderer: preprocessor,
      profiles: config.ocr.profiles,
      variants: config.ocr.variants,
      timeoutMs: config.ocr.timeoutMs,
      concurrency: config.ocr.concurrency,
      logger,
      confidence: new ConfidenceEngine(),
    });

    this.pipeline = new RegionPipeline({
      preprocessor,
      ensemble,
      associator: new TransactionAssociator(
        { ...config.association, minimumAmount: config.parsing.minimumAmount },
        logger,
      ),
      times: new TimeExtractor({
        correctConfusableDigits: config.parsing.correctConfusableDigits,
      }),
      amounts: new AmountExtractor(),
      logger,
    });

    this.days = new DayProcessor(this.pipeline, new DateExtractor(), logger);
  }

  /**
   * Build a scanner.
   *
   * @throws TallyScanError (INVALID_CONFIG) when the merged configuration is invalid
   */
  static create(options: TallyScanOptions = {}): TallyScan {
    const config = loadConfig(options.config);
    const logger = options.logger ?? createLogger(config.debug);
    const provider = options.provider ?? new TesseractOCR(options.tesseract);
    return new TallyScan(config, provider, options.sink, logger);
  }

  /**
   * Process every day in order.
   *
   * @throws TallyScanError (INVALID_INPUT) before any work when the batch is invalid
   */
  async processBatch(days: readonly DayInput[]): Promise<BatchResult> {
    // ── 1. Validate input ─────────────────────────────────────────────────────
    const validation = validateBatch(days);
    if (!validation.valid) {
      throw new TallyScanError(
        `Invalid batch: ${validation.errors.join("; ")}`,
        "INVALID_INPUT",
      );
    }

    this.logger.info(`Batch started: ${days.length} day(s)`);

    // ── 2. Days, sequentially ─────────────────────────────────────────────────
    const results: DayResult[] = [];
    for (const day of days) {
      const result = await this.processDay(day);
      results.push(result);

      // ── 3. Hand off ─────────────────────────────────────────────────────────
      if (this.sink) {
        await this.sink.write(result.records, { label: result.label, date: result.date });
      }
    }

    const records = results.flatMap((d) => d.records);
    const summary = {
      days: results.length,
      regions: results.reduce((n, d) => n + d.regions.total, 0),
      records: records.length,
      skipped: results.reduce((n, d) => n + d.regions.empty + d.regions.failed, 0),
    };

    this.logger.info(
      `Batch complete – ${summary.records} record(s) from ${summary.regions} region(s), ${summary.skipped} skipped`,
    );
    return { days: results, records, summary };
  }

  async processDay(day: DayInput): Promise<DayResult> {
    this.logger.info(`Processing day '${day.label}' (${day.regions.length} region(s))`);
    return this.days.process(day);
  }

  /** Process a single region; the date defaults to "not-found" */
  async processRegion(region: RegionImage, date: string = NOT_FOUND): Promise<RegionResult> {
    return this.pipeline.process(region, date);
  }

  /** Release the recognition provider's workers */
  async close(): Promise<void> {
    if (this.provider.terminate) {
      await this.provider.terminate();
    }
  }
}
