/**
 * TallyScan – Region pipeline
 *
 * preprocess → ensemble → normalise → extract → associate, for a single
 * quadrant. Any failure is contained here: the region is reported as
 * "failed" and its siblings carry on.
 */

import type { ImagePreprocessor } from "../image/ImagePreprocessor";
import type { OCREnsemble } from "../ocr/OCREnsemble";
import type { AmountExtractor } from "../parser/AmountExtractor";
import { normaliseOCRText } from "../parser/primitives";
import type { TimeExtractor } from "../parser/TimeExtractor";
import type {
  MergedText,
  RegionImage,
  RegionResult,
} from "../schema/TransactionRecord";
import type { TallyScanLogger } from "../utils/logger";
import { describeError, silentLogger } from "../utils/logger";
import { ImageLoadError } from "./errors";
import type { TransactionAssociator } from "./TransactionAssociator";

export interface RegionPipelineDeps {
  preprocessor: ImagePreprocessor;
  ensemble: OCREnsemble;
  associator: TransactionAssociator;
  times: TimeExtractor;
  amounts: AmountExtractor;
  logger?: TallyScanLogger;
}

const EMPTY_TEXT: MergedText = { text: "", estimatedConfidence: 0, strategies: [] };

export class RegionPipeline {
  private readonly preprocessor: ImagePreprocessor;
  private readonly ensemble: OCREnsemble;
  private readonly associator: TransactionAssociator;
  private readonly times: TimeExtractor;
  private readonly amounts: AmountExtractor;
  private readonly logger: TallyScanLogger;

  constructor(deps: RegionPipelineDeps) {
    this.preprocessor = deps.preprocessor;
    this.ensemble = deps.ensemble;
    this.associator = deps.associator;
    this.times = deps.times;
    this.amounts = deps.amounts;
    this.logger = deps.logger ?? silentLogger;
  }

  /** Recognise a region and return its normalised merged text */
  async readText(region: RegionImage): Promise<MergedText> {
    const prepared = await this.preprocessor.prepare(region);
    const merged = await this.ensemble.run(prepared);
    return { ...merged, text: normaliseOCRText(merged.text) };
  }

  async process(region: RegionImage, date: string): Promise<RegionResult> {
    let merged: MergedText;
    try {
      merged = await this.readText(region);
    } catch (err) {
      const message = describeError(err);
      if (err instanceof ImageLoadError) {
        this.logger.error(`Skipping region: ${message}`);
      } else {
        this.logger.error(`Region ${region.reference} failed: ${message}`);
      }
      return {
        reference: region.reference,
        status: "failed",
        mergedText: EMPTY_TEXT,
        records: [],
        error: message,
      };
    }

    if (!merged.text) {
      this.logger.warn(`No text recognised in ${region.reference}`);
      return { reference: region.reference, status: "empty", mergedText: merged, records: [] };
    }

    const records = this.associator.associate({
      amounts: this.amounts.candidates(merged.text),
      times: this.times.candidates(merged.text),
      date,
      reference: region.reference,
    });

    this.logger.info(
      `${region.reference}: ${records.length} record(s), confidence=${merged.estimatedConfidence}`,
    );
    return { reference: region.reference, status: "ok", mergedText: merged, records };
  }
}
