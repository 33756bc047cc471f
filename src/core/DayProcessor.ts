/**
 * TallyScan – Day processing
 *
 * One statement screenshot per day: region 0 is the header carrying the
 * date, the remaining regions hold the sales. Regions are processed one at
 * a time.
 */

import type { DateExtractor } from "../parser/DateExtractor";
import type {
  DayInput,
  DayResult,
  RegionImage,
  RegionResult,
} from "../schema/TransactionRecord";
import { NOT_FOUND } from "../schema/TransactionRecord";
import type { TallyScanLogger } from "../utils/logger";
import { describeError, silentLogger } from "../utils/logger";
import type { RegionPipeline } from "./RegionPipeline";

export class DayProcessor {
  private readonly pipeline: RegionPipeline;
  private readonly dates: DateExtractor;
  private readonly logger: TallyScanLogger;

  constructor(
    pipeline: RegionPipeline,
    dates: DateExtractor,
    logger: TallyScanLogger = silentLogger,
  ) {
    this.pipeline = pipeline;
    this.dates = dates;
    this.logger = logger;
  }

  async process(day: DayInput): Promise<DayResult> {
    const [header, ...regions] = day.regions;
    if (!header) {
      this.logger.warn(`Day '${day.label}' has no regions`);
      return emptyDay(day.label);
    }

    const headerDate = await this.readHeaderDate(day.label, header);

    const results: RegionResult[] = [];
    for (const region of regions) {
      results.push(await this.pipeline.process(region, headerDate));
    }

    let date = headerDate;
    if (date === NOT_FOUND) {
      date = this.dateFromRegions(results);
      if (date !== NOT_FOUND) {
        this.logger.info(`Day '${day.label}': header had no date, using ${date} from a sales region`);
      } else {
        this.logger.warn(`Day '${day.label}': no date found`);
      }
    }

    const records = results.flatMap((r) =>
      r.records.map((record) => (record.date === date ? record : { ...record, date })),
    );

    return {
      label: day.label,
      date,
      records,
      regions: {
        total: regions.length,
        processed: results.filter((r) => r.status === "ok").length,
        empty: results.filter((r) => r.status === "empty").length,
        failed: results.filter((r) => r.status === "failed").length,
      },
    };
  }

  private async readHeaderDate(label: string, header: RegionImage): Promise<string> {
    try {
      const merged = await this.pipeline.readText(header);
      const date = this.dates.extract(merged.text);
      this.logger.debug(`Day '${label}' header date: ${date}`);
      return date;
    } catch (err) {
      this.logger.warn(`Header of day '${label}' could not be read: ${describeError(err)}`);
      return NOT_FOUND;
    }
  }

  private dateFromRegions(results: readonly RegionResult[]): string {
    for (const result of results) {
      const date = this.dates.extract(result.mergedText.text);
      if (date !== NOT_FOUND) return date;
    }
    return NOT_FOUND;
  }
}

function emptyDay(label: string): DayResult {
  return {
    label,
    date: NOT_FOUND,
    records: [],
    regions: { total: 0, processed: 0, empty: 0, failed: 0 },
  };
}
