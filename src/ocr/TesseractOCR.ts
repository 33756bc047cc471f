/**
 * TallyScan – Tesseract.js recognition provider
 *
 * Without `langPath` tesseract.js downloads `*.traineddata` on first use;
 * point it at a local directory to run offline.
 *
 * One worker per (language, engine mode) pair; the engine mode is fixed at
 * worker creation. Page segmentation is set per job with setParameters(),
 * and jobs on one worker run one at a time.
 */

import { createWorker, OEM, PSM } from "tesseract.js";
import type { WorkerOptions } from "tesseract.js";

import type { OCRProvider, OCRResult } from "./OCRProvider";
import { OCRError } from "./OCRProvider";
import type { EngineMode, OCRProfile, PageSegMode } from "./profiles";

export interface TesseractOCROptions {
  /** Language used by profiles that do not name one (default "eng") */
  defaultLanguage?: string;
  /** Directory or URL holding *.traineddata files */
  langPath?: string;
  /** Where downloaded traineddata files are cached */
  cachePath?: string;
  /** Worker constructor; tesseract.js' createWorker by default */
  createWorker?: WorkerFactory;
}

/** The part of a tesseract.js worker this provider relies on */
export interface RecognitionWorker {
  setParameters(params: { tessedit_pageseg_mode: PSM }): Promise<unknown>;
  recognize(image: Buffer): Promise<{ data: { text: string; confidence: number } }>;
  terminate(): Promise<unknown>;
}

export type WorkerFactory = (
  language: string,
  oem: OEM,
  options: Partial<WorkerOptions>,
) => Promise<RecognitionWorker>;

const PSM_BY_MODE: Record<PageSegMode, PSM> = {
  3: PSM.AUTO,
  4: PSM.SINGLE_COLUMN,
  6: PSM.SINGLE_BLOCK,
  7: PSM.SINGLE_LINE,
  8: PSM.SINGLE_WORD,
  11: PSM.SPARSE_TEXT,
  13: PSM.RAW_LINE,
};

const OEM_BY_MODE: Record<EngineMode, OEM> = {
  0: OEM.TESSERACT_ONLY,
  1: OEM.LSTM_ONLY,
  2: OEM.TESSERACT_LSTM_COMBINED,
  3: OEM.DEFAULT,
};

/** Engine modes that need the legacy (non-LSTM) core and language data */
function needsLegacy(mode: EngineMode): boolean {
  return mode === 0 || mode === 2;
}

export class TesseractOCR implements OCRProvider {
  readonly name = "tesseract";

  private readonly defaultLanguage: string;
  private readonly langPath: string | undefined;
  private readonly cachePath: string | undefined;
  private readonly createWorker: WorkerFactory;
  private readonly workers = new Map<string, Promise<RecognitionWorker>>();
  private readonly queues = new Map<string, Promise<unknown>>();

  constructor(options: TesseractOCROptions = {}) {
    this.defaultLanguage = options.defaultLanguage ?? "eng";
    this.langPath = options.langPath;
    this.cachePath = options.cachePath;
    this.createWorker = options.createWorker ?? createWorker;
  }

  async isAvailable(): Promise<boolean> {
    return typeof this.createWorker === "function";
  }

  workerKey(profile: OCRProfile): string {
    return `${profile.language ?? this.defaultLanguage}|${profile.engineMode}`;
  }

  async recognize(image: Buffer, profile: OCRProfile): Promise<OCRResult> {
    const language = profile.language ?? this.defaultLanguage;
    const key = this.workerKey(profile);

    return this.enqueue(key, async () => {
      try {
        const worker = await this.getWorker(key, language, profile.engineMode);
        await worker.setParameters({
          tessedit_pageseg_mode: PSM_BY_MODE[profile.pageSegMode],
        });
        const { data } = await worker.recognize(image);
        return {
          text: data.text,
          confidence: data.confidence,
          provider: this.name,
        };
      } catch (err) {
        throw new OCRError(
          `Recognition failed for profile '${profile.id}': ${err instanceof Error ? err.message : String(err)}`,
          this.name,
          err,
        );
      }
    });
  }

  async terminate(): Promise<void> {
    const pending = Array.from(this.workers.values());
    this.workers.clear();
    this.queues.clear();
    const stopped = await Promise.allSettled(
      pending.map((created) =>
        created.then(
          (worker) => worker.terminate(),
          () => undefined,
        ),
      ),
    );
    const failures = stopped.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    if (failures.length > 0) {
      throw new OCRError(
        `Could not stop ${failures.length} of ${pending.length} workers: ${failures
          .map((f) => (f.reason instanceof Error ? f.reason.message : String(f.reason)))
          .join("; ")}`,
        this.name,
        failures[0].reason,
      );
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private getWorker(
    key: string,
    language: string,
    engineMode: EngineMode,
  ): Promise<RecognitionWorker> {
    const existing = this.workers.get(key);
    if (existing) return existing;

    const legacy = needsLegacy(engineMode);
    const created = this.createWorker(language, OEM_BY_MODE[engineMode], {
      ...(this.langPath ? { langPath: this.langPath } : {}),
      ...(this.cachePath ? { cachePath: this.cachePath } : {}),
      legacyCore: legacy,
      legacyLang: legacy,
      logger: () => undefined,
    });
    // Forget a worker that failed to start
    void created.catch(() => this.workers.delete(key));
    this.workers.set(key, created);
    return created;
  }

  private enqueue<T>(key: string, job: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const next = previous.then(job);
    this.queues.set(
      key,
      next.catch(() => undefined),
    );
    return next;
  }
}
