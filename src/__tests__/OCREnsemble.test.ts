/**
 * OCREnsemble, mergeCandidates, ConfidenceEngine – unit tests
 */
import { ConfidenceEngine } from "../core/confidence";
import { OCREnsemble, mergeCandidates } from "../ocr/OCREnsemble";
import type { OCREnsembleOptions, VariantRenderer } from "../ocr/OCREnsemble";
import { TesseractOCR } from "../ocr/TesseractOCR";
import type { RecognitionWorker } from "../ocr/TesseractOCR";
import type { GeometricVariant, OCRProfile } from "../ocr/profiles";
import type { PreparedImage } from "../schema/TransactionRecord";
import { spyLogger, stubProvider } from "./helpers";
import type { Responder } from "./helpers";

// ─── helpers ──────────────────────────────────────────────────────────────────

const PROFILES: OCRProfile[] = [
  { id: "a", pageSegMode: 6, engineMode: 3 },
  { id: "b", pageSegMode: 4, engineMode: 3 },
];

const VARIANTS: GeometricVariant[] = [
  { id: "full", kind: "full" },
  { id: "top", kind: "crop", box: { left: 0, top: 0, width: 1, height: 0.5 } },
];

const PREPARED: PreparedImage = { data: Buffer.alloc(4, 255), width: 2, height: 2 };

/** Encodes the variant id as the "image" so responders can tell strategies apart */
const idRenderer: VariantRenderer = {
  renderVariant: async (_prepared, variant) => Buffer.from(variant.id),
};

function fromTable(table: Record<string, string>): Responder {
  return (image, profile) => table[`${image.toString()}/${profile.id}`] ?? "";
}

function ensemble(respond: Responder, overrides: Partial<OCREnsembleOptions> = {}) {
  const provider = stubProvider(respond);
  const logger = spyLogger();
  const instance = new OCREnsemble({
    provider,
    renderer: idRenderer,
    profiles: PROFILES,
    variants: VARIANTS,
    timeoutMs: 1_000,
    concurrency: 1,
    logger,
    ...overrides,
  });
  return { instance, provider, logger };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── ConfidenceEngine ────────────────────────────────────────────────────────

describe("ConfidenceEngine", () => {
  const engine = new ConfidenceEngine();

  it("is 0 without readings", () => {
    expect(engine.estimate(0)).toBe(0);
  });

  it("adds 10 per reading on a base of 30, capped at 90", () => {
    expect([1, 2, 3, 4, 5, 6, 7, 8].map((n) => engine.estimate(n))).toEqual([
      40, 50, 60, 70, 80, 90, 90, 90,
    ]);
  });

  it("never decreases as readings are added", () => {
    for (let n = 0; n < 72; n++) {
      expect(engine.estimate(n + 1)).toBeGreaterThanOrEqual(engine.estimate(n));
    }
  });
});

// ─── mergeCandidates ─────────────────────────────────────────────────────────

describe("mergeCandidates", () => {
  it("keeps first occurrences in the given order and drops blanks", () => {
    const merged = mergeCandidates([
      { sourceText: " R$ 22,00 ", confidence: 70, strategyId: "full/a" },
      { sourceText: "", confidence: 0, strategyId: "full/b" },
      { sourceText: "14:05", confidence: 60, strategyId: "top/a" },
      { sourceText: "R$ 22,00", confidence: 90, strategyId: "top/b" },
    ]);
    expect(merged).toEqual({
      text: "R$ 22,00\n14:05",
      estimatedConfidence: 50,
      strategies: ["full/a", "top/a"],
    });
  });

  it("returns an empty merge for no candidates", () => {
    expect(mergeCandidates([])).toEqual({ text: "", estimatedConfidence: 0, strategies: [] });
  });
});

// ─── OCREnsemble ─────────────────────────────────────────────────────────────

describe("OCREnsemble", () => {
  it("runs every variant × profile pair, variants outermost", async () => {
    const { instance, provider } = ensemble(() => "");
    await instance.run(PREPARED);
    const order = provider.recognize.mock.calls.map(
      ([image, profile]) => `${image.toString()}/${profile.id}`,
    );
    expect(order).toEqual(["full/a", "full/b", "top/a", "top/b"]);
  });

  it("merges trimmed, unique, non-empty texts", async () => {
    const { instance } = ensemble(
      fromTable({
        "full/a": "R$ 16,37\n14:05",
        "full/b": "R$ 16,37\n14:05",
        "top/a": "",
        "top/b": "  14:05  ",
      }),
    );
    expect(await instance.run(PREPARED)).toEqual({
      text: "R$ 16,37\n14:05\n14:05",
      estimatedConfidence: 50,
      strategies: ["full/a", "top/b"],
    });
  });

  it("joins in declared order regardless of completion order", async () => {
    const table: Record<string, string> = {
      "full/a": "one",
      "full/b": "two",
      "top/a": "three",
      "top/b": "four",
    };
    const delays: Record<string, number> = { "full/a": 40, "full/b": 30, "top/a": 20, "top/b": 0 };
    const slow: Responder = async (image, profile) => {
      const key = `${image.toString()}/${profile.id}`;
      await sleep(delays[key]);
      return table[key];
    };

    const parallel = await ensemble(slow, { concurrency: 4 }).instance.run(PREPARED);
    const serial = await ensemble(slow, { concurrency: 1 }).instance.run(PREPARED);

    expect(parallel.text).toBe("one\ntwo\nthree\nfour");
    expect(parallel).toEqual(serial);
  });

  it("never has more than `concurrency` calls in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const { instance } = ensemble(
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await sleep(5);
        inFlight--;
        return "x";
      },
      { concurrency: 2 },
    );
    await instance.run(PREPARED);
    expect(peak).toBe(2);
  });

  it("skips a call that exceeds the timeout", async () => {
    const { instance, logger } = ensemble(
      (image, profile) =>
        `${image.toString()}/${profile.id}` === "full/b"
          ? new Promise<string>(() => undefined)
          : `${image.toString()}/${profile.id}`,
      { timeoutMs: 20 },
    );
    const merged = await instance.run(PREPARED);
    expect(merged.strategies).toEqual(["full/a", "top/a", "top/b"]);
    expect(logger.calls.warn).toEqual([
      "Strategy 'full/b' failed: Strategy 'full/b' timed out after 20 ms",
    ]);
  });

  it("starts the timeout when the shared worker takes the job", async () => {
    let mode = "";
    const worker: RecognitionWorker = {
      setParameters: async (params) => {
        mode = params.tessedit_pageseg_mode;
        return {};
      },
      recognize: async () => {
        const text = `psm ${mode}`;
        await sleep(60);
        return { data: { text, confidence: 90 } };
      },
      terminate: async () => ({}),
    };
    const logger = spyLogger();
    const instance = new OCREnsemble({
      provider: new TesseractOCR({ createWorker: async () => worker }),
      renderer: idRenderer,
      profiles: [
        { id: "p1", pageSegMode: 3, engineMode: 3 },
        { id: "p2", pageSegMode: 4, engineMode: 3 },
        { id: "p3", pageSegMode: 6, engineMode: 3 },
        { id: "p4", pageSegMode: 7, engineMode: 3 },
      ],
      variants: [{ id: "full", kind: "full" }],
      timeoutMs: 100,
      concurrency: 4,
      logger,
    });

    const merged = await instance.run(PREPARED);

    expect(logger.calls.warn).toEqual([]);
    expect(merged.strategies).toEqual(["full/p1", "full/p2", "full/p3", "full/p4"]);
    expect(merged.text).toBe("psm 3\npsm 4\npsm 6\npsm 7");
  });

  it("returns empty text and zero confidence when every call fails", async () => {
    const { instance, logger } = ensemble(() => {
      throw new Error("engine crashed");
    });
    expect(await instance.run(PREPARED)).toEqual({
      text: "",
      estimatedConfidence: 0,
      strategies: [],
    });
    expect(logger.calls.warn).toHaveLength(4);
  });

  it("skips a variant that cannot be rendered", async () => {
    const renderer: VariantRenderer = {
      renderVariant: async (_prepared, variant) => {
        if (variant.id === "top") throw new Error("extract_area: bad extract area");
        return Buffer.from(variant.id);
      },
    };
    const { instance, provider, logger } = ensemble(() => "text", { renderer });
    await instance.run(PREPARED);
    expect(provider.recognize).toHaveBeenCalledTimes(2);
    expect(logger.calls.warn).toEqual([
      "Variant 'top' could not be rendered: extract_area: bad extract area",
    ]);
  });

  it("does nothing when the provider is unavailable", async () => {
    const { instance, provider, logger } = ensemble(() => "text");
    provider.isAvailable = jest.fn().mockResolvedValue(false);
    expect((await instance.run(PREPARED)).text).toBe("");
    expect(provider.recognize).not.toHaveBeenCalled();
    expect(logger.calls.warn).toEqual(["OCR provider 'stub' is not available"]);
  });
});
