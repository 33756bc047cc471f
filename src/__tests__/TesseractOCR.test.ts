/**
 * TesseractOCR, OCRError – unit tests (fake workers, no traineddata needed)
 */
import { OEM, PSM } from "tesseract.js";

import { TallyScanError } from "../core/errors";
import { OCRError } from "../ocr/OCRProvider";
import { TesseractOCR } from "../ocr/TesseractOCR";
import type { RecognitionWorker } from "../ocr/TesseractOCR";
import type { OCRProfile } from "../ocr/profiles";

// ─── helpers ──────────────────────────────────────────────────────────────────

const PSM6: OCRProfile = { id: "psm6", pageSegMode: 6, engineMode: 3 };
const PSM7: OCRProfile = { id: "psm7", pageSegMode: 7, engineMode: 3 };
const POR: OCRProfile = { id: "psm6-por", pageSegMode: 6, engineMode: 3, language: "por" };
const LEGACY: OCRProfile = { id: "oem0", pageSegMode: 6, engineMode: 0 };

function fakeWorker(log: string[] = [], text: string = "R$ 16,37\n14:05") {
  let mode = "";
  const worker = {
    setParameters: jest.fn(async (params: { tessedit_pageseg_mode: PSM }) => {
      mode = params.tessedit_pageseg_mode;
      log.push(`set ${mode}`);
      return {};
    }),
    recognize: jest.fn(async (_image: Buffer) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      log.push(`read ${mode}`);
      return { data: { text, confidence: 91 } };
    }),
    terminate: jest.fn().mockResolvedValue({}),
  } satisfies RecognitionWorker;
  return worker;
}

const IMAGE = Buffer.from("png");

// ─── OCRError ────────────────────────────────────────────────────────────────

describe("OCRError", () => {
  it("formats message with provider prefix", () => {
    const err = new OCRError("failed", "tesseract");
    expect(err.message).toBe("[tesseract] failed");
    expect(err.name).toBe("OCRError");
    expect(err.provider).toBe("tesseract");
  });

  it("is a TallyScanError with code OCR_FAILED", () => {
    const err = new OCRError("failed", "tesseract");
    expect(err).toBeInstanceOf(TallyScanError);
    expect(err.code).toBe("OCR_FAILED");
  });

  it("stores optional cause", () => {
    const cause = new TypeError("bad input");
    expect(new OCRError("oops", "tesseract", cause).cause).toBe(cause);
  });
});

// ─── TesseractOCR ────────────────────────────────────────────────────────────

describe("TesseractOCR", () => {
  it("recognises with the profile's page segmentation mode", async () => {
    const worker = fakeWorker();
    const createWorker = jest.fn().mockResolvedValue(worker);
    const ocr = new TesseractOCR({ createWorker, langPath: "/opt/tessdata" });

    const result = await ocr.recognize(IMAGE, PSM6);

    expect(result).toEqual({ text: "R$ 16,37\n14:05", confidence: 91, provider: "tesseract" });
    expect(createWorker).toHaveBeenCalledWith("eng", OEM.DEFAULT, {
      langPath: "/opt/tessdata",
      legacyCore: false,
      legacyLang: false,
      logger: expect.any(Function),
    });
    expect(worker.setParameters).toHaveBeenCalledWith({
      tessedit_pageseg_mode: PSM.SINGLE_BLOCK,
    });
    expect(worker.recognize).toHaveBeenCalledWith(IMAGE);
  });

  it("uses the profile language and legacy core when asked", async () => {
    const createWorker = jest.fn().mockResolvedValue(fakeWorker());
    const ocr = new TesseractOCR({ createWorker, defaultLanguage: "por" });

    await ocr.recognize(IMAGE, POR);
    await ocr.recognize(IMAGE, LEGACY);

    expect(createWorker.mock.calls.map((c) => [c[0], c[1], c[2].legacyCore])).toEqual([
      ["por", OEM.DEFAULT, false],
      ["por", OEM.TESSERACT_ONLY, true],
    ]);
  });

  it("reuses one worker per language and engine mode", async () => {
    const createWorker = jest.fn().mockResolvedValue(fakeWorker());
    const ocr = new TesseractOCR({ createWorker });

    await Promise.all([ocr.recognize(IMAGE, PSM6), ocr.recognize(IMAGE, PSM7)]);

    expect(createWorker).toHaveBeenCalledTimes(1);
  });

  it("serialises jobs on a shared worker", async () => {
    const log: string[] = [];
    const ocr = new TesseractOCR({ createWorker: jest.fn().mockResolvedValue(fakeWorker(log)) });

    await Promise.all([ocr.recognize(IMAGE, PSM6), ocr.recognize(IMAGE, PSM7)]);

    expect(log).toEqual([
      `set ${PSM.SINGLE_BLOCK}`,
      `read ${PSM.SINGLE_BLOCK}`,
      `set ${PSM.SINGLE_LINE}`,
      `read ${PSM.SINGLE_LINE}`,
    ]);
  });

  it("wraps recognition failures in OCRError", async () => {
    const worker = fakeWorker();
    worker.recognize.mockRejectedValueOnce(new Error("boom"));
    const ocr = new TesseractOCR({ createWorker: jest.fn().mockResolvedValue(worker) });

    await expect(ocr.recognize(IMAGE, PSM6)).rejects.toMatchObject({
      name: "OCRError",
      code: "OCR_FAILED",
      message: "[tesseract] Recognition failed for profile 'psm6': boom",
    });
    // The queue survives a failed job
    await expect(ocr.recognize(IMAGE, PSM6)).resolves.toMatchObject({ confidence: 91 });
  });

  it("retries a worker that failed to start", async () => {
    const createWorker = jest
      .fn()
      .mockRejectedValueOnce(new Error("traineddata missing"))
      .mockResolvedValue(fakeWorker());
    const ocr = new TesseractOCR({ createWorker });

    await expect(ocr.recognize(IMAGE, PSM6)).rejects.toBeInstanceOf(OCRError);
    await expect(ocr.recognize(IMAGE, PSM6)).resolves.toMatchObject({ provider: "tesseract" });
    expect(createWorker).toHaveBeenCalledTimes(2);
  });

  it("terminates every started worker", async () => {
    const worker = fakeWorker();
    const ocr = new TesseractOCR({ createWorker: jest.fn().mockResolvedValue(worker) });
    await ocr.recognize(IMAGE, PSM6);

    await ocr.terminate();

    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });

  it("stops every worker even when one refuses", async () => {
    const stuck = fakeWorker();
    stuck.terminate.mockRejectedValueOnce(new Error("worker busy"));
    const healthy = fakeWorker();
    const createWorker = jest.fn().mockResolvedValueOnce(stuck).mockResolvedValueOnce(healthy);
    const ocr = new TesseractOCR({ createWorker });
    await ocr.recognize(IMAGE, PSM6);
    await ocr.recognize(IMAGE, LEGACY);

    await expect(ocr.terminate()).rejects.toMatchObject({
      message: "[tesseract] Could not stop 1 of 2 workers: worker busy",
    });
    expect(healthy.terminate).toHaveBeenCalledTimes(1);
  });

  it("ignores workers that never started when terminating", async () => {
    const ocr = new TesseractOCR({
      createWorker: jest.fn().mockRejectedValue(new Error("traineddata missing")),
    });
    await expect(ocr.recognize(IMAGE, PSM6)).rejects.toBeInstanceOf(OCRError);
    await expect(ocr.terminate()).resolves.toBeUndefined();
  });

  it("keys workers by language and engine mode", () => {
    const ocr = new TesseractOCR({ createWorker: jest.fn(), defaultLanguage: "por" });
    expect([PSM6, PSM7, POR, LEGACY].map((p) => ocr.workerKey(p))).toEqual([
      "por|3",
      "por|3",
      "por|3",
      "por|0",
    ]);
  });

  it("reports itself available", async () => {
    await expect(new TesseractOCR({ createWorker: jest.fn() }).isAvailable()).resolves.toBe(true);
  });
});
