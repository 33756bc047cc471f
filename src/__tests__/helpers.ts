/**
 * Shared test doubles
 */
import sharp from "sharp";

import type { OCRProvider, OCRResult } from "../ocr/OCRProvider";
import type { OCRProfile } from "../ocr/profiles";
import type { EncodedRegionImage } from "../schema/TransactionRecord";
import type { TallyScanLogger } from "../utils/logger";

export type SpyLogger = TallyScanLogger & {
  calls: Record<"debug" | "info" | "warn" | "error", string[]>;
};

export function spyLogger(): SpyLogger {
  const calls: SpyLogger["calls"] = { debug: [], info: [], warn: [], error: [] };
  return {
    calls,
    debug(msg: string) {
      calls.debug.push(msg);
    },
    info(msg: string) {
      calls.info.push(msg);
    },
    warn(msg: string) {
      calls.warn.push(msg);
    },
    error(msg: string) {
      calls.error.push(msg);
    },
  };
}

export type Responder = (image: Buffer, profile: OCRProfile) => Promise<string> | string;

/** Deterministic in-process recognition provider */
export function stubProvider(respond: Responder, name: string = "stub"): OCRProvider & {
  recognize: jest.Mock<Promise<OCRResult>, [Buffer, OCRProfile]>;
  terminate: jest.Mock<Promise<void>, []>;
} {
  return {
    name,
    recognize: jest.fn(async (image: Buffer, profile: OCRProfile) => ({
      text: await respond(image, profile),
      confidence: 80,
      provider: name,
    })),
    isAvailable: jest.fn().mockResolvedValue(true),
    terminate: jest.fn().mockResolvedValue(undefined),
  };
}

/** A small solid-colour PNG region */
export async function solidRegion(
  reference: string,
  width: number = 40,
  height: number = 20,
  gray: number = 255,
): Promise<EncodedRegionImage> {
  const data = await sharp({
    create: { width, height, channels: 3, background: { r: gray, g: gray, b: gray } },
  })
    .png()
    .toBuffer();
  return { kind: "encoded", data, reference };
}
