/**
 * TallyScan – Image preprocessing
 *
 * Region image → grayscale → (downscale) → median denoise → CLAHE →
 * adaptive threshold. Every step is a pure transform; the input buffer is
 * never touched. Decoding failures surface as ImageLoadError so the region
 * pipeline can skip just this region.
 */

import sharp from "sharp";

import type { PreprocessConfig } from "../core/config";
import { ImageLoadError } from "../core/errors";
import type { GeometricVariant } from "../ocr/profiles";
import type { PreparedImage, RegionImage } from "../schema/TransactionRecord";
import type { TallyScanLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { adaptiveThreshold } from "./adaptiveThreshold";

interface GrayImage {
  data: Buffer;
  width: number;
  height: number;
}

/** Keep only the first channel of an interleaved buffer */
function firstChannel(data: Buffer, channels: number): Buffer {
  if (channels === 1) return data;
  const out = Buffer.alloc(Math.floor(data.length / channels));
  for (let i = 0; i < out.length; i++) out[i] = data[i * channels];
  return out;
}

function fromGray(image: GrayImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: 1 },
  });
}

async function toGray(pipeline: sharp.Sharp): Promise<GrayImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return {
    data: firstChannel(data, info.channels),
    width: info.width,
    height: info.height,
  };
}

export class ImagePreprocessor {
  private readonly config: PreprocessConfig;
  private readonly logger: TallyScanLogger;

  constructor(config: PreprocessConfig, logger: TallyScanLogger = silentLogger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Normalise a region for recognition.
   *
   * @throws ImageLoadError when the region cannot be decoded
   */
  async prepare(region: RegionImage): Promise<PreparedImage> {
    let gray: GrayImage;
    try {
      gray = await toGray(
        this.open(region)
          .removeAlpha()
          .toColourspace("b-w")
          .resize({
            width: this.config.maxWidth,
            withoutEnlargement: true,
            kernel: "lanczos3",
          }),
      );
    } catch (err) {
      if (err instanceof ImageLoadError) throw err;
      throw new ImageLoadError(
        `Could not decode image: ${err instanceof Error ? err.message : String(err)}`,
        region.reference,
        err,
      );
    }

    if (gray.width === 0 || gray.height === 0) {
      throw new ImageLoadError("Decoded image is empty", region.reference);
    }

    this.logger.debug(
      `Preprocessing ${region.reference}: ${gray.width}x${gray.height}`,
    );

    if (this.config.denoise) {
      gray = await toGray(fromGray(gray).median(3));
    }

    const { tiles, maxSlope } = this.config.clahe;
    gray = await toGray(
      fromGray(gray).clahe({
        width: Math.max(1, Math.ceil(gray.width / tiles)),
        height: Math.max(1, Math.ceil(gray.height / tiles)),
        maxSlope,
      }),
    );

    const { blockSize, c } = this.config.threshold;
    const binary = adaptiveThreshold(gray.data, gray.width, gray.height, blockSize, c);

    return {
      data: Buffer.from(binary.buffer, binary.byteOffset, binary.byteLength),
      width: gray.width,
      height: gray.height,
    };
  }

  /** Encode one geometric variant of a prepared image as PNG */
  async renderVariant(
    prepared: PreparedImage,
    variant: GeometricVariant,
  ): Promise<Buffer> {
    const base = fromGray(prepared);
    const { width, height } = prepared;

    switch (variant.kind) {
      case "full":
        return base.png().toBuffer();
      case "crop": {
        const left = Math.min(width - 1, Math.round(variant.box.left * width));
        const top = Math.min(height - 1, Math.round(variant.box.top * height));
        return base
          .extract({
            left,
            top,
            width: Math.max(1, Math.min(width - left, Math.round(variant.box.width * width))),
            height: Math.max(1, Math.min(height - top, Math.round(variant.box.height * height))),
          })
          .png()
          .toBuffer();
      }
      case "scale":
        return base
          .resize({
            width: Math.max(1, Math.round(width * variant.factor)),
            height: Math.max(1, Math.round(height * variant.factor)),
            fit: "fill",
            kernel: "cubic",
          })
          .png()
          .toBuffer();
    }
  }

  private open(region: RegionImage): sharp.Sharp {
    if (region.kind === "encoded") {
      if (!region.data || region.data.length === 0) {
        throw new ImageLoadError("Image buffer is empty", region.reference);
      }
      return sharp(region.data);
    }

    const { pixels, width, height, channels } = region;
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0 ||
      pixels.length !== width * height * channels
    ) {
      throw new ImageLoadError(
        `Raw buffer of ${pixels.length} bytes does not match ${width}x${height}x${channels}`,
        region.reference,
      );
    }
    return sharp(pixels, { raw: { width, height, channels } });
  }
}
