/**
 * TallyScan – Adaptive Gaussian binarisation
 *
 * sharp only offers a global threshold, which washes out the faint grey
 * timestamps on statement screenshots. Each pixel is compared with the
 * Gaussian-weighted mean of its blockSize × blockSize neighbourhood instead
 * (replicated borders, σ derived from the block size).
 */

/** σ for a kernel of `size` taps, matching the common OpenCV derivation */
export function sigmaForBlock(size: number): number {
  return 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
}

/** Normalised 1-D Gaussian kernel */
export function gaussianKernel(size: number): Float64Array {
  const sigma = sigmaForBlock(size);
  const half = (size - 1) / 2;
  const kernel = new Float64Array(size);
  let sum = 0;
  for (let i = 0; i < size; i++) {
    const x = i - half;
    kernel[i] = Math.exp(-(x * x) / (2 * sigma * sigma));
    sum += kernel[i];
  }
  for (let i = 0; i < size; i++) kernel[i] /= sum;
  return kernel;
}

function clampIndex(i: number, max: number): number {
  return i < 0 ? 0 : i > max ? max : i;
}

/**
 * Binarise a single-channel image.
 *
 * A pixel becomes 255 when it is brighter than `mean − c`, 0 otherwise.
 */
export function adaptiveThreshold(
  src: Uint8Array,
  width: number,
  height: number,
  blockSize: number,
  c: number,
): Uint8Array {
  const kernel = gaussianKernel(blockSize);
  const half = (blockSize - 1) / 2;
  const horizontal = new Float64Array(width * height);
  const dst = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < blockSize; k++) {
        acc += kernel[k] * src[row + clampIndex(x + k - half, width - 1)];
      }
      horizontal[row + x] = acc;
    }
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let mean = 0;
      for (let k = 0; k < blockSize; k++) {
        mean += kernel[k] * horizontal[clampIndex(y + k - half, height - 1) * width + x];
      }
      const i = y * width + x;
      dst[i] = src[i] > mean - c ? 255 : 0;
    }
  }

  return dst;
}
