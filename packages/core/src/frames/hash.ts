/**
 * Perceptual hashing (pHash) for extracted frames.
 *
 * Algorithm:
 * 1. Drop alpha, convert to grayscale, resize to (hashSize * highFreqFactor)^2
 * 2. 2-D DCT-II over the thumbnail
 * 3. Keep the top-left hashSize x hashSize low-frequency block
 * 4. Each coefficient: 1 if > median of the block, else 0
 *
 * Bits are packed row-major with the first coefficient in the most
 * significant bit. Distance is the Hamming distance between two hashes of the
 * same width.
 */

import sharp from "sharp";
import { DecodeError } from "../errors";

export interface Fingerprint {
  value: bigint;
  /** Width in bits (hashSize^2) */
  bits: number;
}

export interface PerceptualHashOpts {
  /** Side of the low-frequency block; the hash has hashSize^2 bits (default 8) */
  hashSize?: number;
  /** Thumbnail side = hashSize * highFreqFactor (default 4) */
  highFreqFactor?: number;
}

export type FingerprintFn<T> = (frame: T) => Promise<Fingerprint>;

export function fingerprintFromBigInt(value: bigint, bits: number): Fingerprint {
  if (!Number.isInteger(bits) || bits <= 0) {
    throw new RangeError(`Fingerprint width must be a positive integer, got ${bits}`);
  }
  if (value < 0n || value >> BigInt(bits) !== 0n) {
    throw new RangeError(`Fingerprint value does not fit in ${bits} bits`);
  }
  return { value, bits };
}

export function fingerprintToHex(fp: Fingerprint): string {
  return fp.value.toString(16).padStart(Math.ceil(fp.bits / 4), "0");
}

/**
 * Number of differing bits. Only defined for fingerprints of equal width.
 */
export function hammingDistance(a: Fingerprint, b: Fingerprint): number {
  if (a.bits !== b.bits) {
    throw new RangeError(`Cannot compare fingerprints of different widths (${a.bits} vs ${b.bits})`);
  }
  let xor = a.value ^ b.value;
  let count = 0;
  while (xor > 0n) {
    count += Number(xor & 1n);
    xor >>= 1n;
  }
  return count;
}

const cosTables = new Map<number, Float64Array>();

function cosTable(n: number): Float64Array {
  const cached = cosTables.get(n);
  if (cached) return cached;
  const table = new Float64Array(n * n);
  for (let k = 0; k < n; k++) {
    for (let i = 0; i < n; i++) {
      table[k * n + i] = Math.cos((Math.PI * k * (2 * i + 1)) / (2 * n));
    }
  }
  cosTables.set(n, table);
  return table;
}

/**
 * Low-frequency block of the (unnormalised) 2-D DCT-II of a square image.
 * Result is row-major, `keep * keep` long.
 */
export function dctLowFrequencies(pixels: ArrayLike<number>, side: number, keep: number): Float64Array {
  if (pixels.length !== side * side) {
    throw new RangeError(`Expected ${side * side} pixels, got ${pixels.length}`);
  }
  if (keep > side) throw new RangeError(`Cannot keep ${keep} coefficients of a ${side}px image`);
  const table = cosTable(side);

  // Columns first: colPass[u * side + x] = sum_y pixel[y][x] * cos(u, y)
  const colPass = new Float64Array(keep * side);
  for (let u = 0; u < keep; u++) {
    for (let x = 0; x < side; x++) {
      let sum = 0;
      for (let y = 0; y < side; y++) sum += pixels[y * side + x] * table[u * side + y];
      colPass[u * side + x] = sum;
    }
  }

  const out = new Float64Array(keep * keep);
  for (let u = 0; u < keep; u++) {
    for (let v = 0; v < keep; v++) {
      let sum = 0;
      for (let x = 0; x < side; x++) sum += colPass[u * side + x] * table[v * side + x];
      out[u * keep + v] = sum;
    }
  }
  return out;
}

function median(values: ArrayLike<number>): number {
  const sorted = Array.from(values).sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Threshold coefficients against their median and pack them MSB-first. */
export function fingerprintFromCoefficients(coefficients: ArrayLike<number>): Fingerprint {
  const med = median(coefficients);
  let value = 0n;
  for (let i = 0; i < coefficients.length; i++) {
    value <<= 1n;
    if (coefficients[i] > med) value |= 1n;
  }
  return fingerprintFromBigInt(value, coefficients.length);
}

async function loadGrayThumbnail(imagePath: string, side: number): Promise<Uint8Array> {
  let data: Buffer;
  let channels: number;
  try {
    const res = await sharp(imagePath)
      .removeAlpha()
      .grayscale()
      .resize(side, side, { fit: "fill" })
      .raw()
      .toBuffer({ resolveWithObject: true });
    data = res.data;
    channels = res.info.channels;
  } catch (err) {
    throw new DecodeError(imagePath, { cause: err });
  }

  if (channels === 1) return data;
  const gray = new Uint8Array(side * side);
  for (let i = 0; i < gray.length; i++) gray[i] = data[i * channels];
  return gray;
}

/**
 * Compute the perceptual hash of an image file.
 * Rejects with DecodeError when the file cannot be decoded.
 */
export async function computePerceptualHash(imagePath: string, opts?: PerceptualHashOpts): Promise<Fingerprint> {
  const hashSize = opts?.hashSize ?? 8;
  const side = hashSize * (opts?.highFreqFactor ?? 4);
  const pixels = await loadGrayThumbnail(imagePath, side);
  return fingerprintFromCoefficients(dctLowFrequencies(pixels, side, hashSize));
}
