/**
 * Byte-level encoding detection and lossy decoding.
 */
import { analyse } from "chardet";
import iconv from "iconv-lite";

/** Only the head of the file is sampled for detection. */
export const DETECTION_SAMPLE_BYTES = 10_000;

/** chardet confidences run 0–100; below this the guess is ignored. */
const MIN_CONFIDENCE = 10;

/**
 * Best statistical guess for `bytes`, or `fallback` when detection is
 * inconclusive or names an encoding iconv-lite cannot decode.
 */
export function detectEncoding(bytes: Uint8Array, fallback: string): string {
  const sample = bytes.subarray(0, DETECTION_SAMPLE_BYTES);
  if (sample.length === 0) return fallback;

  const [best] = analyse(sample);
  if (
    !best ||
    best.confidence < MIN_CONFIDENCE ||
    !iconv.encodingExists(best.name)
  ) {
    return fallback;
  }
  return best.name;
}

/** Undecodable sequences become U+FFFD; a leading BOM is dropped. */
export function decode(bytes: Uint8Array, encoding: string): string {
  const name = iconv.encodingExists(encoding) ? encoding : "utf-8";
  return iconv.decode(Buffer.from(bytes), name);
}
