import { readFileSync } from "node:fs";

/**
 * Storage layout of one ffmpeg pixel format as it appears on a rawvideo pipe.
 * Width and height must be multiples of `2 ** log2Align*` (chroma subsampling
 * or bit packing), otherwise ffmpeg pads rows/planes and the frame size cannot
 * be derived from bits per pixel alone.
 */
export interface PixelFormatInfo {
  bitsPerPixel: number;
  log2AlignWidth: number;
  log2AlignHeight: number;
}

function isPixelFormatInfo(value: unknown): value is PixelFormatInfo {
  if (typeof value !== "object" || value === null) return false;
  return (
    "bitsPerPixel" in value &&
    "log2AlignWidth" in value &&
    "log2AlignHeight" in value &&
    Number.isInteger(value.bitsPerPixel) &&
    Number.isInteger(value.log2AlignWidth) &&
    Number.isInteger(value.log2AlignHeight)
  );
}

function loadPixelFormats(): ReadonlyMap<string, PixelFormatInfo> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../data/pixel-formats.json", import.meta.url), "utf8")
  );
  if (typeof raw !== "object" || raw === null) {
    throw new Error("pixel-formats.json must contain an object");
  }
  const table = new Map<string, PixelFormatInfo>();
  for (const [name, entry] of Object.entries(raw)) {
    if (!isPixelFormatInfo(entry)) {
      throw new Error(`pixel-formats.json: malformed entry for "${name}"`);
    }
    table.set(name, entry);
  }
  return table;
}

const PIXEL_FORMATS = loadPixelFormats();

export function getPixelFormatInfo(pixFmt: string): PixelFormatInfo | undefined {
  return PIXEL_FORMATS.get(pixFmt);
}

/** Bits per pixel as stored on the pipe (10/12-bit samples occupy 16 bits). */
export function getBitsPerPixel(pixFmt: string): number | undefined {
  return PIXEL_FORMATS.get(pixFmt)?.bitsPerPixel;
}

/**
 * Byte size of one whole frame, or `undefined` if it cannot be known exactly.
 * Bits are totalled over the frame before dividing by 8, so subsampled
 * formats such as yuv420p (12 bits per pixel) are not truncated per pixel.
 */
export function getBytesPerFrame(pixFmt: string, width: number, height: number): number | undefined {
  const info = PIXEL_FORMATS.get(pixFmt);
  if (!info) return undefined;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return undefined;
  }
  if (width % 2 ** info.log2AlignWidth !== 0 || height % 2 ** info.log2AlignHeight !== 0) {
    return undefined;
  }
  const bits = info.bitsPerPixel * width * height;
  if (bits % 8 !== 0) return undefined;
  return bits / 8;
}
