/**
 * packages/node/src/png.ts: RGBA8 bitmap → PNG bytes.
 *
 * Truecolor with alpha, 8 bits per channel, no interlace. Every scanline uses
 * filter type 0; the image data is zlib-compressed with node:zlib.
 */

import { deflateSync } from "node:zlib";
import type { BitmapSource } from "@sketchpad/core";

export const PNG_SIGNATURE: Uint8Array = Uint8Array.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
]);

const COLOR_TYPE_RGBA = 6;
const FILTER_NONE = 0;

const CRC_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    table[n] = c >>> 0;
  }
  return table;
})();

/** CRC-32 (ISO-HDLC) of `data[start, start + length)`. */
export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
  let crc = 0xffffffff;
  for (let i = start; i < start + length; i++) {
    crc = (CRC_TABLE[(crc ^ (data[i] ?? 0)) & 0xff] ?? 0) ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function writeU32BE(out: Uint8Array, offset: number, value: number): void {
  out[offset] = (value >>> 24) & 0xff;
  out[offset + 1] = (value >>> 16) & 0xff;
  out[offset + 2] = (value >>> 8) & 0xff;
  out[offset + 3] = value & 0xff;
}

/** length | type | data | crc(type + data) */
export function pngChunk(type: string, data: Uint8Array): Uint8Array {
  if (!/^[A-Za-z]{4}$/.test(type)) throw new TypeError(`pngChunk: bad chunk type "${type}"`);
  const chunk = new Uint8Array(12 + data.length);
  writeU32BE(chunk, 0, data.length);
  for (let i = 0; i < 4; i++) chunk[4 + i] = type.charCodeAt(i);
  chunk.set(data, 8);
  writeU32BE(chunk, 8 + data.length, crc32(chunk, 4, data.length + 4));
  return chunk;
}

function ihdr(width: number, height: number): Uint8Array {
  const data = new Uint8Array(13);
  writeU32BE(data, 0, width);
  writeU32BE(data, 4, height);
  data[8] = 8;
  data[9] = COLOR_TYPE_RGBA;
  // compression, filter and interlace methods stay 0
  return pngChunk("IHDR", data);
}

function scanlines(width: number, height: number, rgba: Uint8Array): Uint8Array {
  const stride = width * 4;
  const out = new Uint8Array((stride + 1) * height);
  for (let y = 0; y < height; y++) {
    const row = y * (stride + 1);
    out[row] = FILTER_NONE;
    out.set(rgba.subarray(y * stride, (y + 1) * stride), row + 1);
  }
  return out;
}

/** Encode `width`×`height` straight-alpha RGBA8 pixels. */
export function encodePng(width: number, height: number, rgba: Uint8Array): Uint8Array {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new TypeError("encodePng: width and height must be positive integers");
  }
  if (rgba.length !== width * height * 4) {
    throw new TypeError(
      `encodePng: expected ${String(width * height * 4)} bytes, got ${String(rgba.length)}`,
    );
  }
  const idat = pngChunk("IDAT", new Uint8Array(deflateSync(scanlines(width, height, rgba))));
  const parts = [PNG_SIGNATURE, ihdr(width, height), idat, pngChunk("IEND", new Uint8Array(0))];
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

export function encodeBitmap(source: BitmapSource): Uint8Array {
  return encodePng(source.width, source.height, source.pixels());
}
