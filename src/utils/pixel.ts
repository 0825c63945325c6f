import type { Rgb } from '../types/raster.js';

const CHANNEL_MASK = 0x1f;
const CHANNEL_SHIFT = 3;

/**
 * Expands a 5-5-5 packed color code into 8-bit channels.
 * Each 5-bit field is shifted left by 3, so channels are multiples of 8 in [0, 248].
 * Bit 15 is ignored.
 */
export function unpackPixel(code: number): Rgb {
  const red = ((code >>> 10) & CHANNEL_MASK) << CHANNEL_SHIFT;
  const green = ((code >>> 5) & CHANNEL_MASK) << CHANNEL_SHIFT;
  const blue = (code & CHANNEL_MASK) << CHANNEL_SHIFT;
  return [red, green, blue];
}
