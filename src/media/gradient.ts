import * as crypto from "crypto";

export type Rgb = [number, number, number];

/** Base hues (degrees) a card background is picked from. */
export const BASE_HUES: readonly number[] = [200, 220, 260, 300, 180, 160, 210];

export const GRADIENT_SATURATION = 0.45;
export const TOP_LIGHTNESS = 0.6;
export const BOTTOM_LIGHTNESS = 0.4;
export const BOTTOM_HUE_SHIFT = 40;

function hueChannel(m1: number, m2: number, hue: number): number {
  let h = hue % 1;
  if (h < 0) h += 1;
  if (h < 1 / 6) return m1 + (m2 - m1) * h * 6;
  if (h < 0.5) return m2;
  if (h < 2 / 3) return m1 + (m2 - m1) * (2 / 3 - h) * 6;
  return m1;
}

/** HSL to 8-bit RGB. Hue in degrees, saturation and lightness in [0, 1]. */
export function hslToRgb(hueDeg: number, saturation: number, lightness: number): Rgb {
  const h = hueDeg / 360;
  if (saturation === 0) {
    const v = Math.trunc(lightness * 255);
    return [v, v, v];
  }
  const m2 =
    lightness <= 0.5
      ? lightness * (1 + saturation)
      : lightness + saturation - lightness * saturation;
  const m1 = 2 * lightness - m2;
  return [
    Math.trunc(hueChannel(m1, m2, h + 1 / 3) * 255),
    Math.trunc(hueChannel(m1, m2, h) * 255),
    Math.trunc(hueChannel(m1, m2, h - 1 / 3) * 255),
  ];
}

/** Palette slot for a seed: SHA-256 of its decimal form, first 4 bytes. */
export function pickHue(seed: number): number {
  const digest = crypto.createHash("sha256").update(String(seed), "utf8").digest();
  return BASE_HUES[digest.readUInt32BE(0) % BASE_HUES.length];
}

/** Lighter top color and darker, hue-shifted bottom color for a seed. */
export function pickGradientColors(seed: number): { top: Rgb; bottom: Rgb } {
  const hue = pickHue(seed);
  return {
    top: hslToRgb(hue, GRADIENT_SATURATION, TOP_LIGHTNESS),
    bottom: hslToRgb((hue + BOTTOM_HUE_SHIFT) % 360, GRADIENT_SATURATION, BOTTOM_LIGHTNESS),
  };
}

/**
 * Raw RGB pixels (3 channels, row-major) of a vertical gradient,
 * interpolated linearly per scanline from `top` to `bottom`.
 */
export function renderGradient(width: number, height: number, top: Rgb, bottom: Rgb): Buffer {
  const pixels = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    const ratio = height > 1 ? y / (height - 1) : 0;
    const r = Math.trunc(top[0] * (1 - ratio) + bottom[0] * ratio);
    const g = Math.trunc(top[1] * (1 - ratio) + bottom[1] * ratio);
    const b = Math.trunc(top[2] * (1 - ratio) + bottom[2] * ratio);
    const rowStart = y * width * 3;
    for (let x = 0; x < width; x++) {
      const i = rowStart + x * 3;
      pixels[i] = r;
      pixels[i + 1] = g;
      pixels[i + 2] = b;
    }
  }
  return pixels;
}
