import { describe, it, expect } from "vitest";
import {
  BASE_HUES,
  hslToRgb,
  pickGradientColors,
  pickHue,
  renderGradient,
} from "../../src/media/gradient";
import { CANVAS_HEIGHT, CANVAS_WIDTH } from "../../src/media/composer";

function pixelAt(pixels: Buffer, width: number, x: number, y: number): number[] {
  const i = (y * width + x) * 3;
  return [pixels[i], pixels[i + 1], pixels[i + 2]];
}

describe("hslToRgb", () => {
  it("converts the palette's top and bottom shades", () => {
    expect(hslToRgb(210, 0.45, 0.6)).toEqual([107, 152, 198]);
    expect(hslToRgb(250, 0.45, 0.4)).toEqual([71, 56, 147]);
  });

  it("returns grey when saturation is zero", () => {
    expect(hslToRgb(123, 0, 0.5)).toEqual([127, 127, 127]);
  });
});

describe("pickGradientColors", () => {
  it("picks hues from the fixed palette", () => {
    for (let seed = 0; seed < 30; seed++) {
      expect(BASE_HUES).toContain(pickHue(seed));
    }
  });

  it("maps seeds to known palette entries", () => {
    expect(pickHue(0)).toBe(210);
    expect(pickHue(1)).toBe(160);
    expect(pickHue(2)).toBe(220);
    expect(pickHue(7)).toBe(200);
    expect(pickHue(12)).toBe(180);
  });

  it("derives a lighter top and a 40-degree-shifted darker bottom", () => {
    expect(pickGradientColors(0)).toEqual({ top: [107, 152, 198], bottom: [71, 56, 147] });
    expect(pickGradientColors(7)).toEqual({ top: [107, 168, 198], bottom: [56, 56, 147] });
  });
});

describe("renderGradient", () => {
  it("is pixel-identical for the same seed", () => {
    const a = pickGradientColors(42);
    const b = pickGradientColors(42);
    const first = renderGradient(CANVAS_WIDTH, CANVAS_HEIGHT, a.top, a.bottom);
    const second = renderGradient(CANVAS_WIDTH, CANVAS_HEIGHT, b.top, b.bottom);
    expect(first.equals(second)).toBe(true);
  });

  it("differs for seeds with different hues", () => {
    const a = pickGradientColors(0);
    const b = pickGradientColors(1);
    const first = renderGradient(4, 4, a.top, a.bottom);
    const second = renderGradient(4, 4, b.top, b.bottom);
    expect(first.equals(second)).toBe(false);
  });

  it("starts at the top color and ends at the bottom color", () => {
    const { top, bottom } = pickGradientColors(0);
    const pixels = renderGradient(CANVAS_WIDTH, CANVAS_HEIGHT, top, bottom);
    expect(pixels.length).toBe(CANVAS_WIDTH * CANVAS_HEIGHT * 3);
    expect(pixelAt(pixels, CANVAS_WIDTH, 0, 0)).toEqual([107, 152, 198]);
    expect(pixelAt(pixels, CANVAS_WIDTH, CANVAS_WIDTH - 1, CANVAS_HEIGHT - 1)).toEqual([71, 56, 147]);
  });

  it("interpolates linearly per scanline", () => {
    const { top, bottom } = pickGradientColors(0);
    const pixels = renderGradient(CANVAS_WIDTH, CANVAS_HEIGHT, top, bottom);
    // Row 337 of 675 is exactly halfway.
    expect(pixelAt(pixels, CANVAS_WIDTH, 0, 337)).toEqual([89, 104, 172]);
    expect(pixelAt(pixels, CANVAS_WIDTH, 600, 337)).toEqual([89, 104, 172]);
  });
});
