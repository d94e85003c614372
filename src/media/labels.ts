/**
 * Header pill and text markup for generated cards.
 */

export const HEADER_TEXT = "Code Tip";
export const HEADER_X = 60;
export const HEADER_Y = 60;
export const HEADER_PADDING_H = 24;
export const HEADER_PADDING_V = 16;
export const HEADER_BORDER_RADIUS = 16;
export const HEADER_BG_COLOR = "#000000";

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Pill around a header text block whose top-left is (HEADER_X, HEADER_Y). */
export function headerBox(textWidth: number, textHeight: number): Box {
  return {
    x: HEADER_X - HEADER_PADDING_H,
    y: HEADER_Y - HEADER_PADDING_V,
    width: textWidth + HEADER_PADDING_H * 2,
    height: textHeight + HEADER_PADDING_V * 2,
  };
}

/**
 * Full-canvas SVG overlay with the filled rounded rectangle behind the
 * header text.
 */
export function createHeaderPillSvg(canvasWidth: number, canvasHeight: number, box: Box): Buffer {
  const svg = `
<svg width="${canvasWidth}" height="${canvasHeight}" xmlns="http://www.w3.org/2000/svg">
  <rect
    x="${box.x}"
    y="${box.y}"
    width="${box.width}"
    height="${box.height}"
    rx="${HEADER_BORDER_RADIUS}"
    ry="${HEADER_BORDER_RADIUS}"
    fill="${HEADER_BG_COLOR}"
  />
</svg>`;

  return Buffer.from(svg);
}

/** Escape text for Pango markup. */
export function escapeMarkup(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Pango markup drawing `text` in a solid `#rrggbb` color. */
export function coloredMarkup(text: string, color: string): string {
  return `<span foreground="${color}">${escapeMarkup(text)}</span>`;
}
