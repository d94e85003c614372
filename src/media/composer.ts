/**
 * Text-to-image composition.
 *
 * Renders a fixed 1200x675 card: seeded vertical gradient, a "Code Tip"
 * pill top-left, the word-wrapped body centered line by line, and a
 * hashtag footer. Output is a JPEG at fixed quality.
 *
 * Text is rendered and measured through sharp's Pango text input, so
 * wrapping decisions use the exact pixel widths that get drawn.
 */

import * as fs from "fs";
import * as path from "path";
import type { OverlayOptions } from "sharp";
import { loadRenderBackend, type SharpModule } from "./backend";
import { resolveFont, FONT_CANDIDATES, type FontChoice } from "./fonts";
import { pickGradientColors, renderGradient } from "./gradient";
import { wrapLines } from "./wrap";
import {
  HEADER_TEXT,
  HEADER_X,
  HEADER_Y,
  coloredMarkup,
  createHeaderPillSvg,
  headerBox,
  type Box,
} from "./labels";

export const CANVAS_WIDTH = 1200;
export const CANVAS_HEIGHT = 675;
export const TEXT_MAX_WIDTH = CANVAS_WIDTH - 120;
export const TITLE_FONT_SIZE = 56;
export const BODY_FONT_SIZE = 36;
export const BODY_TOP_GAP = 48;
export const LINE_SPACING = 12;
export const FOOTER_TEXT = "#coding  #programming  #devtips";
export const FOOTER_BOTTOM_MARGIN = 40;
export const JPEG_QUALITY = 92;

const TEXT_COLOR = "#FFFFFF";
const FOOTER_COLOR = "#E6E6E6";

export type TextRole = "title" | "body" | "footer";

export interface TextSize {
  width: number;
  height: number;
}

export type MeasureText = (text: string, role: TextRole) => Promise<TextSize>;

export interface PlacedText {
  text: string;
  role: TextRole;
  left: number;
  top: number;
}

/** Pixel positions for every element on a card. */
export interface CardLayout {
  pill: Box;
  texts: PlacedText[];
  /** Wrapped body lines, including any that did not fit on the canvas. */
  bodyLines: string[];
}

/**
 * Lay out a card. Body lines that would cross the bottom of the canvas
 * are not placed.
 */
export async function planCard(text: string, measure: MeasureText): Promise<CardLayout> {
  const header = await measure(HEADER_TEXT, "title");
  const texts: PlacedText[] = [
    { text: HEADER_TEXT, role: "title", left: HEADER_X, top: HEADER_Y },
  ];

  const bodyLines = await wrapLines(
    text,
    async (line) => (await measure(line, "body")).width,
    TEXT_MAX_WIDTH
  );

  let y = HEADER_Y + header.height + BODY_TOP_GAP;
  for (const line of bodyLines) {
    const size = await measure(line, "body");
    if (y + size.height > CANVAS_HEIGHT) {
      break;
    }
    texts.push({ text: line, role: "body", left: centeredLeft(size.width), top: y });
    y += size.height + LINE_SPACING;
  }

  const footer = await measure(FOOTER_TEXT, "footer");
  texts.push({
    text: FOOTER_TEXT,
    role: "footer",
    left: centeredLeft(footer.width),
    top: Math.max(0, CANVAS_HEIGHT - footer.height - FOOTER_BOTTOM_MARGIN),
  });

  return { pill: headerBox(header.width, header.height), texts, bodyLines };
}

function centeredLeft(width: number): number {
  return Math.max(0, Math.floor((CANVAS_WIDTH - width) / 2));
}

interface RenderedText extends TextSize {
  png: Buffer;
}

export class ImageComposer {
  readonly backend: SharpModule;
  readonly font: FontChoice;

  constructor(backend: SharpModule, font: FontChoice) {
    this.backend = backend;
    this.font = font;
  }

  /**
   * Render `text` onto a card seeded by `seed` and save it as a JPEG at
   * `outputPath`. Same (text, seed) = same card.
   */
  async render(text: string, seed: number, outputPath: string): Promise<string> {
    const cache = new Map<string, RenderedText>();
    const rendered = (value: string, role: TextRole): Promise<RenderedText> =>
      this.renderText(value, role, cache);

    const layout = await planCard(text, rendered);
    const { top, bottom } = pickGradientColors(seed);
    const background = renderGradient(CANVAS_WIDTH, CANVAS_HEIGHT, top, bottom);

    const layers: OverlayOptions[] = [
      { input: createHeaderPillSvg(CANVAS_WIDTH, CANVAS_HEIGHT, layout.pill), top: 0, left: 0 },
    ];
    for (const placed of layout.texts) {
      const image = await rendered(placed.text, placed.role);
      layers.push({ input: image.png, top: placed.top, left: placed.left });
    }

    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    await this.backend(background, {
      raw: { width: CANVAS_WIDTH, height: CANVAS_HEIGHT, channels: 3 },
    })
      .composite(layers)
      .jpeg({ quality: JPEG_QUALITY })
      .toFile(outputPath);

    return outputPath;
  }

  /** Pixel size of `text` as it would be drawn in `role`'s font. */
  async measure(text: string, role: TextRole): Promise<TextSize> {
    const { width, height } = await this.renderText(text, role, new Map());
    return { width, height };
  }

  private async renderText(
    text: string,
    role: TextRole,
    cache: Map<string, RenderedText>
  ): Promise<RenderedText> {
    const key = `${role}\u0000${text}`;
    const hit = cache.get(key);
    if (hit) {
      return hit;
    }

    const size = role === "title" ? TITLE_FONT_SIZE : BODY_FONT_SIZE;
    const color = role === "footer" ? FOOTER_COLOR : TEXT_COLOR;
    const { data, info } = await this.backend({
      text: {
        text: coloredMarkup(text, color),
        font: `${this.font.family} ${size}`,
        fontfile: this.font.path ?? undefined,
        dpi: 72,
        rgba: true,
      },
    })
      .png()
      .toBuffer({ resolveWithObject: true });

    let png = data;
    let width = info.width;
    let height = info.height;
    // Overlays larger than the canvas are rejected by composite; crop them.
    if (width > CANVAS_WIDTH || height > CANVAS_HEIGHT) {
      width = Math.min(width, CANVAS_WIDTH);
      height = Math.min(height, CANVAS_HEIGHT);
      png = await this.backend(data).extract({ left: 0, top: 0, width, height }).png().toBuffer();
    }

    const result: RenderedText = { png, width, height };
    cache.set(key, result);
    return result;
  }
}

export interface ComposerOptions {
  fontCandidates?: readonly FontChoice[];
}

/**
 * Composer bound to the rendering backend, or null when the backend is
 * unavailable. Call once per run.
 */
export async function createImageComposer(options: ComposerOptions = {}): Promise<ImageComposer | null> {
  const backend = await loadRenderBackend();
  if (!backend) {
    return null;
  }
  return new ImageComposer(backend, resolveFont(options.fontCandidates ?? FONT_CANDIDATES));
}
