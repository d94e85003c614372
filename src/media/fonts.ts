import * as fs from "fs";

/** A font file and the Pango family name it provides. */
export interface FontChoice {
  /** null = the backend's built-in sans font */
  path: string | null;
  family: string;
}

/** Known font locations, tried in order. */
export const FONT_CANDIDATES: readonly FontChoice[] = [
  { path: "/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf", family: "DejaVu Sans Bold" },
  { path: "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf", family: "DejaVu Sans" },
  { path: "/System/Library/Fonts/SFNS.ttf", family: "SF NS" },
];

export const BUILTIN_FONT: FontChoice = { path: null, family: "sans" };

/**
 * First candidate whose file exists, else the built-in font. The
 * built-in font renders with lower fidelity but never fails.
 */
export function resolveFont(
  candidates: readonly FontChoice[] = FONT_CANDIDATES,
  exists: (p: string) => boolean = fs.existsSync
): FontChoice {
  for (const candidate of candidates) {
    if (candidate.path && exists(candidate.path)) {
      return candidate;
    }
  }
  console.warn("[composer] No known font found; using built-in font.");
  return BUILTIN_FONT;
}
