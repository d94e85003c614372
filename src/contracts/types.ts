/**
 * Shared contract types for the daily post pipeline.
 *
 * Content, media and pipeline modules import shared types from here.
 * No module should import types from a peer module's implementation file.
 */

// --- Content ---

export type SourceKind = "tip" | "news";

/** Headline returned by the news-lookup collaborator. */
export interface NewsItem {
  title: string;
  link: string;
}

/**
 * Text selected for today's post, plus the material the media stage
 * renders or searches with.
 */
export interface ContentResult {
  /** Final post text, decoration included (<= 280 chars). */
  text: string;
  /** Short image-search seed derived from the selected content. */
  queryHint: string;
  sourceKind: SourceKind;
  /** Text drawn on a generated card. */
  imageText: string;
  /** Gradient seed for a generated card. */
  imageSeed: number;
  news?: NewsItem;
}

// --- Media ---

/** "generated" renders a card, "google" searches first, "none" attaches nothing. */
export type ImageSource = "generated" | "google" | "none";

export const IMAGE_SOURCES: readonly ImageSource[] = ["generated", "google", "none"];

export function isImageSource(value: string): value is ImageSource {
  return IMAGE_SOURCES.some((source) => source === value);
}

// --- Run ---

export interface RunOptions {
  dryRun: boolean;
  disableImages: boolean;
  tipsFile: string;
  imageSource: ImageSource;
  imageQuery: string;
  newsTopic: string;
}

/** Externally observable result of one run. */
export interface PostRecord {
  ok: boolean;
  dryRun: boolean;
  text: string;
  mediaPath: string | null;
  error?: string;
}
