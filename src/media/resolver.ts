/**
 * Media fallback chain for one post.
 *
 *   none / images disabled  -> no image (success)
 *   google                  -> image search + download, else generated
 *   generated (default)     -> composed card
 *
 * Every stage failure degrades to the next; only an unavailable
 * composer ends the chain with "no image". Nothing here throws.
 */

import type { ContentResult, ImageSource } from "../contracts";
import type { GoogleSearchCredentials } from "../config";
import { errorMessage } from "../lib/errors";
import { firstWords } from "../content/postText";
import type { SharpModule } from "./backend";
import type { ImageComposer } from "./composer";
import { searchImages } from "./imageSearch";
import { downloadImage } from "./download";

export const DEFAULT_IMAGE_QUERY = "technology";

/** Minimal composer surface the resolver needs. */
export type CardRenderer = Pick<ImageComposer, "render">;

export interface MediaRequest {
  content: ContentResult;
  disableImages: boolean;
  source: ImageSource;
  /** Explicit search query; overrides the content's query hint. */
  imageQuery: string;
  /** Run-scoped destination for the image file. */
  outputPath: string;
}

export interface MediaDeps {
  /** null when the rendering backend is unavailable. */
  composer: CardRenderer | null;
  /** Backend used to validate downloads; null skips validation. */
  backend: SharpModule | null;
  google: GoogleSearchCredentials;
  searchImages?: typeof searchImages;
  downloadImage?: typeof downloadImage;
}

/** First non-blank candidate, cut to 8 words; "technology" when all are blank. */
export function deriveImageQuery(candidates: Array<string | undefined>): string {
  for (const candidate of candidates) {
    if (candidate && candidate.trim()) {
      return firstWords(candidate);
    }
  }
  return DEFAULT_IMAGE_QUERY;
}

export async function resolveMedia(request: MediaRequest, deps: MediaDeps): Promise<string | null> {
  if (request.disableImages || request.source === "none") {
    return null;
  }

  if (request.source === "google") {
    const fetched = await fetchSearchImage(request, deps);
    if (fetched) {
      return fetched;
    }
    console.log("[media] Falling back to generated image.");
  }

  return composeCard(request, deps.composer);
}

async function fetchSearchImage(request: MediaRequest, deps: MediaDeps): Promise<string | null> {
  const search = deps.searchImages ?? searchImages;
  const download = deps.downloadImage ?? downloadImage;
  const query = deriveImageQuery([request.imageQuery, request.content.queryHint]);

  const candidates = await search(query, deps.google);
  if (!candidates || candidates.length === 0) {
    return null;
  }

  try {
    const saved = await download(candidates[0], request.outputPath, deps.backend);
    console.log(`[media] Attached searched image for query: '${query}'.`);
    return saved;
  } catch (err) {
    console.warn(`[media] Failed to fetch searched image: ${errorMessage(err)}`);
    return null;
  }
}

async function composeCard(
  request: MediaRequest,
  composer: CardRenderer | null
): Promise<string | null> {
  if (!composer) {
    console.log("[media] Image rendering unavailable; skipping image.");
    return null;
  }
  try {
    return await composer.render(
      request.content.imageText,
      request.content.imageSeed,
      request.outputPath
    );
  } catch (err) {
    console.warn(`[media] Image generation failed: ${errorMessage(err)}`);
    return null;
  }
}
