/**
 * Runs one daily post in-process. Does NOT throw or exit; returns a
 * structured PostRecord instead. Shared by the CLI and the HTTP trigger.
 */

import type { ContentResult, PostRecord, RunOptions } from "../contracts";
import type { AppConfig } from "../config";
import { errorMessage } from "../lib/errors";
import { createRunId, runScopedMediaPath } from "../lib/pathSafety";
import { loadTipList } from "../content/tips";
import { resolveContent, type NewsLookup } from "../content/source";
import { fetchTopNews } from "../news/googleNews";
import type { SharpModule } from "../media/backend";
import { ImageComposer, createImageComposer } from "../media/composer";
import { resolveMedia, type CardRenderer, type MediaDeps } from "../media/resolver";
import { createXPoster, type Poster } from "../social/xPoster";

export interface RunDeps {
  config: AppConfig;
  fetchNews?: NewsLookup;
  /**
   * Card renderer. Omit to detect the rendering backend once for this
   * run; pass null to run without one.
   */
  composer?: CardRenderer | null;
  poster?: Poster;
  searchImages?: MediaDeps["searchImages"];
  downloadImage?: MediaDeps["downloadImage"];
  /** Selection day (default: today). */
  date?: Date;
  runId?: string;
}

export function wantsImage(options: RunOptions): boolean {
  return !options.disableImages && options.imageSource !== "none";
}

/**
 * Rendering capability for one run. Downloads are validated with the
 * composer's backend when there is one.
 */
async function detectRendering(
  deps: RunDeps
): Promise<{ composer: CardRenderer | null; backend: SharpModule | null }> {
  const composer = deps.composer !== undefined ? deps.composer : await createImageComposer();
  return {
    composer,
    backend: composer instanceof ImageComposer ? composer.backend : null,
  };
}

export async function runDailyPost(options: RunOptions, deps: RunDeps): Promise<PostRecord> {
  let content: ContentResult;
  let outputPath: string;
  try {
    outputPath = runScopedMediaPath(deps.config.mediaDir, deps.runId ?? createRunId());
    content = await resolveContent({
      tips: loadTipList(options.tipsFile),
      newsTopic: options.newsTopic,
      date: deps.date,
      fetchNews: deps.fetchNews ?? fetchTopNews,
    });
  } catch (err) {
    return { ok: false, dryRun: options.dryRun, text: "", mediaPath: null, error: errorMessage(err) };
  }

  let mediaPath: string | null = null;
  if (wantsImage(options)) {
    const rendering = await detectRendering(deps);
    mediaPath = await resolveMedia(
      {
        content,
        disableImages: options.disableImages,
        source: options.imageSource,
        imageQuery: options.imageQuery,
        outputPath,
      },
      {
        composer: rendering.composer,
        backend: rendering.backend,
        google: deps.config.google,
        searchImages: deps.searchImages,
        downloadImage: deps.downloadImage,
      }
    );
  }

  if (options.dryRun) {
    return { ok: true, dryRun: true, text: content.text, mediaPath };
  }

  const poster = deps.poster ?? createXPoster(deps.config.twitter);
  try {
    await poster.post(content.text, mediaPath);
  } catch (err) {
    return {
      ok: false,
      dryRun: false,
      text: content.text,
      mediaPath,
      error: errorMessage(err),
    };
  }

  return { ok: true, dryRun: false, text: content.text, mediaPath };
}
