/**
 * Rendering backend capability.
 *
 * sharp is loaded once per run through a dynamic import. When it cannot
 * be loaded the run continues without images.
 */

import type sharp from "sharp";
import { RenderUnavailableError, errorMessage } from "../lib/errors";

export type SharpModule = typeof sharp;

/**
 * Dynamic import function for sharp. Swappable for testing.
 * @internal
 */
let _importSharp: () => Promise<SharpModule> = async () => {
  const mod = await import("sharp");
  return mod.default;
};

/** Replace the import function (for testing). Returns the previous function. @internal */
export function _setImportSharp(fn: () => Promise<SharpModule>): () => Promise<SharpModule> {
  const prev = _importSharp;
  _importSharp = fn;
  return prev;
}

/** Throws RenderUnavailableError when sharp cannot be loaded. */
export async function requireRenderBackend(): Promise<SharpModule> {
  try {
    return await _importSharp();
  } catch (err) {
    throw new RenderUnavailableError(`sharp could not be loaded: ${errorMessage(err)}`);
  }
}

/** The loaded backend, or null when rendering is unavailable. */
export async function loadRenderBackend(): Promise<SharpModule | null> {
  try {
    return await requireRenderBackend();
  } catch (err) {
    console.warn(`[composer] ${errorMessage(err)}; images will be skipped.`);
    return null;
  }
}
