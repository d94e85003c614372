/**
 * Image search via the Google Custom Search JSON API.
 *
 * Requires GOOGLE_API_KEY and GOOGLE_CSE_ID. Missing credentials are a
 * soft failure: logged, and the caller falls back to a generated card.
 */

import type { GoogleSearchCredentials } from "../config";
import { SourceUnavailableError, errorMessage } from "../lib/errors";
import { SEARCH_TIMEOUT_MS, fetchWithTimeout } from "../lib/http";

export const CUSTOM_SEARCH_ENDPOINT = "https://www.googleapis.com/customsearch/v1";

const PREFERRED_EXTENSIONS = [".jpg", ".jpeg", ".png"];

export function buildSearchUrl(
  query: string,
  apiKey: string,
  cseId: string,
  rightsFilter?: string
): string {
  const params = new URLSearchParams({
    key: apiKey,
    cx: cseId,
    q: query,
    searchType: "image",
    safe: "active",
    num: "10",
  });
  if (rightsFilter) {
    params.set("rights", rightsFilter);
  }
  return `${CUSTOM_SEARCH_ENDPOINT}?${params.toString()}`;
}

/** Non-empty `link` strings from a Custom Search response body, in order. */
export function extractLinks(body: unknown): string[] {
  if (typeof body !== "object" || body === null || !("items" in body)) {
    return [];
  }
  const items = body.items;
  if (!Array.isArray(items)) {
    return [];
  }
  const links: string[] = [];
  for (const item of items) {
    if (typeof item === "object" && item !== null && "link" in item) {
      const link = item.link;
      if (typeof link === "string" && link.length > 0) {
        links.push(link);
      }
    }
  }
  return links;
}

/**
 * Links ending in .jpg/.jpeg/.png; when none do, every link as
 * returned.
 */
export function pickImageCandidates(links: string[]): string[] {
  const preferred = links.filter((link) => {
    const lower = link.toLowerCase();
    return PREFERRED_EXTENSIONS.some((ext) => lower.endsWith(ext));
  });
  return preferred.length > 0 ? preferred : links;
}

/**
 * Ordered candidate image URLs for `query`, or null when search is not
 * configured, fails, or finds nothing.
 */
export async function searchImages(
  query: string,
  credentials: GoogleSearchCredentials
): Promise<string[] | null> {
  const { apiKey, cseId, rightsFilter } = credentials;
  if (!apiKey || !cseId) {
    console.log("[search] Google API not configured; skipping image search.");
    return null;
  }

  try {
    const candidates = await requestImageCandidates(
      buildSearchUrl(query, apiKey, cseId, rightsFilter)
    );
    return candidates;
  } catch (err) {
    console.warn(`[search] Failed to search images: ${errorMessage(err)}`);
    return null;
  }
}

async function requestImageCandidates(url: string): Promise<string[]> {
  let res: Response;
  try {
    res = await fetchWithTimeout(url, { method: "GET" }, SEARCH_TIMEOUT_MS);
  } catch (err) {
    throw new SourceUnavailableError("search", errorMessage(err));
  }
  if (!res.ok) {
    throw new SourceUnavailableError("search", `HTTP ${res.status}`);
  }
  const body: unknown = await res.json();
  const candidates = pickImageCandidates(extractLinks(body));
  if (candidates.length === 0) {
    throw new SourceUnavailableError("search", "no image results");
  }
  return candidates;
}
