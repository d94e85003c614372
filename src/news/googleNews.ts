/**
 * News lookup via the public Google News RSS search feed.
 *
 * No credentials. The first <item> of the feed is the most relevant
 * headline for the topic.
 */

import type { NewsItem } from "../contracts";
import { SourceUnavailableError, errorMessage } from "../lib/errors";
import { NEWS_TIMEOUT_MS, USER_AGENT, fetchWithTimeout } from "../lib/http";

export function buildNewsFeedUrl(topic: string): string {
  return `https://news.google.com/rss/search?q=${encodeURIComponent(topic)}&hl=en-US&gl=US&ceid=US:en`;
}

function firstMatch(text: string, re: RegExp): string | null {
  const m = re.exec(text);
  return m?.[1]?.trim() ?? null;
}

/** Character for a numeric reference; out-of-range references stay as written. */
function fromCodePoint(ref: string, code: number): string {
  return Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : ref;
}

function decodeXmlEntities(s: string): string {
  return s
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#x([0-9a-f]+);/gi, (ref: string, hex: string) => fromCodePoint(ref, parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (ref: string, dec: string) => fromCodePoint(ref, parseInt(dec, 10)))
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ")
    .trim();
}

function elementText(xml: string, tag: string): string | null {
  const raw =
    firstMatch(xml, new RegExp(`<${tag}[^>]*><!\\[CDATA\\[([\\s\\S]*?)\\]\\]></${tag}>`, "i")) ??
    firstMatch(xml, new RegExp(`<${tag}[^>]*>([\\s\\S]*?)</${tag}>`, "i"));
  return raw === null ? null : decodeXmlEntities(raw);
}

/**
 * First item of an RSS document, or null when the channel has no item
 * with both a title and a link.
 */
export function parseFirstRssItem(xml: string): NewsItem | null {
  if (!/<channel\b/i.test(xml)) {
    return null;
  }
  const chunks = xml.split(/<item\b/i).slice(1);
  const first = chunks[0];
  if (first === undefined) {
    return null;
  }
  const itemXml = "<item" + first.split(/<\/item>/i)[0];
  const title = elementText(itemXml, "title");
  const link = elementText(itemXml, "link");
  if (!title || !link) {
    return null;
  }
  return { title, link };
}

/** Throws SourceUnavailableError on network, HTTP or parse failure. */
export async function requestTopNews(topic: string): Promise<NewsItem> {
  let res: Response;
  try {
    res = await fetchWithTimeout(
      buildNewsFeedUrl(topic),
      {
        method: "GET",
        headers: {
          Accept: "application/rss+xml,application/xml,text/xml,*/*",
          "User-Agent": USER_AGENT,
        },
      },
      NEWS_TIMEOUT_MS
    );
  } catch (err) {
    throw new SourceUnavailableError("news", errorMessage(err));
  }
  if (!res.ok) {
    throw new SourceUnavailableError("news", `HTTP ${res.status}`);
  }
  const item = parseFirstRssItem(await res.text());
  if (!item) {
    throw new SourceUnavailableError("news", `no results for "${topic}"`);
  }
  return item;
}

/**
 * Top headline for a topic, or null when the feed is unavailable or
 * empty. Never throws.
 */
export async function fetchTopNews(topic: string): Promise<NewsItem | null> {
  try {
    return await requestTopNews(topic);
  } catch (err) {
    console.warn(`[news] Failed to fetch news: ${errorMessage(err)}`);
    return null;
  }
}
