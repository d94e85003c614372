/**
 * Content selection: today's coding tip, or a news headline for a topic.
 *
 * News always degrades to the tip when the lookup returns nothing or
 * fails. Selection runs once per run; the media stage consumes the
 * returned render material instead of selecting again.
 */

import type { ContentResult, NewsItem } from "../contracts";
import { errorMessage } from "../lib/errors";
import { deterministicIndex } from "./selector";
import { buildNewsPost, buildTipPost, firstWords } from "./postText";

/** Size of the seed space for news cards. */
export const NEWS_SEED_SLOTS = 1000;

export type NewsLookup = (topic: string) => Promise<NewsItem | null>;

export interface ContentRequest {
  tips: readonly string[];
  /** Blank or whitespace-only means "post a tip". */
  newsTopic: string;
  date?: Date;
  fetchNews: NewsLookup;
}

export function selectTip(tips: readonly string[], date: Date = new Date()): ContentResult {
  if (tips.length === 0) {
    throw new Error("Cannot select a tip from an empty tip list.");
  }
  const index = deterministicIndex(tips.length, date);
  const tip = tips[index];
  return {
    text: buildTipPost(tip),
    queryHint: firstWords(tip),
    sourceKind: "tip",
    imageText: tip,
    imageSeed: index,
  };
}

export function newsContent(item: NewsItem, topic: string, date: Date = new Date()): ContentResult {
  const seed = deterministicIndex(NEWS_SEED_SLOTS, date);
  return {
    text: buildNewsPost(item.title, item.link, topic),
    queryHint: firstWords(item.title),
    sourceKind: "news",
    imageText: item.title,
    imageSeed: seed,
    news: item,
  };
}

export async function resolveContent(request: ContentRequest): Promise<ContentResult> {
  const date = request.date ?? new Date();
  const topic = request.newsTopic.trim();

  if (!topic) {
    return selectTip(request.tips, date);
  }

  let item: NewsItem | null;
  try {
    item = await request.fetchNews(topic);
  } catch (err) {
    console.warn(`[content] News lookup raised: ${errorMessage(err)}`);
    item = null;
  }

  if (item) {
    return newsContent(item, topic, date);
  }

  console.log(`[content] No news for "${topic}"; falling back to coding tip.`);
  return {
    ...selectTip(request.tips, date),
    queryHint: firstWords(topic),
    imageText: topic,
    imageSeed: deterministicIndex(NEWS_SEED_SLOTS, date),
  };
}
