/**
 * Post text assembly under the 280-character limit.
 *
 * Decorations (hashtags, links) always survive intact; only the body
 * is cut, ending in a single ellipsis.
 */

export const MAX_POST_LENGTH = 280;

export const ELLIPSIS = "…";

export const TIP_HASHTAGS = "\n\n#coding #programming #devtips";

/** Length the posting service counts for any link, plus its leading newline. */
export const SHORT_LINK_RESERVE = 25 + 1;

/**
 * Append `decoration` to `body`, truncating the body so the result
 * fits in `maxLen`.
 */
export function buildPostText(
  body: string,
  decoration: string,
  maxLen: number = MAX_POST_LENGTH
): string {
  return fitBody(body, maxLen - decoration.length) + decoration;
}

/** Body cut to `budget` chars, trailing whitespace trimmed, with an ellipsis. */
function fitBody(body: string, budget: number): string {
  if (body.length <= budget) {
    return body;
  }
  if (budget <= 0) {
    return "";
  }
  return body.slice(0, budget - 1).trimEnd() + ELLIPSIS;
}

export function buildTipPost(tip: string): string {
  return buildPostText(tip, TIP_HASHTAGS);
}

/** "IoT devices" -> "iotdevices" */
export function topicSlug(topic: string): string {
  return topic.toLowerCase().replace(/ /g, "");
}

/**
 * Headline, link and hashtags. The title budget reserves a shortened-link
 * allowance whatever the link's real length, because the posting service
 * rewrites every link to a fixed-length short URL.
 */
export function buildNewsPost(title: string, link: string, topic: string): string {
  const hashtags = `\n\n#news #${topicSlug(topic)}`;
  const budget = MAX_POST_LENGTH - hashtags.length - SHORT_LINK_RESERVE;
  return `${fitBody(title, budget)}\n${link}${hashtags}`;
}

/** First `maxWords` whitespace-separated words of `text`. */
export function firstWords(text: string, maxWords = 8): string {
  return text.trim().split(/\s+/).slice(0, maxWords).join(" ");
}
