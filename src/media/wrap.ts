/** Pixel width of a string in the body font. */
export type MeasureWidth = (text: string) => Promise<number>;

/**
 * Greedy word wrap: a word joins the current line while the line still
 * fits `maxWidth`, otherwise it starts a new one. A word wider than
 * `maxWidth` gets a line of its own; no word is ever dropped.
 */
export async function wrapLines(
  text: string,
  measure: MeasureWidth,
  maxWidth: number
): Promise<string[]> {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const lines: string[] = [];
  let current: string[] = [];

  for (const word of words) {
    if (current.length === 0) {
      current.push(word);
      continue;
    }
    const trial = [...current, word].join(" ");
    if ((await measure(trial)) <= maxWidth) {
      current.push(word);
    } else {
      lines.push(current.join(" "));
      current = [word];
    }
  }

  if (current.length > 0) {
    lines.push(current.join(" "));
  }
  return lines;
}
