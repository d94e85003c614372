import * as fs from "fs";
import * as path from "path";

/** Path to the built-in tip list shipped with the package */
export const DEFAULT_TIPS_PATH = path.resolve(__dirname, "..", "..", "assets", "default_tips.txt");

/**
 * Parse newline-delimited tips. Lines are trimmed; blank lines and
 * lines starting with "#" are comments.
 */
export function parseTips(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/** Tips from a file, or an empty list when the file does not exist. */
export function readTipsFile(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  return parseTips(fs.readFileSync(filePath, "utf-8"));
}

let defaultTips: readonly string[] | null = null;

/** The built-in tip list, read once per process. */
export function getDefaultTips(): readonly string[] {
  if (!defaultTips) {
    const tips = readTipsFile(DEFAULT_TIPS_PATH);
    if (tips.length === 0) {
      throw new Error(`Built-in tip list is missing or empty: ${DEFAULT_TIPS_PATH}`);
    }
    defaultTips = Object.freeze(tips);
  }
  return defaultTips;
}

/**
 * Load the run's tip list: the file when it yields at least one tip,
 * otherwise the `fallback` list (the built-in tips by default).
 */
export function loadTipList(
  filePath: string,
  fallback: () => readonly string[] = getDefaultTips
): readonly string[] {
  const tips = readTipsFile(path.resolve(filePath));
  if (tips.length > 0) {
    return Object.freeze(tips);
  }
  return fallback();
}
