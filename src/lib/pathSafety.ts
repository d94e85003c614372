import * as path from "path";
import * as crypto from "crypto";

/** Basename prefix shared by every generated or downloaded media file. */
export const MEDIA_FILE_PREFIX = "daily_post";

/**
 * Verify that a resolved absolute path is contained within the anchor
 * directory. Throws if the path escapes it.
 */
export function assertResolvedContainedIn(
  resolvedPath: string,
  anchor: string,
  label: string
): void {
  const resolvedAnchor = path.resolve(anchor);
  const normalizedPath = path.resolve(resolvedPath);

  if (
    normalizedPath !== resolvedAnchor &&
    !normalizedPath.startsWith(resolvedAnchor + path.sep)
  ) {
    throw new PathEscapeError(
      `${label} resolves outside its allowed directory. ` +
        `Resolved: ${normalizedPath}, Anchor: ${resolvedAnchor}`
    );
  }
}

/** Random, filename-safe identifier for one run. */
export function createRunId(): string {
  return `${Date.now()}-${crypto.randomBytes(4).toString("hex")}`;
}

/**
 * Media path for one run inside the media directory. Two overlapping
 * runs never share a file.
 */
export function runScopedMediaPath(mediaDir: string, runId: string): string {
  if (!/^[A-Za-z0-9_-]+$/.test(runId)) {
    throw new PathEscapeError(`Run id contains invalid path components: "${runId}"`);
  }
  const candidate = path.resolve(mediaDir, `${MEDIA_FILE_PREFIX}-${runId}.jpg`);
  assertResolvedContainedIn(candidate, mediaDir, "Media path");
  return candidate;
}

export class PathEscapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathEscapeError";
  }
}
