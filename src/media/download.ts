import * as fs from "fs";
import * as path from "path";
import type { SharpModule } from "./backend";
import { SourceUnavailableError, errorMessage } from "../lib/errors";
import { DOWNLOAD_TIMEOUT_MS, USER_AGENT, fetchWithTimeout } from "../lib/http";

/**
 * Downloads an image URL to a local path. When a rendering backend is
 * available the file is also checked to be a readable image.
 *
 * Throws SourceUnavailableError on any failure; no partial file is left
 * behind.
 */
export async function downloadImage(
  imageUrl: string,
  destPath: string,
  backend: SharpModule | null
): Promise<string> {
  let response: Response;
  try {
    response = await fetchWithTimeout(
      imageUrl,
      { method: "GET", headers: { "User-Agent": USER_AGENT } },
      DOWNLOAD_TIMEOUT_MS
    );
  } catch (err) {
    throw new SourceUnavailableError("download", errorMessage(err));
  }
  if (!response.ok) {
    throw new SourceUnavailableError(
      "download",
      `HTTP ${response.status} ${response.statusText}`.trim()
    );
  }

  const buffer = Buffer.from(await response.arrayBuffer());
  if (buffer.length === 0) {
    throw new SourceUnavailableError("download", "empty response body");
  }

  fs.mkdirSync(path.dirname(destPath), { recursive: true });
  fs.writeFileSync(destPath, buffer);

  if (backend) {
    let valid = false;
    try {
      const metadata = await backend(destPath).metadata();
      valid = Boolean(metadata.width && metadata.height);
    } catch (err) {
      console.warn(`[download] Unreadable image from ${imageUrl}: ${errorMessage(err)}`);
    }
    if (!valid) {
      fs.rmSync(destPath, { force: true });
      throw new SourceUnavailableError("download", "downloaded file is not a valid image");
    }
  }

  return destPath;
}
