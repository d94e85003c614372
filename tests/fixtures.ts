import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { vi } from "vitest";
import type { AppConfig } from "../src/config";
import type { ContentResult } from "../src/contracts";

/**
 * Create a temporary directory. Caller is responsible for cleanup.
 */
export function createTempDir(prefix = "daily-post-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Write a tips file with the given lines into `dir`. Returns its path.
 */
export function writeTipsFile(dir: string, lines: string[], name = "tips.txt"): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, lines.join("\n"), "utf-8");
  return filePath;
}

/**
 * Remove a temporary directory and all contents.
 */
export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Config with placeholder credentials rooted at `mediaDir`. */
export function testConfig(mediaDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    twitter: {
      apiKey: "test-api-key",
      apiSecret: "test-api-secret",
      accessToken: "test-access-token",
      accessTokenSecret: "test-access-secret",
    },
    google: {},
    mediaDir,
    tipsFile: path.join(mediaDir, "missing-tips.txt"),
    httpPort: 3000,
    ...overrides,
  };
}

export function tipContent(overrides: Partial<ContentResult> = {}): ContentResult {
  return {
    text: "Prefer pure functions; minimize shared state.\n\n#coding #programming #devtips",
    queryHint: "Prefer pure functions; minimize shared state.",
    sourceKind: "tip",
    imageText: "Prefer pure functions; minimize shared state.",
    imageSeed: 15,
    ...overrides,
  };
}

export interface FetchRoute {
  match: RegExp;
  status?: number;
  body: string;
  contentType?: string;
}

export interface RecordedRequest {
  url: string;
  init: RequestInit | undefined;
}

function requestUrl(input: string | URL | Request): string {
  return input instanceof Request ? input.url : String(input);
}

/**
 * Replace global fetch with a router over canned responses. Returns the
 * list of requests made; restore with `vi.restoreAllMocks()`.
 */
export function mockFetchRouter(routes: FetchRoute[]): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  vi.spyOn(globalThis, "fetch").mockImplementation(async (input, init) => {
    const url = requestUrl(input);
    requests.push({ url, init });
    const route = routes.find((r) => r.match.test(url));
    if (!route) {
      throw new Error(`unexpected url: ${url}`);
    }
    return new Response(route.body, {
      status: route.status ?? 200,
      headers: { "content-type": route.contentType ?? "text/plain" },
    });
  });
  return requests;
}

/** Global fetch that rejects every request, as on a dead network. */
export function mockFetchFailure(message = "getaddrinfo ENOTFOUND"): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  vi.spyOn(globalThis, "fetch").mockImplementation(async (input, init) => {
    requests.push({ url: requestUrl(input), init });
    throw new TypeError(`fetch failed: ${message}`);
  });
  return requests;
}
