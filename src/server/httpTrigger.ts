/**
 * HTTP trigger: one GET endpoint whose query parameters map 1:1 onto
 * the run options. Responds with the PostRecord as JSON, 200 when the
 * run succeeded and 500 when it did not.
 */

import * as http from "http";
import type { ImageSource, PostRecord, RunOptions } from "../contracts";
import { errorMessage } from "../lib/errors";

export type RunFn = (options: RunOptions) => Promise<PostRecord>;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/** Image source when the request does not name one. */
export const TRIGGER_DEFAULT_IMAGE_SOURCE: ImageSource = "google";

function getBool(params: URLSearchParams, name: string): boolean {
  const raw = (params.get(name) ?? "").trim().toLowerCase();
  return TRUE_VALUES.has(raw);
}

function getString(params: URLSearchParams, name: string): string {
  return (params.get(name) ?? "").trim();
}

/** Blank means the default; any value other than google or none means generated. */
function getImageSource(params: URLSearchParams): ImageSource {
  const raw = getString(params, "image_source").toLowerCase();
  if (!raw) {
    return TRIGGER_DEFAULT_IMAGE_SOURCE;
  }
  return raw === "google" || raw === "none" ? raw : "generated";
}

/** Run options from `dry_run`, `no_image`, `image_source`, `image_query`, `news_topic`. */
export function parseTriggerQuery(params: URLSearchParams, tipsFile: string): RunOptions {
  const imageSource = getImageSource(params);
  return {
    dryRun: getBool(params, "dry_run"),
    disableImages: getBool(params, "no_image"),
    tipsFile,
    imageSource,
    imageQuery: getString(params, "image_query"),
    newsTopic: getString(params, "news_topic"),
  };
}

function sendJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
  const json = JSON.stringify(body);
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Content-Length", Buffer.byteLength(json));
  res.end(json);
}

export function createTriggerHandler(
  run: RunFn,
  tipsFile: string
): (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void> {
  return async (req, res) => {
    if (req.method !== "GET") {
      res.setHeader("Allow", "GET");
      sendJson(res, 405, { ok: false, error: "Method not allowed" });
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    const options = parseTriggerQuery(url.searchParams, tipsFile);

    try {
      const record = await run(options);
      sendJson(res, record.ok ? 200 : 500, record);
    } catch (err) {
      console.error(`[server] Run failed: ${errorMessage(err)}`);
      sendJson(res, 500, { ok: false, dryRun: options.dryRun, error: errorMessage(err) });
    }
  };
}

export interface TriggerServer {
  server: http.Server;
  close(): Promise<void>;
}

/** Start the trigger on `port` (0 = any free port). */
export function startHttpTrigger(opts: {
  port: number;
  host?: string;
  run: RunFn;
  tipsFile: string;
}): Promise<TriggerServer> {
  const handler = createTriggerHandler(opts.run, opts.tipsFile);
  const server = http.createServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      console.error(`[server] Unhandled request error: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendJson(res, 500, { ok: false, error: "Internal error" });
      }
    });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, opts.host ?? "127.0.0.1", () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : opts.port;
      console.log(`[server] Listening on ${opts.host ?? "127.0.0.1"}:${port}`);
      resolve({
        server,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
