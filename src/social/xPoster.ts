/**
 * Posting via the X API with OAuth 1.0a user context.
 *
 * One attempt per post, no retries. Media is uploaded through the v1.1
 * upload endpoint, then the post is created through v2.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import type { TwitterCredentials } from "../config";
import { ConfigurationError, PostFailureError, errorMessage } from "../lib/errors";
import { POST_TIMEOUT_MS, fetchWithTimeout } from "../lib/http";

export const CREATE_POST_URL = "https://api.twitter.com/2/tweets";
export const MEDIA_UPLOAD_URL = "https://upload.twitter.com/1.1/media/upload.json";

export interface PostReceipt {
  id: string;
  url: string;
}

/** Posting collaborator. */
export interface Poster {
  post(text: string, mediaPath: string | null): Promise<PostReceipt>;
}

export interface ResolvedTwitterCredentials {
  apiKey: string;
  apiSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

/**
 * All four secrets, or a ConfigurationError naming exactly the missing
 * environment variables.
 */
export function requireTwitterCredentials(creds: TwitterCredentials): ResolvedTwitterCredentials {
  const entries: Array<[string, string | undefined]> = [
    ["TWITTER_API_KEY", creds.apiKey],
    ["TWITTER_API_SECRET", creds.apiSecret],
    ["TWITTER_ACCESS_TOKEN", creds.accessToken],
    ["TWITTER_ACCESS_TOKEN_SECRET", creds.accessTokenSecret],
  ];
  const { apiKey, apiSecret, accessToken, accessTokenSecret } = creds;
  if (!apiKey || !apiSecret || !accessToken || !accessTokenSecret) {
    throw new ConfigurationError(entries.filter(([, value]) => !value).map(([name]) => name));
  }
  return { apiKey, apiSecret, accessToken, accessTokenSecret };
}

export function createXPoster(credentials: TwitterCredentials): Poster {
  return {
    async post(text: string, mediaPath: string | null): Promise<PostReceipt> {
      const creds = requireTwitterCredentials(credentials);

      const mediaIds: string[] = [];
      if (mediaPath) {
        mediaIds.push(await uploadMedia(creds, mediaPath));
      }

      const payload: { text: string; media?: { media_ids: string[] } } = { text };
      if (mediaIds.length > 0) {
        payload.media = { media_ids: mediaIds };
      }

      const body = await sendSigned(creds, CREATE_POST_URL, {
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(payload),
      });
      const id = readString(body, "data", "id");
      if (!id) {
        throw new PostFailureError("X API response missing post id");
      }
      const receipt = { id, url: `https://x.com/i/web/status/${id}` };
      console.log(`[post] Posted ${receipt.url}`);
      return receipt;
    },
  };
}

async function uploadMedia(creds: ResolvedTwitterCredentials, mediaPath: string): Promise<string> {
  let data: Buffer;
  try {
    data = fs.readFileSync(mediaPath);
  } catch (err) {
    throw new PostFailureError(`Cannot read media file ${mediaPath}: ${errorMessage(err)}`);
  }

  const form = new FormData();
  form.append("media", new Blob([new Uint8Array(data)]), path.basename(mediaPath));

  const body = await sendSigned(creds, MEDIA_UPLOAD_URL, { body: form });
  const mediaId = readString(body, "media_id_string");
  if (!mediaId) {
    throw new PostFailureError("X media upload response missing media_id_string");
  }
  return mediaId;
}

/** Signed POST; resolves to the parsed JSON body of a 2xx response. */
async function sendSigned(
  creds: ResolvedTwitterCredentials,
  url: string,
  init: { headers?: Record<string, string>; body: string | FormData }
): Promise<unknown> {
  const authorization = buildOAuth1Header({
    method: "POST",
    url,
    consumerKey: creds.apiKey,
    consumerSecret: creds.apiSecret,
    accessToken: creds.accessToken,
    accessSecret: creds.accessTokenSecret,
  });

  let res: Response;
  try {
    res = await fetchWithTimeout(
      url,
      { method: "POST", headers: { ...init.headers, Authorization: authorization }, body: init.body },
      POST_TIMEOUT_MS
    );
  } catch (err) {
    throw new PostFailureError(`X API request failed: ${errorMessage(err)}`);
  }

  const raw = await res.text().catch(() => "");
  if (!res.ok) {
    throw new PostFailureError(`X API ${res.status}: ${summarizeXError(raw)}`, res.status);
  }
  return safeJsonParse(raw);
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/** Nested string property, or null. */
function readString(value: unknown, ...keys: string[]): string | null {
  let current: unknown = value;
  for (const key of keys) {
    if (typeof current !== "object" || current === null || !(key in current)) {
      return null;
    }
    current = Reflect.get(current, key);
  }
  return typeof current === "string" && current.trim() ? current : null;
}

/** Short human-readable detail from an X error body. */
export function summarizeXError(raw: string): string {
  const parsed = safeJsonParse(raw);
  const detail = readString(parsed, "detail") ?? readString(parsed, "title");
  if (detail) {
    return detail;
  }
  if (typeof parsed === "object" && parsed !== null && "errors" in parsed && Array.isArray(parsed.errors)) {
    const messages = parsed.errors
      .map((e: unknown) => readString(e, "message") ?? readString(e, "detail"))
      .filter((m): m is string => m !== null);
    if (messages.length > 0) {
      return messages.join("; ");
    }
  }
  const trimmed = raw.trim();
  return trimmed ? trimmed.slice(0, 200) : "empty response";
}

export interface OAuth1Args {
  method: string;
  url: string;
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessSecret: string;
  nonce?: string;
  timestamp?: string;
}

/**
 * OAuth 1.0a HMAC-SHA1 Authorization header. JSON and multipart bodies
 * are not part of the signature; only oauth and query parameters are.
 */
export function buildOAuth1Header(args: OAuth1Args): string {
  const oauthParams: Record<string, string> = {
    oauth_consumer_key: args.consumerKey,
    oauth_nonce: args.nonce ?? crypto.randomBytes(16).toString("hex"),
    oauth_signature_method: "HMAC-SHA1",
    oauth_timestamp: args.timestamp ?? Math.floor(Date.now() / 1000).toString(),
    oauth_token: args.accessToken,
    oauth_version: "1.0",
  };

  const baseString = buildSignatureBaseString(args.method, args.url, oauthParams);
  const signingKey = `${rfc3986(args.consumerSecret)}&${rfc3986(args.accessSecret)}`;
  const signature = crypto.createHmac("sha1", signingKey).update(baseString).digest("base64");

  const headerParams: Record<string, string> = { ...oauthParams, oauth_signature: signature };
  return (
    "OAuth " +
    Object.keys(headerParams)
      .sort()
      .map((k) => `${rfc3986(k)}="${rfc3986(headerParams[k] ?? "")}"`)
      .join(", ")
  );
}

export function buildSignatureBaseString(
  method: string,
  url: string,
  oauthParams: Record<string, string>
): string {
  const u = new URL(url);
  const baseUrl = `${u.protocol}//${u.host}${u.pathname}`;

  const params: Array<[string, string]> = [];
  for (const [k, v] of Object.entries(oauthParams)) params.push([k, v]);
  for (const [k, v] of u.searchParams.entries()) params.push([k, v]);

  params.sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)));
  const normalized = params.map(([k, v]) => `${rfc3986(k)}=${rfc3986(v)}`).join("&");

  return `${method.toUpperCase()}&${rfc3986(baseUrl)}&${rfc3986(normalized)}`;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function rfc3986(input: string): string {
  return encodeURIComponent(input).replace(
    /[!'()*]/g,
    (c) => "%" + c.charCodeAt(0).toString(16).toUpperCase()
  );
}
