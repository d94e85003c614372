import { describe, it, expect } from "vitest";
import * as os from "os";
import * as path from "path";
import { PROJECT_ROOT, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("reads credentials and settings from the environment", () => {
    const config = loadConfig({
      TWITTER_API_KEY: "test-api-key",
      TWITTER_API_SECRET: " test-api-secret ",
      TWITTER_ACCESS_TOKEN: "test-access-token",
      TWITTER_ACCESS_TOKEN_SECRET: "test-access-secret",
      GOOGLE_API_KEY: "test-google-key",
      GOOGLE_CSE_ID: "test-cse",
      GOOGLE_IMAGE_RIGHTS_FILTER: "cc_publicdomain",
      RUNNER_TEMP: "/runner/tmp",
      DAILY_POST_TIPS_FILE: "/srv/tips.txt",
      PORT: "8080",
    });

    expect(config).toEqual({
      twitter: {
        apiKey: "test-api-key",
        apiSecret: "test-api-secret",
        accessToken: "test-access-token",
        accessTokenSecret: "test-access-secret",
      },
      google: { apiKey: "test-google-key", cseId: "test-cse", rightsFilter: "cc_publicdomain" },
      mediaDir: "/runner/tmp",
      tipsFile: "/srv/tips.txt",
      httpPort: 8080,
    });
  });

  it("treats blank values as unset and applies defaults", () => {
    const config = loadConfig({ TWITTER_API_KEY: "   ", RUNNER_TEMP: "" });

    expect(config.twitter.apiKey).toBeUndefined();
    expect(config.google).toEqual({ apiKey: undefined, cseId: undefined, rightsFilter: undefined });
    expect(config.mediaDir).toBe(os.tmpdir());
    expect(config.tipsFile).toBe(path.join(PROJECT_ROOT, "content", "coding_tips.txt"));
    expect(config.httpPort).toBe(3000);
  });

  it("rejects an invalid port", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow("Invalid PORT: must be an integer between 1 and 65535.");
    expect(() => loadConfig({ PORT: "0" })).toThrow("Invalid PORT");
  });
});
