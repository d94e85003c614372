import * as os from "os";
import * as path from "path";

/** Project root, from src/ or dist/. */
export const PROJECT_ROOT = path.resolve(__dirname, "..");

export interface TwitterCredentials {
  apiKey?: string;
  apiSecret?: string;
  accessToken?: string;
  accessTokenSecret?: string;
}

export interface GoogleSearchCredentials {
  apiKey?: string;
  cseId?: string;
  /** Optional `rights` filter passed through to Custom Search */
  rightsFilter?: string;
}

export interface AppConfig {
  twitter: TwitterCredentials;
  google: GoogleSearchCredentials;
  /** Directory that receives the run's generated or downloaded image */
  mediaDir: string;
  /** Tips file used when a caller does not name one */
  tipsFile: string;
  /** Port for the HTTP trigger (default: 3000) */
  httpPort: number;
}

/**
 * Build the app config from an environment map. Credentials are optional
 * here; the posting and search collaborators decide what is required.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const httpPort = Number(env.PORT ?? "3000");
  if (!Number.isInteger(httpPort) || httpPort <= 0 || httpPort > 65535) {
    throw new Error(`Invalid PORT: must be an integer between 1 and 65535.`);
  }

  const tipsFile = env.DAILY_POST_TIPS_FILE
    ? path.resolve(env.DAILY_POST_TIPS_FILE)
    : path.join(PROJECT_ROOT, "content", "coding_tips.txt");

  return {
    twitter: {
      apiKey: nonEmpty(env.TWITTER_API_KEY),
      apiSecret: nonEmpty(env.TWITTER_API_SECRET),
      accessToken: nonEmpty(env.TWITTER_ACCESS_TOKEN),
      accessTokenSecret: nonEmpty(env.TWITTER_ACCESS_TOKEN_SECRET),
    },
    google: {
      apiKey: nonEmpty(env.GOOGLE_API_KEY),
      cseId: nonEmpty(env.GOOGLE_CSE_ID),
      rightsFilter: nonEmpty(env.GOOGLE_IMAGE_RIGHTS_FILTER),
    },
    mediaDir: nonEmpty(env.RUNNER_TEMP) ?? os.tmpdir(),
    tipsFile,
    httpPort,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
