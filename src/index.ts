#!/usr/bin/env node
import * as path from "path";
import * as dotenv from "dotenv";
import { parseArgs, type PostArgs, type ServeArgs } from "./cli/parseArgs";
import { loadConfig, PROJECT_ROOT, type AppConfig } from "./config";
import { runDailyPost } from "./pipeline/runDailyPost";
import { startHttpTrigger } from "./server/httpTrigger";
import { errorMessage } from "./lib/errors";
import type { RunOptions } from "./contracts";

// --- Post Command ---

async function runPostCommand(args: PostArgs, config: AppConfig): Promise<void> {
  const options: RunOptions = {
    dryRun: args.dryRun,
    disableImages: args.noImage,
    tipsFile: args.tipsFile ?? config.tipsFile,
    imageSource: args.imageSource,
    imageQuery: args.imageQuery,
    newsTopic: args.newsTopic,
  };

  const record = await runDailyPost(options, { config });

  if (!record.ok) {
    console.error(`Failed to post: ${record.error ?? "unknown error"}`);
    process.exit(1);
  }

  if (record.dryRun) {
    console.log("[DRY RUN] Would post:\n");
    console.log(record.text);
    if (record.mediaPath) {
      console.log(`\n[DRY RUN] Image generated at: ${record.mediaPath}`);
    } else {
      console.log("\n[DRY RUN] No image attached.");
    }
    return;
  }

  console.log("Posted successfully.");
}

// --- Serve Command ---

async function runServeCommand(args: ServeArgs, config: AppConfig): Promise<void> {
  const trigger = await startHttpTrigger({
    port: args.port ?? config.httpPort,
    host: args.host,
    tipsFile: config.tipsFile,
    run: (options) => runDailyPost(options, { config }),
  });

  const shutdown = (): void => {
    trigger.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`Error closing server: ${errorMessage(err)}`);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

// --- Main ---

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  // Existing environment variables win over .env.
  dotenv.config({ path: path.join(PROJECT_ROOT, ".env"), override: false });

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  if (parsed.command === "serve") {
    await runServeCommand(parsed, config);
    return;
  }

  await runPostCommand(parsed, config);
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
