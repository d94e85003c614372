import * as path from "path";
import { IMAGE_SOURCES, isImageSource, type ImageSource } from "../contracts";

// --- CLI Arg Types ---

export interface PostArgs {
  command: "post";
  dryRun: boolean;
  noImage: boolean;
  /** Absolute path, or null to use the configured default */
  tipsFile: string | null;
  imageSource: ImageSource;
  imageQuery: string;
  newsTopic: string;
}

export interface ServeArgs {
  command: "serve";
  /** null = configured PORT */
  port: number | null;
  host: string;
}

export type ParsedArgs = PostArgs | ServeArgs;

// --- CLI Parsing ---

function printUsage(): void {
  console.error("Usage:");
  console.error(
    "  daily-post post [--dry-run] [--no-image] [--tips-file <path>] " +
      "[--image-source generated|google|none] [--image-query <q>] [--news-topic <topic>]"
  );
  console.error("  daily-post serve [--port <n>] [--host <addr>]");
}

function requireValue(args: string[], i: number, flag: string): string {
  if (i + 1 >= args.length || args[i + 1].startsWith("--")) {
    console.error(`Error: ${flag} requires a value`);
    process.exit(1);
  }
  return args[i + 1];
}

function parsePost(args: string[]): PostArgs {
  const parsed: PostArgs = {
    command: "post",
    dryRun: false,
    noImage: false,
    tipsFile: null,
    imageSource: "generated",
    imageQuery: "",
    newsTopic: "",
  };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--dry-run") {
      parsed.dryRun = true;
    } else if (arg === "--no-image") {
      parsed.noImage = true;
    } else if (arg === "--tips-file") {
      parsed.tipsFile = path.resolve(requireValue(args, i++, arg));
    } else if (arg === "--image-source") {
      const val = requireValue(args, i++, arg);
      if (!isImageSource(val)) {
        console.error(`Error: --image-source must be one of: ${IMAGE_SOURCES.join(", ")}`);
        process.exit(1);
      }
      parsed.imageSource = val;
    } else if (arg === "--image-query") {
      parsed.imageQuery = requireValue(args, i++, arg);
    } else if (arg === "--news-topic") {
      parsed.newsTopic = requireValue(args, i++, arg);
    } else {
      console.error(`Error: Unknown argument "${arg}"`);
      process.exit(1);
    }
  }

  return parsed;
}

function parseServe(args: string[]): ServeArgs {
  const parsed: ServeArgs = { command: "serve", port: null, host: "0.0.0.0" };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--port") {
      const port = Number(requireValue(args, i++, arg));
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        console.error("Error: --port must be an integer between 0 and 65535");
        process.exit(1);
      }
      parsed.port = port;
    } else if (arg === "--host") {
      parsed.host = requireValue(args, i++, arg);
    } else {
      console.error(`Error: Unknown argument "${arg}"`);
      process.exit(1);
    }
  }

  return parsed;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.length === 0) {
    console.error("Error: No command or arguments provided.");
    printUsage();
    process.exit(1);
  }

  const firstArg = args[0];

  if (firstArg === "post") {
    return parsePost(args);
  }

  if (firstArg === "serve") {
    return parseServe(args);
  }

  if (firstArg.startsWith("--")) {
    console.error(`Error: Unknown flag "${firstArg}"`);
  } else {
    console.error(`Error: Unknown command "${firstArg}"`);
  }
  printUsage();
  process.exit(1);
}
