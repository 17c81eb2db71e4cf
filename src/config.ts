/**
 * Command-line and environment configuration.
 *
 * Turns `process.argv` and `process.env` into a TreeSyncConfig. Kept free of
 * side effects so the CLI entry point is the only place that prints or exits.
 */

import { ConfigError } from "./errors.js";
import { DEFAULT_INDEX_FILE_NAME } from "./local/tree-reader.js";
import { normalizeNotionId } from "./notion/types.js";
import type { TreeSyncConfig, UnresolvedLinkPolicy } from "./types.js";

export interface CliArgs {
  rootParentUrl: string | null;
  dir: string | null;
  githubWikiRoots: string[];
  indexFileName: string;
  unresolvedLinks: UnresolvedLinkPolicy;
  prune: boolean;
  quiet: boolean;
  help: boolean;
}

const VALID_LINK_POLICIES: UnresolvedLinkPolicy[] = ["error", "keep"];

/**
 * Parses command-line arguments (without the node and script paths).
 *
 * Accepts `--flag value` and `--flag=value`.
 *
 * @throws ConfigError for unknown flags or flags missing their value
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    rootParentUrl: null,
    dir: null,
    githubWikiRoots: [],
    indexFileName: DEFAULT_INDEX_FILE_NAME,
    unresolvedLinks: "error",
    prune: false,
    quiet: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const [flag, inlineValue] = splitFlag(args[i]);

    const takeValue = (): string => {
      if (inlineValue !== null) {
        return inlineValue;
      }
      const nextArg = args[i + 1];
      if (nextArg === undefined || nextArg.startsWith("-")) {
        throw new ConfigError(`${flag} requires a value`);
      }
      i++; // Skip the value
      return nextArg;
    };

    switch (flag) {
      case "--help":
      case "-h":
        result.help = true;
        break;
      case "--quiet":
      case "-q":
        result.quiet = true;
        break;
      case "--prune":
        result.prune = true;
        break;
      case "--root-parent-url":
        result.rootParentUrl = takeValue();
        break;
      case "--dir":
        result.dir = takeValue();
        break;
      case "--github-wiki-root":
        result.githubWikiRoots.push(
          ...takeValue()
            .split(",")
            .map((root) => root.trim())
            .filter((root) => root.length > 0)
        );
        break;
      case "--index-file":
        result.indexFileName = takeValue();
        break;
      case "--unresolved-links": {
        const value = takeValue();
        const policy = VALID_LINK_POLICIES.find((candidate) => candidate === value);
        if (!policy) {
          throw new ConfigError(
            `--unresolved-links must be one of: ${VALID_LINK_POLICIES.join(", ")}`
          );
        }
        result.unresolvedLinks = policy;
        break;
      }
      default:
        throw new ConfigError(`Unknown argument: ${args[i]}`);
    }
  }

  return result;
}

/**
 * Builds the sync configuration from parsed arguments and the environment.
 *
 * Collects every problem before failing, so one run reports them all.
 *
 * @throws ConfigError listing each missing or invalid setting
 */
export function resolveConfig(
  args: CliArgs,
  env: Record<string, string | undefined>
): TreeSyncConfig {
  const errors: string[] = [];

  const token = env.NOTION_TOKEN?.trim() ?? "";
  if (!token) {
    errors.push("NOTION_TOKEN environment variable is not set");
  }

  let rootParentId: string | null = null;
  if (!args.rootParentUrl) {
    errors.push("--root-parent-url is required");
  } else {
    rootParentId = parsePageReference(args.rootParentUrl);
    if (!rootParentId) {
      errors.push(`--root-parent-url is not a Notion page URL or ID: ${args.rootParentUrl}`);
    }
  }

  if (!args.dir) {
    errors.push("--dir is required");
  }

  if (args.indexFileName.includes("/") || args.indexFileName.includes("\\")) {
    errors.push(`--index-file must be a file name, not a path: ${args.indexFileName}`);
  }

  if (errors.length > 0 || !rootParentId || !args.dir) {
    throw new ConfigError(errors.join("; "));
  }

  return {
    notionToken: token,
    rootParentId,
    sourceDir: args.dir,
    indexFileName: args.indexFileName,
    githubWikiRoots: args.githubWikiRoots,
    unresolvedLinks: args.unresolvedLinks,
    prune: args.prune,
  };
}

/**
 * Extracts a page ID from a Notion page URL or a bare ID.
 *
 * Accepts:
 * - `https://www.notion.so/acme/Team-Wiki-0f3c6c1e8f0d4a439d2b3b4cbb1e2a10`
 * - `https://acme.notion.site/0f3c6c1e8f0d4a439d2b3b4cbb1e2a10?pvs=4`
 * - `0f3c6c1e8f0d4a439d2b3b4cbb1e2a10` or its dashed form
 *
 * @returns The dashed page ID, or null when none is found
 */
export function parsePageReference(reference: string): string | null {
  const trimmed = reference.trim();

  const direct = normalizeNotionId(trimmed);
  if (direct) {
    return direct;
  }

  let pathname: string;
  try {
    pathname = new URL(trimmed).pathname;
  } catch {
    return null;
  }

  // The ID is the trailing 32 hex digits of the last path segment
  const lastSegment = pathname.split("/").filter(Boolean).pop() ?? "";
  const match = /([0-9a-f]{32}|[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})$/i.exec(
    lastSegment
  );
  return match ? normalizeNotionId(match[1]) : null;
}

function splitFlag(arg: string): [string, string | null] {
  if (arg.startsWith("--")) {
    const equals = arg.indexOf("=");
    if (equals !== -1) {
      return [arg.slice(0, equals), arg.slice(equals + 1)];
    }
  }
  return [arg, null];
}
