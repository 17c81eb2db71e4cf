#!/usr/bin/env node

/**
 * CLI entry point for notion-tree.
 *
 * Mirrors a local markdown directory into a Notion page hierarchy:
 *
 *   notion-tree --root-parent-url <url|id> --dir <path> [options]
 *
 * Configuration via environment variables:
 * - NOTION_TOKEN (required): Notion integration token
 */

import { parseArgs, resolveConfig, type CliArgs } from "./config.js";
import { syncDirectoryToNotion } from "./sync/tree-sync.js";
import { ConfigError } from "./errors.js";

function printHelp(): void {
  console.log(`
notion-tree - Mirror a directory of markdown files into Notion pages

Usage:
  notion-tree --root-parent-url <url|id> --dir <path> [options]

Required:
  --root-parent-url   Notion page (URL or ID) that receives the mirrored tree
  --dir               Local directory to mirror

Options:
  --github-wiki-root  GitHub wiki URL whose links point into the tree
                      (repeatable, or comma-separated)
  --index-file        File that supplies a directory's own page content
                      (default: index.md)
  --unresolved-links  What to do with links to missing documents
                      Values: error, keep (default: error)
  --prune             Archive Notion pages with no local counterpart
  --quiet, -q         Only print errors
  --help, -h          Show this help message

Environment Variables (required):
  NOTION_TOKEN        Notion integration token

Examples:
  notion-tree --root-parent-url https://www.notion.so/Team-0f3c6c1e8f0d4a439d2b3b4cbb1e2a10 --dir ./wiki
  notion-tree --root-parent-url 0f3c6c1e8f0d4a439d2b3b4cbb1e2a10 --dir ./wiki \\
    --github-wiki-root https://github.com/acme/handbook/wiki --prune
`);
}

async function runSync(args: CliArgs): Promise<void> {
  const config = resolveConfig(args, process.env);
  const start = Date.now();

  if (!args.quiet) {
    console.log("Starting directory → Notion sync...");
    console.log(`  Source: ${config.sourceDir}`);
    console.log(`  Parent page: ${config.rootParentId}`);
    console.log(`  Unresolved links: ${config.unresolvedLinks}`);
    if (config.githubWikiRoots.length > 0) {
      console.log(`  Wiki roots: ${config.githubWikiRoots.join(", ")}`);
    }
    console.log("");
  }

  const result = await syncDirectoryToNotion(config, { quiet: args.quiet });

  if (!args.quiet) {
    const created = result.pages.filter((page) => page.action === "created").length;
    const matched = result.pages.length - created;
    const seconds = ((Date.now() - start) / 1000).toFixed(1);

    console.log("");
    console.log(`Sync complete in ${seconds}s:`);
    console.log(`  Created: ${created}`);
    console.log(`  Matched: ${matched}`);
    if (config.prune) {
      console.log(`  Archived: ${result.archived.length}`);
    }
    const rootPage = result.pages[0];
    if (rootPage) {
      console.log(`  Root page: ${rootPage.title} (${rootPage.pageId})`);
    }
  }
}

async function main(): Promise<void> {
  // Skip node and script path
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      console.error("Run with --help for usage information.");
      process.exit(1);
    }
    throw error;
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (!args.rootParentUrl || !args.dir) {
    printHelp();
    process.exit(1);
  }

  await runSync(args);
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(`${error.name}: ${error.message}`);
  } else {
    console.error("Unexpected error:", error);
  }
  process.exit(1);
});
