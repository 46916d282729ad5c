#!/usr/bin/env node
import fs from "node:fs";
import { Command } from "commander";
import { ConfigError, resolveConfig } from "./config.js";
import { openRun } from "./run.js";
import { schedule } from "./scheduler.js";
import { buildTraversal, readTargets, targetOperations, type CommandFlags } from "./targets.js";
import type { EntityKind } from "./types.js";

async function runCommand(kind: EntityKind, input: string, flags: CommandFlags) {
  const config = resolveConfig(flags);
  const traversal = buildTraversal(kind, flags);
  const run = openRun(config, { restart: Boolean(flags.restart), verbose: Boolean(flags.verbose) });

  const operations = targetOperations(readTargets(input), (target, signal) =>
    run.crawler.crawl(kind, target, traversal, { update: true, signal })
  );

  run.log.info(
    `[crawl] kind=${kind} output=${config.outputFormat} concurrency=${config.maxConcurrentRequests} queue=${config.maxQueueSize} restart=${Boolean(flags.restart)}`
  );
  try {
    const summary = await schedule(operations, {
      queueSize: config.maxQueueSize,
      pollIntervalMs: config.schedulerPollMs,
      log: run.log
    });
    const counts = run.tasks.countByStatus();
    run.log.info(
      `[crawl] finished top_level=${summary.finished}/${summary.total} tasks_finished=${counts.finished}`
    );
  } finally {
    await run.close();
  }
}

function reportFailure(error: unknown) {
  if (error instanceof ConfigError) {
    for (const problem of error.problems) {
      console.error(problem);
    }
    process.exitCode = 2;
    return;
  }
  const name = error instanceof Error ? error.name : "Error";
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${name}: ${message}`);
  const tracebackPath = `traceback_${Math.floor(Date.now() / 1000)}.txt`;
  const details = error instanceof Error && error.stack ? error.stack : message;
  try {
    fs.writeFileSync(tracebackPath, `${details}\n`, "utf8");
  } catch (writeError) {
    const reason = writeError instanceof Error ? writeError.message : String(writeError);
    console.error(`[crawl] could not write ${tracebackPath}: ${reason}`);
  }
  process.exitCode = 1;
}

function withCommonOptions(command: Command): Command {
  return command
    .argument("[input]", "File with one target per line (- for stdin)", "-")
    .option("-v, --verbose", "Enable debug messages", false)
    .option("--restart", "Start fetching items from the beginning", false)
    .option("--access-token <token>", "API access token (defaults to $SOCIAL_API_ACCESS_TOKEN)")
    .option("--api-url <url>", "API base URL")
    .option("--db <path>", "SQLite task cache path")
    .option("--output <format>", "Output format: csv or sqlite")
    .option("--csv-path <path>", "Directory for CSV output")
    .option("--sqlite-path <path>", "SQLite output database path")
    .option("--timeout <ms>", "HTTP timeout per request in ms")
    .option("--update-period <ms>", "Delay between update status checks in ms")
    .option("--concurrency <number>", "Maximum simultaneous API requests")
    .option("--queue-size <number>", "Top-level items processed at once")
    .option("--batch-size <number>", "Child operations run together per parent")
    .option("--fetch-comments", "Enable comments fetching", false)
    .option("--max-comments <number>", "Max number of comments to be fetched");
}

function withPostRangeOptions(command: Command): Command {
  return command
    .option("--max-posts <number>", "Max number of posts to be fetched")
    .option("--from-date <date>", "Fetch posts from this date (ISO 8601, 2021-01-01T02:16:32)")
    .option("--to-date <date>", "Fetch posts to this date (ISO 8601, 2021-01-01T02:16:32)");
}

function action(kind: EntityKind) {
  return async (input: string, flags: CommandFlags) => {
    try {
      await runCommand(kind, input, flags);
    } catch (error) {
      reportFailure(error);
    }
  };
}

const program = new Command();

program
  .name("social-graph-crawler")
  .description("Fetch posts, comments, profiles and searches and store them as CSV or SQLite");

withCommonOptions(program.command("facebook-post").description("Fetch posts by id")).action(
  action("post")
);

withCommonOptions(program.command("facebook-comment").description("Fetch comments by id")).action(
  action("comment")
);

withPostRangeOptions(
  withCommonOptions(program.command("facebook-profile").description("Fetch profiles by id or username"))
)
  .option("--fetch-feed-posts", "Enable posts fetching from the profile timeline", false)
  .option("--fetch-community-posts", "Enable posts fetching from the community section", false)
  .action(action("profile"));

withPostRangeOptions(
  withCommonOptions(program.command("facebook-search-posts").description("Fetch posts found by search requests"))
)
  .option("--search-type <type>", "Search type: top, latest or hashtag", "top")
  .action(action("search"));

await program.parseAsync(process.argv);
