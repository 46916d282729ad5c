import fs from "node:fs";
import readline from "node:readline";
import {
  ConfigError,
  isSearchType,
  parseOptionalCount,
  parseOptionalDate,
  type ConfigFlags
} from "./config.js";
import { DEFAULT_TRAVERSAL } from "./entities.js";
import type { ScheduledOperation } from "./scheduler.js";
import type { EntityKind, TraversalOptions } from "./types.js";

export interface CommandFlags extends ConfigFlags {
  verbose?: boolean;
  restart?: boolean;
  fetchComments?: boolean;
  fetchFeedPosts?: boolean;
  fetchCommunityPosts?: boolean;
  maxComments?: string;
  maxPosts?: string;
  fromDate?: string;
  toDate?: string;
  searchType?: string;
}

/**
 * Yield trimmed, non-empty lines from a file (or stdin for "-") one at a time
 * so a long input list is never held in memory.
 */
export async function* readTargets(input: string): AsyncGenerator<string, void, undefined> {
  const stream = input === "-" ? process.stdin : fs.createReadStream(input, { encoding: "utf8" });
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      const target = line.trim();
      if (target) yield target;
    }
  } finally {
    lines.close();
  }
}

/**
 * One scheduled operation per target, named after it. Targets are passed on
 * as read; search task keys normalise case on their own.
 */
export async function* targetOperations(
  targets: AsyncIterable<string>,
  crawl: (target: string, signal: AbortSignal) => Promise<void>
): AsyncGenerator<ScheduledOperation, void, undefined> {
  for await (const target of targets) {
    yield { name: target, run: (signal) => crawl(target, signal) };
  }
}

export function buildTraversal(kind: EntityKind, flags: CommandFlags): TraversalOptions {
  const problems: string[] = [];
  const options: TraversalOptions = {
    ...DEFAULT_TRAVERSAL,
    fetchComments: Boolean(flags.fetchComments),
    maxComments: parseOptionalCount(flags.maxComments, "--max-comments", problems)
  };
  if (kind === "profile") {
    options.fetchFeedPosts = Boolean(flags.fetchFeedPosts);
    options.fetchCommunityPosts = Boolean(flags.fetchCommunityPosts);
  }
  if (kind === "profile" || kind === "search") {
    options.maxPosts = parseOptionalCount(flags.maxPosts, "--max-posts", problems);
    options.fromDate = parseOptionalDate(flags.fromDate, "--from-date", problems);
    options.toDate = parseOptionalDate(flags.toDate, "--to-date", problems);
  }
  if (kind === "search") {
    const searchType = flags.searchType ?? "top";
    if (isSearchType(searchType)) {
      options.searchType = searchType;
    } else {
      problems.push(`Value '${searchType}' for --search-type is invalid (expected top, latest or hashtag).`);
    }
  }
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return options;
}
