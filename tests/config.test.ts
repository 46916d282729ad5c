import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  ConfigError,
  DEFAULT_CONFIG,
  parseOptionalCount,
  parseOptionalDate,
  resolveConfig
} from "../src/config.js";
import { DEFAULT_TRAVERSAL } from "../src/entities.js";
import { buildTraversal, readTargets, targetOperations } from "../src/targets.js";

describe("resolveConfig", () => {
  it("takes the token from the environment and fills in defaults", () => {
    const config = resolveConfig({}, { SOCIAL_API_ACCESS_TOKEN: "test-token" });

    expect(config).toEqual({ ...DEFAULT_CONFIG, accessToken: "test-token" });
  });

  it("prefers flags over the environment and parses numbers", () => {
    const config = resolveConfig(
      { accessToken: "test-secret", output: "sqlite", concurrency: "3", timeout: "500", db: " tasks.db " },
      { SOCIAL_API_ACCESS_TOKEN: "test-token" }
    );

    expect(config.accessToken).toBe("test-secret");
    expect(config.outputFormat).toBe("sqlite");
    expect(config.maxConcurrentRequests).toBe(3);
    expect(config.requestTimeoutMs).toBe(500);
    expect(config.taskCacheDb).toBe("tasks.db");
  });

  it("collects every problem before failing", () => {
    const error = (() => {
      try {
        resolveConfig({ output: "xml", queueSize: "0", batchSize: "2.5" }, {});
      } catch (caught) {
        return caught;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      problems: [
        "Set an access token with --access-token or the SOCIAL_API_ACCESS_TOKEN variable.",
        "Value 'xml' for --output is invalid (expected csv or sqlite).",
        "Value '0' for --queue-size must be a positive integer.",
        "Value '2.5' for --batch-size must be a positive integer."
      ]
    });
  });
});

describe("option parsers", () => {
  it("reads optional counts", () => {
    const problems: string[] = [];
    expect(parseOptionalCount(undefined, "--max-posts", problems)).toBeNull();
    expect(parseOptionalCount("0", "--max-posts", problems)).toBe(0);
    expect(parseOptionalCount("25", "--max-posts", problems)).toBe(25);
    expect(problems).toEqual([]);
    expect(parseOptionalCount("-1", "--max-posts", problems)).toBeNull();
    expect(problems).toEqual(["Value '-1' for --max-posts must be a non-negative integer."]);
  });

  it("reads dates without a zone as UTC", () => {
    const problems: string[] = [];
    expect(parseOptionalDate("2021-01-01T02:16:32", "--from-date", problems)?.toISOString()).toBe(
      "2021-01-01T02:16:32.000Z"
    );
    expect(parseOptionalDate("2021-01-01", "--from-date", problems)?.toISOString()).toBe(
      "2021-01-01T00:00:00.000Z"
    );
    expect(parseOptionalDate("2021-01-01T02:16:32+02:00", "--from-date", problems)?.toISOString()).toBe(
      "2021-01-01T00:16:32.000Z"
    );
    expect(problems).toEqual([]);
  });

  it("rejects malformed dates", () => {
    const problems: string[] = [];
    expect(parseOptionalDate("yesterday", "--to-date", problems)).toBeNull();
    expect(parseOptionalDate("2021-13-45", "--to-date", problems)).toBeNull();
    expect(problems).toEqual([
      "Value 'yesterday' for --to-date must be an ISO 8601 date (2021-01-01T02:16:32).",
      "Value '2021-13-45' for --to-date is not a valid date."
    ]);
  });
});

describe("buildTraversal", () => {
  it("keeps only the options a post crawl understands", () => {
    expect(
      buildTraversal("post", { fetchComments: true, maxComments: "10", fetchFeedPosts: true, maxPosts: "3" })
    ).toEqual({ ...DEFAULT_TRAVERSAL, fetchComments: true, maxComments: 10 });
  });

  it("reads profile posts options and the date range", () => {
    expect(
      buildTraversal("profile", { fetchFeedPosts: true, maxPosts: "10", fromDate: "2021-01-01" })
    ).toEqual({
      ...DEFAULT_TRAVERSAL,
      fetchFeedPosts: true,
      maxPosts: 10,
      fromDate: new Date("2021-01-01T00:00:00.000Z")
    });
  });

  it("validates the search type", () => {
    expect(buildTraversal("search", { searchType: "hashtag" }).searchType).toBe("hashtag");
    expect(() => buildTraversal("search", { searchType: "weird" })).toThrow(
      "Value 'weird' for --search-type is invalid (expected top, latest or hashtag)."
    );
  });
});

describe("targetOperations", () => {
  it("hands each target to the crawl as it was read", async () => {
    async function* lines() {
      yield "Hello World";
      yield "123";
    }
    const names: string[] = [];
    const crawled: string[] = [];
    const controller = new AbortController();

    for await (const operation of targetOperations(lines(), async (target) => {
      crawled.push(target);
    })) {
      names.push(operation.name);
      await operation.run(controller.signal);
    }

    expect(names).toEqual(["Hello World", "123"]);
    expect(crawled).toEqual(["Hello World", "123"]);
  });
});

describe("readTargets", () => {
  it("yields trimmed non-empty lines", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "crawl-targets-"));
    const file = path.join(dir, "targets.txt");
    fs.writeFileSync(file, "123\r\n\n  456  \n\n789", "utf8");
    try {
      const targets: string[] = [];
      for await (const target of readTargets(file)) {
        targets.push(target);
      }
      expect(targets).toEqual(["123", "456", "789"]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
