import type { OutputFormat, SearchType } from "./types.js";

export const ACCESS_TOKEN_ENV = "SOCIAL_API_ACCESS_TOKEN";

export interface CrawlConfig {
  accessToken: string;
  apiUrl: string;
  taskCacheDb: string;
  outputFormat: OutputFormat;
  csvPath: string;
  sqlitePath: string;
  requestTimeoutMs: number;
  updateCheckPeriodMs: number;
  maxConcurrentRequests: number;
  maxQueueSize: number;
  tasksBatchSize: number;
  schedulerPollMs: number;
}

export const DEFAULT_CONFIG: Omit<CrawlConfig, "accessToken"> = {
  apiUrl: "https://api.data365.co/v1.1",
  taskCacheDb: "./current_task_cache.db",
  outputFormat: "csv",
  csvPath: "./data",
  sqlitePath: "./data/output.db",
  requestTimeoutMs: 3000,
  updateCheckPeriodMs: 3000,
  maxConcurrentRequests: 10,
  maxQueueSize: 5,
  tasksBatchSize: 5,
  schedulerPollMs: 5000
};

/**
 * Raw values as they come from the command line; every field is optional and
 * falls back to `DEFAULT_CONFIG`.
 */
export interface ConfigFlags {
  accessToken?: string;
  apiUrl?: string;
  db?: string;
  output?: string;
  csvPath?: string;
  sqlitePath?: string;
  timeout?: string;
  updatePeriod?: string;
  concurrency?: string;
  queueSize?: string;
  batchSize?: string;
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(problems.join("\n"));
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export function resolveConfig(flags: ConfigFlags, env: NodeJS.ProcessEnv = process.env): CrawlConfig {
  const problems: string[] = [];

  const accessToken = (flags.accessToken ?? env[ACCESS_TOKEN_ENV] ?? "").trim();
  if (!accessToken) {
    problems.push(`Set an access token with --access-token or the ${ACCESS_TOKEN_ENV} variable.`);
  }

  const outputFormat = flags.output ?? DEFAULT_CONFIG.outputFormat;
  if (!isOutputFormat(outputFormat)) {
    problems.push(`Value '${outputFormat}' for --output is invalid (expected csv or sqlite).`);
  }

  const config: CrawlConfig = {
    accessToken,
    apiUrl: requireText(flags.apiUrl, DEFAULT_CONFIG.apiUrl, "--api-url", problems),
    taskCacheDb: requireText(flags.db, DEFAULT_CONFIG.taskCacheDb, "--db", problems),
    outputFormat: isOutputFormat(outputFormat) ? outputFormat : DEFAULT_CONFIG.outputFormat,
    csvPath: requireText(flags.csvPath, DEFAULT_CONFIG.csvPath, "--csv-path", problems),
    sqlitePath: requireText(flags.sqlitePath, DEFAULT_CONFIG.sqlitePath, "--sqlite-path", problems),
    requestTimeoutMs: positiveInt(flags.timeout, DEFAULT_CONFIG.requestTimeoutMs, "--timeout", problems),
    updateCheckPeriodMs: positiveInt(
      flags.updatePeriod,
      DEFAULT_CONFIG.updateCheckPeriodMs,
      "--update-period",
      problems
    ),
    maxConcurrentRequests: positiveInt(
      flags.concurrency,
      DEFAULT_CONFIG.maxConcurrentRequests,
      "--concurrency",
      problems
    ),
    maxQueueSize: positiveInt(flags.queueSize, DEFAULT_CONFIG.maxQueueSize, "--queue-size", problems),
    tasksBatchSize: positiveInt(flags.batchSize, DEFAULT_CONFIG.tasksBatchSize, "--batch-size", problems),
    schedulerPollMs: DEFAULT_CONFIG.schedulerPollMs
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "csv" || value === "sqlite";
}

export function isSearchType(value: string): value is SearchType {
  return value === "top" || value === "latest" || value === "hashtag";
}

export function parseOptionalCount(value: string | undefined, flag: string, problems: string[]): number | null {
  if (value === undefined || value === "") return null;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    problems.push(`Value '${value}' for ${flag} must be a non-negative integer.`);
    return null;
  }
  return parsed;
}

export function parseOptionalDate(value: string | undefined, flag: string, problems: string[]): Date | null {
  if (value === undefined || value === "") return null;
  if (!/^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/.test(value)) {
    problems.push(`Value '${value}' for ${flag} must be an ISO 8601 date (2021-01-01T02:16:32).`);
    return null;
  }
  // Naive timestamps are read as UTC, like date-only ones.
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(value);
  const date = new Date(value.includes("T") && !hasZone ? `${value}Z` : value);
  if (Number.isNaN(date.getTime())) {
    problems.push(`Value '${value}' for ${flag} is not a valid date.`);
    return null;
  }
  return date;
}

function positiveInt(value: string | undefined, fallback: number, flag: string, problems: string[]): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    problems.push(`Value '${value}' for ${flag} must be a positive integer.`);
    return fallback;
  }
  return parsed;
}

function requireText(value: string | undefined, fallback: string, flag: string, problems: string[]): string {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!trimmed) {
    problems.push(`Value for ${flag} must not be empty.`);
    return fallback;
  }
  return trimmed;
}
