import type { CrawlConfig } from "./config.js";
import { Crawler } from "./crawler.js";
import { CsvSink } from "./csv-sink.js";
import { SqliteSink, TaskStore } from "./db.js";
import { ApiClient } from "./http.js";
import { createLogger, type Logger } from "./log.js";
import type { OutputSink } from "./sink.js";

export interface RunOptions {
  restart: boolean;
  verbose: boolean;
  log?: Logger;
}

/**
 * Everything one crawl run owns. Nothing here is process-global: two runs in
 * one process get separate limiters, dedup sets and database handles.
 */
export interface Run {
  config: CrawlConfig;
  log: Logger;
  tasks: TaskStore;
  api: ApiClient;
  sink: OutputSink;
  crawler: Crawler;
  close(): Promise<void>;
}

export function createSink(config: CrawlConfig): OutputSink {
  switch (config.outputFormat) {
    case "csv":
      return new CsvSink({ dir: config.csvPath });
    case "sqlite":
      return new SqliteSink({ dbPath: config.sqlitePath });
  }
}

export function openRun(config: CrawlConfig, options: RunOptions): Run {
  const log = options.log ?? createLogger({ verbose: options.verbose });
  const tasks = new TaskStore({ dbPath: config.taskCacheDb, restart: options.restart });
  let sink: OutputSink;
  try {
    sink = createSink(config);
  } catch (error) {
    tasks.close();
    throw error;
  }
  const api = new ApiClient({
    apiUrl: config.apiUrl,
    accessToken: config.accessToken,
    timeoutMs: config.requestTimeoutMs,
    maxConcurrentRequests: config.maxConcurrentRequests,
    log
  });
  const crawler = new Crawler({
    api,
    tasks,
    sink,
    settings: {
      tasksBatchSize: config.tasksBatchSize,
      updateCheckPeriodMs: config.updateCheckPeriodMs
    },
    log
  });

  let closed = false;
  return {
    config,
    log,
    tasks,
    api,
    sink,
    crawler,
    async close() {
      if (closed) return;
      closed = true;
      try {
        await sink.close();
      } finally {
        tasks.close();
      }
    }
  };
}
