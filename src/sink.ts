import type { CrawlEntity, EntityKind } from "./types.js";

/**
 * Where fetched entities and parent/child edges end up. Implementations must
 * tolerate the same record being saved more than once, within a run and
 * across runs, and must throw when a write cannot be made durable.
 */
export interface OutputSink {
  saveBatch(kind: EntityKind, records: CrawlEntity[]): Promise<void>;
  saveConnections(parentId: string, childIds: string[], collection: string): Promise<void>;
  close(): Promise<void>;
}

export const TABLES: Record<EntityKind, string> = {
  post: "facebook_posts",
  comment: "facebook_comments",
  profile: "facebook_profiles",
  search: "facebook_searches_for_posts"
};

export const CONNECTIONS_TABLE = "facebook_connections";
