export type EntityKind = "post" | "comment" | "profile" | "search";

export type TaskStatus = "absent" | "created" | "collecting" | "finished";

export type StoredTaskStatus = Exclude<TaskStatus, "absent">;

export type SearchType = "top" | "latest" | "hashtag";

export type OutputFormat = "csv" | "sqlite";

export type HttpMethod = "get" | "post";

export type ApiParamValue = string | number | boolean | null | undefined;

export type ApiParams = Record<string, ApiParamValue>;

export interface ApiError {
  code?: string;
  message?: string;
  [field: string]: unknown;
}

export interface ApiResponse {
  status: string;
  data: unknown;
  error: ApiError | null;
}

export type UpdateStatus = "created" | "pending" | "finished" | "failed" | "fail" | "unknown";

/**
 * A fetched post, profile, comment or search. Only the fields that steer the
 * crawl are typed; everything else is passed through to the output sink.
 */
export interface CrawlEntity {
  id: string;
  owner_id?: string | number | null;
  group_id?: string | number | null;
  comments_count?: number | null;
  [field: string]: unknown;
}

export interface TraversalOptions {
  fetchFeedPosts: boolean;
  fetchCommunityPosts: boolean;
  fetchComments: boolean;
  maxPosts: number | null;
  maxComments: number | null;
  fromDate: Date | null;
  toDate: Date | null;
  searchType: SearchType;
}
