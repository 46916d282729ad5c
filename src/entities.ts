import type { ApiParams, CrawlEntity, EntityKind, TraversalOptions } from "./types.js";

export interface RelationDescriptor {
  /** Path segment appended to the parent endpoint. */
  segment: string;
  /** Collection name recorded on connection rows. */
  collection: string;
  childKind: EntityKind;
  enabled(options: TraversalOptions): boolean;
  limit(options: TraversalOptions): number | null;
  /** Skip the request when the parent reports no comments. */
  requiresComments: boolean;
}

export type ReferenceField = "owner_id" | "group_id";

export interface EntityDescriptor {
  kind: EntityKind;
  taskKey(target: string, options: TraversalOptions): string;
  endpoint(target: string, options: TraversalOptions): string;
  params(options: TraversalOptions): ApiParams;
  relations: RelationDescriptor[];
  references: ReferenceField[];
}

export const DEFAULT_TRAVERSAL: TraversalOptions = {
  fetchFeedPosts: false,
  fetchCommunityPosts: false,
  fetchComments: false,
  maxPosts: null,
  maxComments: null,
  fromDate: null,
  toDate: null,
  searchType: "top"
};

/**
 * Options handed to children discovered under a parent: only the comment
 * settings carry over.
 */
export function childTraversal(options: TraversalOptions): TraversalOptions {
  return {
    ...DEFAULT_TRAVERSAL,
    fetchComments: options.fetchComments,
    maxComments: options.maxComments
  };
}

export function searchTaskKey(query: string, options: TraversalOptions): string {
  return [
    query.toLowerCase(),
    options.fromDate ? options.fromDate.toISOString() : "",
    options.toDate ? options.toDate.toISOString() : "",
    options.searchType
  ].join("/");
}

function commentParams(options: TraversalOptions): ApiParams {
  return {
    load_comments: options.fetchComments ? 1 : 0,
    max_comments: options.maxComments
  };
}

function dateRangeParams(options: TraversalOptions): ApiParams {
  return {
    from_date: options.fromDate ? options.fromDate.toISOString() : null,
    to_date: options.toDate ? options.toDate.toISOString() : null
  };
}

const commentsRelation = (segment: string, collection: string): RelationDescriptor => ({
  segment,
  collection,
  childKind: "comment",
  enabled: (options) => options.fetchComments,
  limit: (options) => options.maxComments,
  requiresComments: true
});

const postsRelation = (
  segment: string,
  collection: string,
  enabled: (options: TraversalOptions) => boolean
): RelationDescriptor => ({
  segment,
  collection,
  childKind: "post",
  enabled,
  limit: (options) => options.maxPosts,
  requiresComments: false
});

export const ENTITY_DESCRIPTORS: Record<EntityKind, EntityDescriptor> = {
  post: {
    kind: "post",
    taskKey: (target) => target,
    endpoint: (target) => `facebook/post/${encodeURIComponent(target)}`,
    params: commentParams,
    relations: [commentsRelation("comments", "facebook/post/comments")],
    references: ["owner_id", "group_id"]
  },
  comment: {
    kind: "comment",
    taskKey: (target) => target,
    endpoint: (target) => `facebook/comment/${encodeURIComponent(target)}`,
    params: commentParams,
    relations: [commentsRelation("replies", "facebook/comment/replies")],
    references: ["owner_id"]
  },
  profile: {
    kind: "profile",
    taskKey: (target) => target,
    endpoint: (target) => `facebook/profile/${encodeURIComponent(target)}`,
    params: (options) => ({
      ...dateRangeParams(options),
      load_feed_posts: options.fetchFeedPosts ? 1 : 0,
      load_community_posts: options.fetchCommunityPosts ? 1 : 0,
      load_comments: options.fetchComments ? 1 : 0,
      max_posts: options.maxPosts,
      max_comments: options.maxComments
    }),
    relations: [
      postsRelation("feed/posts", "facebook/profile/feed/posts", (options) => options.fetchFeedPosts),
      postsRelation(
        "community/posts",
        "facebook/profile/community/posts",
        (options) => options.fetchCommunityPosts
      )
    ],
    references: []
  },
  search: {
    kind: "search",
    taskKey: searchTaskKey,
    endpoint: (target, options) =>
      `facebook/search/${encodeURIComponent(target)}/posts/${options.searchType}`,
    params: (options) => ({
      ...dateRangeParams(options),
      load_comments: options.fetchComments ? 1 : 0,
      max_posts: options.maxPosts,
      max_comments: options.maxComments
    }),
    relations: [postsRelation("posts", "facebook/search/posts", () => true)],
    references: []
  }
};

export function referencedProfiles(descriptor: EntityDescriptor, entity: CrawlEntity): string[] {
  const ids: string[] = [];
  for (const field of descriptor.references) {
    const value = entity[field];
    if (value === null || value === undefined || value === "") continue;
    ids.push(String(value));
  }
  return ids;
}
