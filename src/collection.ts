import { ApiRequestError, type RemoteApi } from "./http.js";
import { readField, toCrawlEntities } from "./records.js";
import type { ApiParams, CrawlEntity } from "./types.js";

export const MAX_PAGE_SIZE = 100;

/**
 * Walk a cursor-paged collection and yield one batch per page. The cursor is
 * always the one the server hands back; a page with no items or
 * `has_next_page: false` ends the walk.
 */
export async function* paginate(
  api: Pick<RemoteApi, "call">,
  path: string,
  params: ApiParams,
  signal?: AbortSignal
): AsyncGenerator<CrawlEntity[], void, undefined> {
  let cursor: string | null = null;

  while (true) {
    const resp = await api.call(
      "get",
      path,
      { ...params, cursor, max_page_size: MAX_PAGE_SIZE },
      signal
    );
    if (resp.status !== "ok") {
      throw new ApiRequestError(
        `Failed to get collection: status=${resp.status}, url=${path}, error=${JSON.stringify(resp.error)}`,
        { status: resp.status, path, code: resp.error?.code ?? null }
      );
    }

    const items = toCrawlEntities(readField(resp.data, "items"));
    if (items.length === 0) return;
    yield items;

    const pageInfo = readField(resp.data, "page_info");
    if (readField(pageInfo, "has_next_page") !== true) return;
    const next = readField(pageInfo, "cursor");
    cursor = typeof next === "string" ? next : next === null || next === undefined ? null : String(next);
  }
}
