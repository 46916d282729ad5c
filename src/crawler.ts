import { paginate } from "./collection.js";
import {
  ENTITY_DESCRIPTORS,
  DEFAULT_TRAVERSAL,
  childTraversal,
  referencedProfiles,
  type RelationDescriptor
} from "./entities.js";
import { sleepFor, type RemoteApi } from "./http.js";
import type { Logger } from "./log.js";
import { runPool, type Operation } from "./pool.js";
import type { OutputSink } from "./sink.js";
import type {
  ApiParams,
  CrawlEntity,
  EntityKind,
  StoredTaskStatus,
  TaskStatus,
  TraversalOptions
} from "./types.js";

export interface TaskStateStore {
  getStatus(itemId: string): TaskStatus;
  setStatus(itemId: string, status: StoredTaskStatus): void;
}

export interface CrawlerSettings {
  tasksBatchSize: number;
  updateCheckPeriodMs: number;
}

export interface CrawlerDeps {
  api: RemoteApi;
  tasks: TaskStateStore;
  sink: OutputSink;
  settings: CrawlerSettings;
  log?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface Invocation {
  /** Ask the API to refresh the item and wait for it before fetching. */
  update: boolean;
  /** Payload already fetched by the parent as part of a collection page. */
  item?: CrawlEntity;
  signal?: AbortSignal;
}

const SETTLED_UPDATE_STATUSES = new Set(["finished", "failed", "fail", "unknown"]);
const COLLECTION_ORDER = "date_desc";

/**
 * One state machine for every entity kind:
 * check cache -> [update job] -> fetch self -> fan out -> mark finished.
 */
export class Crawler {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly deps: CrawlerDeps) {
    this.sleep = deps.sleep ?? sleepFor;
    this.random = deps.random ?? Math.random;
  }

  async crawl(
    kind: EntityKind,
    target: string,
    options: TraversalOptions,
    invocation: Invocation
  ): Promise<void> {
    const { signal } = invocation;
    signal?.throwIfAborted();
    const descriptor = ENTITY_DESCRIPTORS[kind];
    const taskKey = descriptor.taskKey(target, options);
    const endpoint = descriptor.endpoint(target, options);
    const params = descriptor.params(options);

    const status = this.deps.tasks.getStatus(taskKey);
    if (status === "finished") return;

    if (invocation.update) {
      await this.awaitUpdate(taskKey, status, endpoint, params, signal);
    }

    const pending: Operation[] = [];
    let entity: CrawlEntity | null;
    if (invocation.item) {
      entity = invocation.item;
    } else {
      entity = await this.deps.api.getItem(endpoint, params, signal);
      if (entity) {
        const fetched = entity;
        pending.push(() => this.deps.sink.saveBatch(kind, [fetched]));
      } else {
        this.deps.log?.debug(`[crawl] ${kind} ${target} not found`);
      }
    }

    if (entity) {
      for (const profileId of referencedProfiles(descriptor, entity)) {
        pending.push((poolSignal) =>
          this.crawl("profile", profileId, DEFAULT_TRAVERSAL, { update: false, signal: poolSignal })
        );
      }
      for (const relation of descriptor.relations) {
        if (!shouldTraverse(relation, options, entity)) continue;
        await this.fanOut(relation, endpoint, params, entity, options, pending, signal);
      }
    }

    await this.drain(pending, signal);
    this.deps.tasks.setStatus(taskKey, "finished");
  }

  private async awaitUpdate(
    taskKey: string,
    status: TaskStatus,
    endpoint: string,
    params: ApiParams,
    signal?: AbortSignal
  ) {
    if (status === "absent") {
      const jobId = await this.deps.api.requestUpdate(endpoint, params, signal);
      this.deps.tasks.setStatus(taskKey, "created");
      this.deps.log?.debug(`[crawl] update requested ${endpoint} task=${jobId}`);
    }
    while (true) {
      const jitter = 0.75 + this.random() * 0.5;
      await this.sleep(this.deps.settings.updateCheckPeriodMs * jitter, signal);
      const updateStatus = await this.deps.api.getUpdateStatus(endpoint, params, signal);
      if (SETTLED_UPDATE_STATUSES.has(updateStatus)) {
        this.deps.tasks.setStatus(taskKey, "collecting");
        if (updateStatus === "finished") {
          this.deps.log?.debug(`[crawl] update ${endpoint} settled status=${updateStatus}`);
        } else {
          this.deps.log?.warn(`[crawl] update ${endpoint} ended with status=${updateStatus}, using cached data`);
        }
        return;
      }
    }
  }

  /**
   * Page through one child relation. Each page queues the child invocations
   * and the two sink writes; the queue is drained before the next page is
   * requested so a parent never holds more than one page of children.
   */
  private async fanOut(
    relation: RelationDescriptor,
    endpoint: string,
    params: ApiParams,
    entity: CrawlEntity,
    options: TraversalOptions,
    pending: Operation[],
    signal?: AbortSignal
  ) {
    const limit = relation.limit(options);
    if (limit !== null && limit <= 0) return;

    const childOptions = childTraversal(options);
    const collectionParams: ApiParams = { ...params, order_by: COLLECTION_ORDER };
    let fetchedCount = 0;

    for await (const page of paginate(
      this.deps.api,
      `${endpoint}/${relation.segment}`,
      collectionParams,
      signal
    )) {
      const batch = limit === null ? page : page.slice(0, limit - fetchedCount);
      for (const child of batch) {
        pending.push((poolSignal) =>
          this.crawl(relation.childKind, child.id, childOptions, {
            update: false,
            item: child,
            signal: poolSignal
          })
        );
      }
      pending.push(() => this.deps.sink.saveBatch(relation.childKind, batch));
      pending.push(() =>
        this.deps.sink.saveConnections(
          entity.id,
          batch.map((child) => child.id),
          relation.collection
        )
      );

      fetchedCount += batch.length;
      if (limit !== null && fetchedCount >= limit) break;

      await this.drain(pending, signal);
    }
  }

  private async drain(pending: Operation[], signal?: AbortSignal) {
    const operations = pending.splice(0, pending.length);
    await runPool(operations, this.deps.settings.tasksBatchSize, signal);
  }
}

function shouldTraverse(relation: RelationDescriptor, options: TraversalOptions, entity: CrawlEntity): boolean {
  if (!relation.enabled(options)) return false;
  if (relation.requiresComments && !entity.comments_count) return false;
  return true;
}
