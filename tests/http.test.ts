import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import {
  ApiClient,
  ApiRequestError,
  backoffDelayMs,
  cleanParams,
  isTransientNetworkError,
  type ApiClientOptions
} from "../src/http.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

function createClient(fetchImpl: typeof fetch, overrides: Partial<ApiClientOptions> = {}) {
  const sleeps: number[] = [];
  const client = new ApiClient({
    apiUrl: "https://api.test/v1/",
    accessToken: "test-token",
    timeoutMs: 20,
    maxConcurrentRequests: 10,
    fetch: fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0.5,
    ...overrides
  });
  return { client, sleeps };
}

function connectionReset(): TypeError {
  const cause = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
  return new TypeError("fetch failed", { cause });
}

describe("backoffDelayMs", () => {
  it("stays within 0.75..1.25 of min(attempt, 5) seconds", () => {
    for (let attempt = 0; attempt <= 6; attempt += 1) {
      const steps = Math.min(attempt, 5);
      expect(backoffDelayMs(attempt, () => 0)).toBeCloseTo(750 * steps);
      expect(backoffDelayMs(attempt, () => 1)).toBeCloseTo(1250 * steps);
      const sample = backoffDelayMs(attempt);
      expect(sample).toBeGreaterThanOrEqual(750 * steps);
      expect(sample).toBeLessThanOrEqual(1250 * steps);
    }
  });

  it("caps the linear growth at five steps", () => {
    expect(backoffDelayMs(5, () => 0.5)).toBe(5000);
    expect(backoffDelayMs(40, () => 0.5)).toBe(5000);
  });
});

describe("cleanParams", () => {
  it("drops absent values and encodes booleans as integers", () => {
    expect(
      cleanParams({ cursor: null, max_comments: undefined, load_comments: true, max_page_size: 100 })
    ).toEqual({ load_comments: "1", max_page_size: "100" });
  });
});

describe("isTransientNetworkError", () => {
  it("recognises connection-level failures through the cause chain", () => {
    expect(isTransientNetworkError(connectionReset())).toBe(true);
    expect(isTransientNetworkError(Object.assign(new Error("refused"), { code: "ECONNREFUSED" }))).toBe(true);
    expect(isTransientNetworkError(new Error("boom"))).toBe(false);
    expect(isTransientNetworkError("ECONNRESET")).toBe(false);
  });
});

describe("ApiClient.call", () => {
  it("builds the request URL from the path and non-null params", async () => {
    const seen: { url: string; method: string | undefined }[] = [];
    const { client } = createClient(async (input, init) => {
      seen.push({ url: String(input), method: init?.method });
      return jsonResponse({ status: "ok", data: { id: "1" }, error: null });
    });

    const resp = await client.call("get", "facebook/post/1", {
      load_comments: 1,
      max_comments: null,
      cursor: undefined
    });

    expect(resp).toEqual({ status: "ok", data: { id: "1" }, error: null });
    expect(seen).toHaveLength(1);
    expect(seen[0].method).toBe("GET");
    const url = new URL(seen[0].url);
    expect(url.origin + url.pathname).toBe("https://api.test/v1/facebook/post/1");
    expect(url.searchParams.get("load_comments")).toBe("1");
    expect(url.searchParams.get("access_token")).toBe("test-token");
    expect(url.searchParams.has("max_comments")).toBe(false);
    expect(url.searchParams.has("cursor")).toBe(false);
  });

  it("retries timed out attempts with a growing backoff", async () => {
    let calls = 0;
    const { client, sleeps } = createClient((_input, init) => {
      calls += 1;
      if (calls <= 3) {
        return new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        });
      }
      return Promise.resolve(jsonResponse({ status: "ok", data: null, error: null }));
    });

    const resp = await client.call("get", "facebook/post/1", {});

    expect(resp.status).toBe("ok");
    expect(calls).toBe(4);
    expect(sleeps).toEqual([0, 1000, 2000]);
  });

  it("treats 429 as flow control and retries", async () => {
    let calls = 0;
    const { client, sleeps } = createClient(async () => {
      calls += 1;
      if (calls <= 2) return jsonResponse({ status: "fail", error: { code: "RateLimit" } }, 429);
      return jsonResponse({ status: "ok", data: { id: "1" }, error: null });
    });

    const resp = await client.call("get", "facebook/post/1", {});

    expect(resp.status).toBe("ok");
    expect(calls).toBe(3);
    expect(sleeps).toEqual([0, 1000]);
  });

  it("retries dropped connections", async () => {
    let calls = 0;
    const { client, sleeps } = createClient(async () => {
      calls += 1;
      if (calls === 1) throw connectionReset();
      return jsonResponse({ status: "ok", data: null, error: null });
    });

    await client.call("get", "facebook/post/1", {});

    expect(calls).toBe(2);
    expect(sleeps).toEqual([0]);
  });

  it("does not retry unexpected failures", async () => {
    let calls = 0;
    const { client, sleeps } = createClient(async () => {
      calls += 1;
      throw new Error("boom");
    });

    await expect(client.call("get", "facebook/post/1", {})).rejects.toThrow("boom");
    expect(calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it("returns API-level failures to the caller without retrying", async () => {
    let calls = 0;
    const { client, sleeps } = createClient(async () => {
      calls += 1;
      return jsonResponse({ status: "fail", data: null, error: { code: "AccessDenied" } }, 403);
    });

    const resp = await client.call("get", "facebook/post/1", {});

    expect(resp.status).toBe("fail");
    expect(resp.error?.code).toBe("AccessDenied");
    expect(calls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it("rejects bodies that are not API envelopes", async () => {
    const { client } = createClient(async () => new Response("<html>bad gateway</html>", { status: 502 }));

    await expect(client.call("get", "facebook/post/1", {})).rejects.toBeInstanceOf(ApiRequestError);
  });

  it("never runs more requests at once than the limiter allows", async () => {
    let active = 0;
    let maxActive = 0;
    const { client } = createClient(
      async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await delay(5);
        active -= 1;
        return jsonResponse({ status: "ok", data: null, error: null });
      },
      { maxConcurrentRequests: 2, timeoutMs: 1000 }
    );

    await Promise.all(Array.from({ length: 6 }, (_, index) => client.call("get", `facebook/post/${index}`, {})));

    expect(maxActive).toBe(2);
    expect(client.activeCount).toBe(0);
  });

  it("stops retrying once the caller cancels", async () => {
    const { client } = createClient(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      { timeoutMs: 1000 }
    );
    const controller = new AbortController();

    const pending = client.call("get", "facebook/post/1", {}, controller.signal);
    setTimeout(() => controller.abort(new Error("stop")), 5);

    await expect(pending).rejects.toThrow("stop");
  });
});

describe("ApiClient helpers", () => {
  it("maps NotFoundError to a missing item", async () => {
    const { client } = createClient(async () =>
      jsonResponse({ status: "fail", data: null, error: { code: "NotFoundError" } }, 404)
    );

    await expect(client.getItem("facebook/post/404", {})).resolves.toBeNull();
  });

  it("normalises the fields the crawler inspects", async () => {
    const { client } = createClient(async () =>
      jsonResponse({
        status: "ok",
        data: { id: 5, owner_id: 17, group_id: null, comments_count: "3", text: "hi" },
        error: null
      })
    );

    await expect(client.getItem("facebook/post/5", {})).resolves.toEqual({
      id: "5",
      owner_id: "17",
      group_id: null,
      comments_count: 3,
      text: "hi"
    });
  });

  it("raises other item failures with the error code", async () => {
    const { client } = createClient(async () =>
      jsonResponse({ status: "fail", data: null, error: { code: "AccessDenied" } }, 403)
    );

    const error = await client.getItem("facebook/post/1", {}).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({ status: "fail", code: "AccessDenied", path: "facebook/post/1" });
  });

  it("requests an update job with POST and returns its id", async () => {
    const seen: string[] = [];
    const { client } = createClient(async (input, init) => {
      seen.push(`${init?.method} ${new URL(String(input)).pathname}`);
      return jsonResponse({ status: "accepted", data: { task_id: 77 }, error: null }, 202);
    });

    await expect(client.requestUpdate("facebook/post/1", {})).resolves.toBe("77");
    expect(seen).toEqual(["POST /v1/facebook/post/1/update"]);
  });

  it("refuses an accepted update without a task id", async () => {
    const { client } = createClient(async () => jsonResponse({ status: "accepted", data: {}, error: null }, 202));

    const error = await client.requestUpdate("facebook/post/1", {}).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error).toMatchObject({ status: "accepted", path: "facebook/post/1/update" });
  });

  it("refuses an update request that was not accepted", async () => {
    const { client } = createClient(async () =>
      jsonResponse({ status: "fail", data: null, error: { code: "QuotaExceeded" } }, 400)
    );

    await expect(client.requestUpdate("facebook/post/1", {})).rejects.toThrow(
      "Failed to request update: status=fail"
    );
  });

  it("reads the update job status", async () => {
    const { client } = createClient(async () =>
      jsonResponse({ status: "ok", data: { status: "pending" }, error: null })
    );

    await expect(client.getUpdateStatus("facebook/post/1", {})).resolves.toBe("pending");
  });
});
