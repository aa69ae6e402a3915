import { describe, it, expect, vi, afterEach } from "vitest";

import { RunAborted } from "../../../src/errors.js";
import {
  UNAUTHORIZED,
  classifyStatus,
  fetchJson,
  type JsonResponse,
} from "../../../src/utils/http.js";

function response(
  status: number,
  body: unknown = undefined,
  headers: Record<string, string> = {}
): JsonResponse {
  return { status, headers: new Headers(headers), body };
}

describe("utils/http", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ============================================================================
  // Status Classification
  // ============================================================================

  describe("classifyStatus", () => {
    it("should pass 2xx bodies through", () => {
      expect(classifyStatus(response(200, { ok: true }))).toEqual({
        status: "ok",
        value: { ok: true },
      });
      expect(classifyStatus(response(204))).toEqual({
        status: "ok",
        value: undefined,
      });
    });

    it("should mark 429 as throttled with the Retry-After delay", () => {
      expect(
        classifyStatus(response(429, undefined, { "Retry-After": "3" }))
      ).toEqual({
        status: "retryable",
        reason: "Rate limited (HTTP 429)",
        throttled: true,
        retryAfterMs: 3000,
      });
    });

    it("should treat 408 and 5xx as transient", () => {
      expect(classifyStatus(response(503))).toEqual({
        status: "retryable",
        reason: "Transient HTTP 503",
      });
      expect(classifyStatus(response(408))).toEqual({
        status: "retryable",
        reason: "Transient HTTP 408",
      });
    });

    it("should flag 401 and 403 as unauthorized", () => {
      expect(classifyStatus(response(401))).toEqual({
        status: "fatal",
        reason: "Unauthorized (HTTP 401)",
        code: UNAUTHORIZED,
      });
      expect(classifyStatus(response(403))).toMatchObject({
        status: "fatal",
        code: UNAUTHORIZED,
      });
    });

    it("should treat other client errors as fatal", () => {
      expect(classifyStatus(response(404))).toEqual({
        status: "fatal",
        reason: "Unexpected HTTP 404",
        code: "HTTP_404",
      });
    });
  });

  // ============================================================================
  // Requests
  // ============================================================================

  describe("fetchJson", () => {
    it("should return status, headers and parsed body", async () => {
      const fetchMock = vi.fn(
        async () =>
          new Response(JSON.stringify({ items: [1, 2] }), {
            status: 200,
            headers: { "Content-Type": "application/json", "X-Page": "1" },
          })
      );
      vi.stubGlobal("fetch", fetchMock);

      const result = await fetchJson("https://api.example.test/items", {
        method: "POST",
        body: "{}",
      });

      expect(result.status).toBe("ok");
      if (result.status !== "ok") return;
      expect(result.value.status).toBe(200);
      expect(result.value.body).toEqual({ items: [1, 2] });
      expect(result.value.headers.get("x-page")).toBe("1");
      expect(fetchMock).toHaveBeenCalledWith(
        "https://api.example.test/items",
        expect.objectContaining({ method: "POST", body: "{}" })
      );
    });

    it("should leave a non-JSON body undefined", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => new Response("<html>Bad Gateway</html>", { status: 502 }))
      );

      const result = await fetchJson("https://api.example.test/items");

      expect(result).toEqual({
        status: "ok",
        value: expect.objectContaining({ status: 502, body: undefined }),
      });
    });

    it("should turn network errors into retryable attempts", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => {
          throw new TypeError("fetch failed");
        })
      );

      expect(await fetchJson("https://api.example.test/items")).toEqual({
        status: "retryable",
        reason: "Network error: fetch failed",
      });
    });

    it("should turn a request timeout into a retryable attempt", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(
          (_url: string, init: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
              init.signal?.addEventListener("abort", () => {
                reject(init.signal?.reason);
              });
            })
        )
      );

      const result = await fetchJson(
        "https://api.example.test/slow",
        {},
        { timeoutMs: 10 }
      );

      expect(result).toEqual({
        status: "retryable",
        reason: "Network error: Request timed out after 10ms",
      });
    });

    it("should rethrow the caller's abort as RunAborted", async () => {
      const controller = new AbortController();
      vi.stubGlobal(
        "fetch",
        vi.fn(
          (_url: string, init: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
              init.signal?.addEventListener("abort", () => {
                reject(new DOMException("aborted", "AbortError"));
              });
              controller.abort();
            })
        )
      );

      await expect(
        fetchJson("https://api.example.test/items", {}, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RunAborted);
    });
  });
});
